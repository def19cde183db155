import { ConfigError } from '../config/crawl-config.js'

export type Flags = Record<string, string | boolean>

/**
 * `--key value`, `--key=value` and bare `--switch` flags. Consecutive
 * non-flag tokens after a key are joined with spaces so unquoted genre
 * names survive (`--genre hip hop`). `-h` and `-v` are short for `--help`
 * and `--verbose`.
 */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (token === '-h') {
      flags.help = true
      continue
    }
    if (token === '-v') {
      flags.verbose = true
      continue
    }
    if (!token.startsWith('--')) {
      continue
    }

    const eq = token.indexOf('=')
    if (eq > 2) {
      flags[token.slice(2, eq)] = token.slice(eq + 1)
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('-')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return flags
}

function valueOf(flags: Flags, name: string): string | undefined {
  const value = flags[name]
  if (value === undefined || value === false) {
    return undefined
  }
  if (value === true) {
    throw new ConfigError(`--${name} needs a value`)
  }
  return value
}

export function flagString(flags: Flags, name: string): string | undefined {
  const value = valueOf(flags, name)?.trim()
  return value ? value : undefined
}

export function flagBool(flags: Flags, name: string): boolean {
  return flags[name] === true || flags[name] === 'true'
}

export function flagInt(flags: Flags, name: string, min?: number): number | undefined {
  const raw = valueOf(flags, name)
  if (raw === undefined) {
    return undefined
  }
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigError(`--${name} must be an integer, got "${raw}"`)
  }
  const value = Number.parseInt(raw, 10)
  if (min !== undefined && value < min) {
    throw new ConfigError(`--${name} must be >= ${min}, got ${value}`)
  }
  return value
}

export function flagNumber(flags: Flags, name: string): number | undefined {
  const raw = valueOf(flags, name)
  if (raw === undefined) {
    return undefined
  }
  const value = Number(raw.trim())
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(`--${name} must be a number, got "${raw}"`)
  }
  return value
}

/** Comma-separated list, blanks removed */
export function flagList(flags: Flags, name: string): string[] | undefined {
  const raw = valueOf(flags, name)
  if (raw === undefined) {
    return undefined
  }
  const items = raw
    .split(',')
    .map(item => item.trim())
    .filter(Boolean)
  return items.length > 0 ? items : undefined
}
