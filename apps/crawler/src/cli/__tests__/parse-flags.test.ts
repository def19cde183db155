import { describe, expect, it } from 'vitest'
import { ConfigError } from '../../config/crawl-config.js'
import { flagBool, flagInt, flagList, flagNumber, flagString, parseFlags } from '../parse-flags.js'

describe('parseFlags', () => {
  it('reads values, switches and short aliases', () => {
    expect(parseFlags(['--genre', 'rock', '--resume', '-v', '--limit=5'])).toEqual({
      genre: 'rock',
      resume: true,
      verbose: true,
      limit: '5',
    })
  })

  it('joins unquoted multi-word values', () => {
    expect(parseFlags(['--genre', 'hip', 'hop', '--test-mode'])).toEqual({ genre: 'hip hop', 'test-mode': true })
  })

  it('needs the = form for negative numbers', () => {
    expect(parseFlags(['--min-score', '-5'])).toEqual({ 'min-score': true })
    expect(parseFlags(['--min-score=-5'])).toEqual({ 'min-score': '-5' })
  })

  it('ignores stray positional tokens', () => {
    expect(parseFlags(['stray', '--help'])).toEqual({ help: true })
  })
})

describe('flag readers', () => {
  it('reads strings and booleans', () => {
    const flags = parseFlags(['--genre', '  rock ', '--render', '--resume=true'])

    expect(flagString(flags, 'genre')).toBe('rock')
    expect(flagString(flags, 'missing')).toBeUndefined()
    expect(flagBool(flags, 'render')).toBe(true)
    expect(flagBool(flags, 'resume')).toBe(true)
    expect(flagBool(flags, 'missing')).toBe(false)
  })

  it('parses integers with a lower bound', () => {
    expect(flagInt(parseFlags(['--years-back', '3']), 'years-back', 1)).toBe(3)
    expect(() => flagInt(parseFlags(['--years-back', '0']), 'years-back', 1)).toThrow('--years-back must be >= 1, got 0')
    expect(() => flagInt(parseFlags(['--years-back', '2.5']), 'years-back')).toThrow(
      '--years-back must be an integer, got "2.5"'
    )
  })

  it('parses numbers', () => {
    expect(flagNumber(parseFlags(['--min-score', '72.5']), 'min-score')).toBe(72.5)
    expect(() => flagNumber(parseFlags(['--min-score', 'high']), 'min-score')).toThrow(ConfigError)
  })

  it('splits comma lists and drops blanks', () => {
    expect(flagList(parseFlags(['--genres', 'rock, pop,,jazz']), 'genres')).toEqual(['rock', 'pop', 'jazz'])
    expect(flagList(parseFlags(['--genres=,']), 'genres')).toBeUndefined()
  })

  it('rejects a value flag given without a value', () => {
    expect(() => flagString(parseFlags(['--genre']), 'genre')).toThrow('--genre needs a value')
  })
})
