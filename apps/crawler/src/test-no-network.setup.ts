import http from 'node:http'
import https from 'node:https'
import net from 'node:net'
import tls from 'node:tls'
import { beforeEach, vi } from 'vitest'

function blockedNetwork(): never {
  throw new Error('Outbound network is disabled for crawler tests')
}

// per test; vi.restoreAllMocks() in a suite removes these spies
beforeEach(() => {
  vi.spyOn(http, 'request').mockImplementation(blockedNetwork)
  vi.spyOn(http, 'get').mockImplementation(blockedNetwork)
  vi.spyOn(https, 'request').mockImplementation(blockedNetwork)
  vi.spyOn(https, 'get').mockImplementation(blockedNetwork)
  vi.spyOn(net, 'connect').mockImplementation(blockedNetwork)
  vi.spyOn(tls, 'connect').mockImplementation(blockedNetwork)
  vi.stubGlobal('fetch', async () => blockedNetwork())
})
