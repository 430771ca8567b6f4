import { beforeEach, describe, expect, it, vi } from 'vitest'
import { ZERO_ALGO_ID } from '../../src/cipher/index.js'
import { isValidClientId } from '../../src/identity/secure-id.js'
import { DISABLED, MAX_TIMER_DELAY_MS, Ticker } from '../../src/scheduling/ticker.js'
import {
  DEFAULT_INTERVAL_MS,
  SessionEngine,
  type SessionEngineOptions,
  normalizeIntervals,
} from '../../src/session/session-engine.js'
import type { HttpResponse, ProbeTransport } from '../../src/transport/index.js'
import {
  ConfigError,
  MalformedResponseError,
  StateDocumentError,
  TransportError,
  UnexpectedStatusError,
} from '../../src/types/error.types.js'
import {
  FakeTransport,
  INDEX_URL,
  KEEP_URL,
  PROBE_URL,
  TERM_URL,
  createCaptivePortal,
  createRecordingLogger,
  flush,
  reply,
  responseXml,
} from '../helpers/fake-portal.js'

const account = {
  username: 'alice',
  password: 'test-password',
  hostname: 'lab-pc',
  macAddress: 'AA:BB:CC:DD:EE:FF',
  checkInterval: 10_000,
  retryInterval: 5_000,
}

function createEngine(transport: ProbeTransport, overrides: Partial<SessionEngineOptions> = {}) {
  const { logger, records } = createRecordingLogger()
  const result = SessionEngine.create({
    account,
    probeUrl: PROBE_URL,
    logger,
    transportFactory: () => transport,
    ...overrides,
  })
  if (!result.ok) throw result.error
  return { engine: result.value, records }
}

/**
 * Probe route answering from a script, then with the last entry
 */
function scriptedProbe(transport: FakeTransport, responses: HttpResponse[]): void {
  let index = 0
  transport.on('GET', PROBE_URL, () => {
    const response = responses[Math.min(index, responses.length - 1)] ?? reply(204)
    index += 1
    return response
  })
}

describe('SessionEngine', () => {
  beforeEach(() => {
    // setImmediate stays real so `flush` can drain promise chains
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval', 'Date'] })
    vi.setSystemTime(new Date(2024, 4, 1, 8, 0, 0))
  })

  describe('create', () => {
    it('should refuse empty credentials without building a transport', () => {
      const factory = vi.fn(() => new FakeTransport())

      const result = SessionEngine.create({
        account: { ...account, password: '' },
        transportFactory: factory,
      })

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ConfigError)
        expect(result.error.message).toBe('username or password is empty')
      }
      expect(factory).not.toHaveBeenCalled()
    })

    it('should report transport construction failures as configuration errors', () => {
      const { logger, records } = createRecordingLogger()

      const result = SessionEngine.create({
        account,
        logger,
        transportFactory: () => {
          throw new Error('socket exhausted')
        },
      })

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe('failed to create transport: socket exhausted')
      }
      expect(records.map(record => [record.level, record.message])).toEqual([
        ['error', 'session creation failed'],
      ])
    })

    it('should pass configuration errors from the transport through', () => {
      const invalidProxy = new ConfigError('invalid proxy: not a url')

      const result = SessionEngine.create({
        account,
        logger: createRecordingLogger().logger,
        transportFactory: () => {
          throw invalidProxy
        },
      })

      expect(result.ok || result.error).toBe(invalidProxy)
    })

    it('should resolve the bind interface before building a transport', () => {
      const factory = vi.fn(() => new FakeTransport())
      const { macAddress: _mac, ...withoutMac } = account

      const result = SessionEngine.create({
        account: { ...withoutMac, bindInterface: 'portalkeep-missing0' },
        logger: createRecordingLogger().logger,
        transportFactory: factory,
      })

      expect(result.ok || result.error.message).toBe('network interface not found: portalkeep-missing0')
      expect(factory).not.toHaveBeenCalled()
    })

    it('should start unauthenticated with a fresh client id', () => {
      const { engine } = createEngine(new FakeTransport())

      expect(engine.state).toBe('unauthenticated')
      expect(engine.heartbeatPeriod).toEqual(DISABLED)
      expect(engine.pollPeriod).toBeUndefined()
      expect(engine.runId).toMatch(/^[a-zA-Z0-9]{5}$/)
      expect(isValidClientId(engine.snapshot.clientId)).toBe(true)
      expect(engine.snapshot).toMatchObject({
        algoId: ZERO_ALGO_ID,
        hostname: 'lab-pc',
        macAddress: 'AA:BB:CC:DD:EE:FF',
        cipher: undefined,
      })
    })

    it('should apply interval defaults', () => {
      const { engine } = createEngine(new FakeTransport(), {
        account: { ...account, checkInterval: 0, retryInterval: -1 },
      })

      expect(engine.pollIntervalMs).toBe(DEFAULT_INTERVAL_MS)
      expect(engine.retryIntervalMs).toBe(MAX_TIMER_DELAY_MS)
    })
  })

  describe('normalizeIntervals', () => {
    it.each([
      [undefined, undefined, 10_000, 10_000],
      [0, 0, 10_000, 10_000],
      [-1, 2_500, 10_000, 2_500],
      [3_000, -1, 3_000, MAX_TIMER_DELAY_MS],
    ])('should map check=%s retry=%s', (check, retry, poll, retryMs) => {
      expect(normalizeIntervals(check, retry)).toEqual({ pollIntervalMs: poll, retryIntervalMs: retryMs })
    })
  })

  describe('checkNetwork', () => {
    it('should leave an open network alone', async () => {
      const { transport, state } = createCaptivePortal()
      state.online = true
      const { engine } = createEngine(transport)

      const result = await engine.checkNetwork()

      expect(result).toEqual({ ok: true, value: 'online' })
      expect(engine.state).toBe('unauthenticated')
      expect(engine.heartbeatPeriod).toEqual(DISABLED)
      expect(transport.requests).toHaveLength(1)
    })

    it('should authenticate on redirect and arm the heartbeat', async () => {
      const { transport } = createCaptivePortal({ keepRetry: '30' })
      const { engine, records } = createEngine(transport)

      const result = await engine.checkNetwork()

      expect(result).toEqual({ ok: true, value: 'redirected' })
      expect(engine.state).toBe('authenticated')
      expect(engine.heartbeatPeriod).toEqual({ kind: 'armed', intervalMs: 30_000 })
      expect(engine.snapshot).toMatchObject({
        ticket: 'T-1',
        userIp: '10.0.0.5',
        acIp: '10.0.0.1',
        endpoints: { keepUrl: KEEP_URL, termUrl: TERM_URL },
      })
      expect(records.filter(record => record.level === 'info').map(record => record.message)).toEqual([
        'auth required',
        'auth finished',
      ])
    })

    it('should use the configured heartbeat interval when the portal advertises none', async () => {
      const { transport } = createCaptivePortal({ keepRetry: null })
      const { engine } = createEngine(transport, { defaultHeartbeatInterval: 45 })

      await engine.checkNetwork()

      expect(engine.heartbeatPeriod).toEqual({ kind: 'armed', intervalMs: 45_000 })
    })

    it('should stop heartbeats before re-authenticating', async () => {
      const { transport, state } = createCaptivePortal()
      const { engine, records } = createEngine(transport)
      await engine.checkNetwork()
      expect(engine.heartbeatPeriod).toEqual({ kind: 'armed', intervalMs: 30_000 })

      // Session expired on the portal side, and the portal is now failing
      state.online = false
      const seenDuringAuth: unknown[] = []
      transport.on('GET', INDEX_URL, () => {
        seenDuringAuth.push(engine.heartbeatPeriod, engine.state)
        return reply(500)
      })

      const result = await engine.checkNetwork()

      expect(result).toEqual({ ok: true, value: 'redirected' })
      expect(seenDuringAuth).toEqual([DISABLED, 'authenticating'])
      expect(engine.heartbeatPeriod).toEqual(DISABLED)
      expect(engine.state).toBe('unauthenticated')
      expect(records.at(-1)).toMatchObject({ level: 'warn', message: 'auth failed' })
      expect(records.at(-1)?.error?.message).toBe('index step failed: unexpected status code: 500')
    })

    it('should contain a redirect without location', async () => {
      const transport = new FakeTransport().on('GET', PROBE_URL, () => reply(307))
      const { engine, records } = createEngine(transport)

      const result = await engine.checkNetwork()

      expect(result).toEqual({ ok: true, value: 'redirected' })
      expect(records.at(-1)?.error?.message).toBe('redirect step failed: invalid redirect location ""')
    })

    it('should report unexpected probe statuses', async () => {
      const transport = new FakeTransport().on('GET', PROBE_URL, () => reply(500))
      const { engine } = createEngine(transport)

      const result = await engine.checkNetwork()

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(UnexpectedStatusError)
        expect(result.error.message).toBe('unexpected status code: 500')
      }
    })

    it('should report transport failures', async () => {
      const { engine } = createEngine(new FakeTransport())

      const result = await engine.checkNetwork()

      expect(result.ok || result.error).toBeInstanceOf(TransportError)
    })
  })

  describe('sendHeartbeat', () => {
    it('should refuse to run before authentication', async () => {
      const transport = new FakeTransport()
      const { engine } = createEngine(transport)

      const result = await engine.sendHeartbeat()

      expect(result.ok || result.error).toEqual(new StateDocumentError('session is not authenticated'))
      expect(transport.requests).toEqual([])
    })

    it('should send the state document and follow the returned interval', async () => {
      const { transport } = createCaptivePortal({ heartbeatInterval: '20' })
      const { engine } = createEngine(transport)
      await engine.checkNetwork()

      const result = await engine.sendHeartbeat()

      expect(result).toEqual({ ok: true, value: 20 })
      expect(engine.heartbeatPeriod).toEqual({ kind: 'armed', intervalMs: 20_000 })
      const [keep] = transport.requestsTo(KEEP_URL)
      expect(keep?.headers).toEqual({ 'Client-ID': engine.snapshot.clientId, 'Algo-ID': ZERO_ALGO_ID })
      expect(keep?.body).toContain('<ticket>T-1</ticket><local-time>2024-05-01 08:00:00</local-time>')
    })

    it.each(['soon', '0'])('should keep the current period when the interval is %s', async interval => {
      const { transport } = createCaptivePortal({ heartbeatInterval: interval })
      const { engine } = createEngine(transport)
      await engine.checkNetwork()

      const result = await engine.sendHeartbeat()

      expect(result.ok || result.error).toBeInstanceOf(MalformedResponseError)
      expect(engine.heartbeatPeriod).toEqual({ kind: 'armed', intervalMs: 30_000 })
    })

    it('should report non-200 responses', async () => {
      const { transport } = createCaptivePortal()
      const { engine } = createEngine(transport)
      await engine.checkNetwork()
      transport.on('POST', KEEP_URL, () => reply(503))

      const result = await engine.sendHeartbeat()

      expect(result.ok || result.error).toEqual(new UnexpectedStatusError(503))
    })
  })

  describe('start', () => {
    it('should keep the session alive and log out once when stopped', async () => {
      const { transport } = createCaptivePortal({ keepRetry: '30', heartbeatInterval: '20' })
      const { engine, records } = createEngine(transport)

      const running = engine.start()
      await flush()
      expect(engine.state).toBe('authenticated')
      expect(engine.pollPeriod).toEqual({ kind: 'armed', intervalMs: 10_000 })

      await vi.advanceTimersByTimeAsync(30_000)
      await flush()
      expect(transport.requestsTo(KEEP_URL)).toHaveLength(1)
      expect(engine.heartbeatPeriod).toEqual({ kind: 'armed', intervalMs: 20_000 })
      expect(records).toContainEqual({ level: 'info', message: 'send heartbeat', meta: { nextInSeconds: 20 } })

      engine.stop()
      engine.stop()
      await running
      await engine.logout()

      const terms = transport.requestsTo(TERM_URL)
      expect(terms).toHaveLength(1)
      expect(terms[0]?.timeoutMs).toBe(5_000)
      expect(engine.state).toBe('loggedOut')
      expect(engine.heartbeatPeriod).toEqual(DISABLED)
      expect(engine.pollPeriod).toEqual(DISABLED)
      expect(transport.closed).toBe(true)
      expect(vi.getTimerCount()).toBe(0)
      expect(records.map(record => record.message)).toContain('client context cancel')
    })

    it('should stop when the caller aborts', async () => {
      const { transport } = createCaptivePortal()
      const { engine } = createEngine(transport)
      const controller = new AbortController()

      const running = engine.start(controller.signal)
      await flush()
      controller.abort()
      await running

      expect(engine.signal.aborted).toBe(true)
      expect(engine.state).toBe('loggedOut')
      expect(transport.requestsTo(TERM_URL)).toHaveLength(1)
    })

    it('should probe once and log out when started with an aborted signal', async () => {
      const { transport, state } = createCaptivePortal()
      state.online = true
      const { engine } = createEngine(transport, { logoutTimeout: 2_000 })
      const controller = new AbortController()
      controller.abort()

      await engine.start(controller.signal)

      expect(transport.requests.map(request => [request.method, request.timeoutMs])).toEqual([
        ['GET', undefined],
        ['GET', 2_000],
      ])
      expect(transport.closed).toBe(true)
    })

    it('should probe at the retry interval until the network answers again', async () => {
      const transport = new FakeTransport()
      scriptedProbe(transport, [reply(500), reply(500), reply(204)])
      const { engine, records } = createEngine(transport)

      const running = engine.start()
      await flush()
      expect(engine.pollPeriod).toEqual({ kind: 'armed', intervalMs: 5_000 })

      await vi.advanceTimersByTimeAsync(5_000)
      await flush()
      expect(engine.pollPeriod).toEqual({ kind: 'armed', intervalMs: 5_000 })

      await vi.advanceTimersByTimeAsync(5_000)
      await flush()
      expect(engine.pollPeriod).toEqual({ kind: 'armed', intervalMs: 10_000 })
      expect(records.filter(record => record.message === 'network check failed')).toHaveLength(2)

      engine.stop()
      await running
    })

    it('should retry failed heartbeats on the next tick', async () => {
      const { transport, state } = createCaptivePortal()
      const { engine, records } = createEngine(transport)
      transport.on('POST', KEEP_URL, () => reply(500))

      const running = engine.start()
      await flush()
      await vi.advanceTimersByTimeAsync(60_000)
      await flush()

      expect(transport.requestsTo(KEEP_URL)).toHaveLength(2)
      expect(engine.heartbeatPeriod).toEqual({ kind: 'armed', intervalMs: 30_000 })
      expect(records.filter(record => record.message === 'send heartbeat error')).toHaveLength(2)
      expect(state.online).toBe(true)

      engine.stop()
      await running
    })

    it('should not accumulate listeners across many quiet polls', async () => {
      const { transport, state } = createCaptivePortal()
      state.online = true
      const { engine } = createEngine(transport)
      const subscribe = vi.spyOn(Ticker.prototype, 'subscribe')
      const added = vi.spyOn(engine.signal, 'addEventListener')
      const removed = vi.spyOn(engine.signal, 'removeEventListener')

      const running = engine.start()
      await flush()
      for (let i = 0; i < 200; i += 1) {
        await vi.advanceTimersByTimeAsync(10_000)
        await flush()
      }

      expect(transport.requestsTo(PROBE_URL)).toHaveLength(201)
      expect(engine.heartbeatPeriod).toEqual(DISABLED)
      expect(added.mock.calls.length - removed.mock.calls.length).toBe(1)
      const tickers = new Set(subscribe.mock.contexts.filter((context): context is Ticker => context instanceof Ticker))
      expect(tickers.size).toBe(2)
      for (const ticker of tickers) {
        expect(ticker.listenerCount).toBe(1)
      }

      engine.stop()
      await running
      for (const ticker of tickers) {
        expect(ticker.listenerCount).toBe(0)
      }
    })

    it('should detach from the caller signal when it returns', async () => {
      const { transport } = createCaptivePortal()
      const { engine } = createEngine(transport)
      const controller = new AbortController()
      const added = vi.spyOn(controller.signal, 'addEventListener')
      const removed = vi.spyOn(controller.signal, 'removeEventListener')

      const running = engine.start(controller.signal)
      await flush()
      engine.stop()
      await running

      expect(added).toHaveBeenCalledTimes(1)
      expect(removed).toHaveBeenCalledWith('abort', added.mock.calls[0]?.[1])
    })

    it('should not run twice', async () => {
      const { transport, state } = createCaptivePortal()
      state.online = true
      const { engine, records } = createEngine(transport)
      const controller = new AbortController()
      controller.abort()

      await engine.start(controller.signal)
      await engine.start()

      expect(records.at(-1)).toMatchObject({ level: 'warn', message: 'client already started' })
      expect(transport.requests).toHaveLength(2)
    })
  })

  describe('dispose', () => {
    it('should stop the heartbeat and close the transport of an engine driven by hand', async () => {
      const { transport } = createCaptivePortal({ keepRetry: '30' })
      const { engine } = createEngine(transport)
      await engine.checkNetwork()
      expect(vi.getTimerCount()).toBe(1)

      await engine.dispose()

      expect(engine.heartbeatPeriod).toEqual(DISABLED)
      expect(vi.getTimerCount()).toBe(0)
      expect(transport.closed).toBe(true)
    })

    it('should leave a started engine to its own shutdown', async () => {
      const { transport } = createCaptivePortal()
      const { engine } = createEngine(transport)
      const running = engine.start()
      await flush()

      await engine.dispose()
      expect(transport.closed).toBe(false)

      engine.stop()
      await running
      expect(transport.closed).toBe(true)
    })
  })

  describe('logout', () => {
    it('should skip the terminate request without a negotiated cipher', async () => {
      const { transport, state } = createCaptivePortal()
      state.online = true
      const { engine } = createEngine(transport)

      await engine.logout()

      expect(transport.requests.map(request => request.url)).toEqual([PROBE_URL])
      expect(engine.state).toBe('loggedOut')
    })

    it('should skip the terminate request while the portal is redirecting', async () => {
      const { transport, state } = createCaptivePortal()
      const { engine } = createEngine(transport)
      await engine.checkNetwork()
      state.online = false

      await engine.logout()

      expect(transport.requestsTo(TERM_URL)).toEqual([])
    })

    it('should send the state document to the terminate endpoint', async () => {
      const { transport } = createCaptivePortal()
      const { engine, records } = createEngine(transport)
      await engine.checkNetwork()

      await engine.logout()

      const [term] = transport.requestsTo(TERM_URL)
      expect(term?.headers).toEqual({ 'Client-ID': engine.snapshot.clientId, 'Algo-ID': ZERO_ALGO_ID })
      expect(term?.body).toContain('<client-id>')
      expect(records.at(-1)).toMatchObject({ level: 'info', message: 'log out request sent' })
    })

    it('should only log logout failures at debug level', async () => {
      const { transport } = createCaptivePortal()
      const { engine, records } = createEngine(transport)
      await engine.checkNetwork()
      transport.on('POST', TERM_URL, () => {
        throw new TransportError(`POST ${TERM_URL} failed: timeout`)
      })

      await engine.logout()

      expect(records.at(-1)).toEqual({
        level: 'debug',
        message: `logout failed: POST ${TERM_URL} failed: timeout`,
        meta: { code: 'TRANSPORT_ERROR' },
      })
      expect(engine.state).toBe('loggedOut')
    })
  })

  it('should build heartbeat bodies the portal can read', async () => {
    const { transport } = createCaptivePortal()
    const { engine } = createEngine(transport)
    await engine.checkNetwork()
    transport.on('POST', KEEP_URL, request =>
      reply(200, request.body?.includes('<ipv4>10.0.0.5</ipv4>') ? responseXml({ interval: '15' }) : '')
    )

    const result = await engine.sendHeartbeat()

    expect(result).toEqual({ ok: true, value: 15 })
  })
})
