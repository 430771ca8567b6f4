/**
 * Re-armable repeating timer consumed by the session loop
 *
 * A ticker is either disabled (no timer held) or armed with a period. At most
 * one tick is buffered until the caller `consume()`s it, so a tick that lands
 * while the loop is busy is still delivered on the following iteration.
 * Long-lived consumers `subscribe` and unsubscribe per wait; `next()` hands out
 * one shared promise per tick.
 */

/** Largest delay Node timers accept (2^31 - 1 ms) */
export const MAX_TIMER_DELAY_MS = 2_147_483_647

export type TickerPeriod = { kind: 'disabled' } | { kind: 'armed'; intervalMs: number }

export const DISABLED: TickerPeriod = { kind: 'disabled' }

interface Waiter {
  promise: Promise<void>
  resolve: () => void
  fired: boolean
}

function createWaiter(): Waiter {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>(r => {
    resolve = r
  })
  return { promise, resolve, fired: false }
}

export class Ticker {
  private period: TickerPeriod = DISABLED
  private timer: ReturnType<typeof setInterval> | undefined
  private waiter: Waiter = createWaiter()
  private readonly listeners = new Set<() => void>()

  constructor(period: TickerPeriod = DISABLED) {
    if (period.kind === 'armed') {
      this.reset(period.intervalMs)
    }
  }

  get state(): TickerPeriod {
    return this.period
  }

  get isArmed(): boolean {
    return this.period.kind === 'armed'
  }

  /** A tick has fired and not been consumed yet */
  get hasTick(): boolean {
    return this.waiter.fired
  }

  get listenerCount(): number {
    return this.listeners.size
  }

  /**
   * Re-arm with a new period; the next tick fires `intervalMs` from now.
   * A buffered, unconsumed tick from the previous period is dropped.
   */
  reset(intervalMs: number): void {
    const clamped = Math.min(Math.max(Math.floor(intervalMs), 1), MAX_TIMER_DELAY_MS)
    this.clearTimer()
    this.dropBufferedTick()
    this.period = { kind: 'armed', intervalMs: clamped }
    this.timer = setInterval(() => this.fire(), clamped)
  }

  /**
   * Stop ticking; outstanding `next()` promises resolve only after a later `reset`
   */
  disable(): void {
    this.clearTimer()
    this.dropBufferedTick()
    this.period = DISABLED
  }

  /**
   * Resolves when a tick is available
   */
  next(): Promise<void> {
    return this.waiter.promise
  }

  /**
   * Call `listener` when the next tick fires. Returns the unsubscribe function.
   */
  subscribe(listener: () => void): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Acknowledge the delivered tick so `next()` waits for a fresh one
   */
  consume(): void {
    if (this.waiter.fired) {
      this.waiter = createWaiter()
    }
  }

  stop(): void {
    this.disable()
  }

  private fire(): void {
    if (!this.waiter.fired) {
      this.waiter.fired = true
      this.waiter.resolve()
      for (const listener of [...this.listeners]) listener()
    }
  }

  private dropBufferedTick(): void {
    if (this.waiter.fired) {
      this.waiter = createWaiter()
    }
  }

  private clearTimer(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer)
      this.timer = undefined
    }
  }
}
