export interface Logger {
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
  debug?(...args: unknown[]): void
}

/**
 * Time source for every component that expires or windows state. Tests pass a
 * manual clock instead of faking timers.
 */
export interface Clock {
  now(): number
}

export const systemClock: Clock = { now: () => Date.now() }

export interface TraceEvent {
  name: string
  meta?: Record<string, unknown>
}

export interface Hooks {
  logger?: Logger
  /** Optional hook to fan out traces for observability tools. */
  onTrace?: (event: TraceEvent) => void
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

export function nowIso() {
  return new Date().toISOString()
}
