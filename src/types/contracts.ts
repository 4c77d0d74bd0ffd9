export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export const NOOP_LOGGER: Logger = {
  debug: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export type Unsubscribe = () => void;

/** Returns a monotonic timestamp in microseconds. */
export type MicrosClock = () => number;
