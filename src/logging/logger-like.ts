/**
 * Structural subset of a pino logger. Components take this instead of a
 * concrete pino instance so tests can pass `{ info: vi.fn(), ... }`.
 */
export type LoggerLike = {
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
  debug?(obj: unknown, msg?: string): void;
};
