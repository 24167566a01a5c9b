// Системные ошибки: пробрасываются как есть и логируются центральным обработчиком.
// Ожидаемые ошибки (not_found / conflict / invalid_argument) возвращаются значением, см. DictFailure.

export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigError';
  }
}

export class ClockRegressionError extends Error {
  readonly currentTimestamp: number;
  readonly lastTimestamp: number;

  constructor(currentTimestamp: number, lastTimestamp: number) {
    super(`clock moved backwards: refusing to generate id (now=${currentTimestamp}, last=${lastTimestamp})`);
    this.name = 'ClockRegressionError';
    this.currentTimestamp = currentTimestamp;
    this.lastTimestamp = lastTimestamp;
  }
}

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export function isSystemFault(err: unknown): err is ClockRegressionError | PersistenceError | InvalidConfigError {
  return err instanceof ClockRegressionError || err instanceof PersistenceError || err instanceof InvalidConfigError;
}

export function toPersistenceError(err: unknown): Error {
  if (isSystemFault(err)) return err;
  const msg = err instanceof Error ? err.message : String(err);
  return new PersistenceError(`storage failure: ${msg}`, { cause: err });
}
