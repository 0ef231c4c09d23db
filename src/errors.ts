export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends MonitorError {}

/** A single course's sections could not be retrieved; the run falls back to prior data. */
export class FetchError extends MonitorError {
  constructor(
    readonly courseId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Courses were listed but no section could be parsed for any of them. */
export class ParsingFailure extends MonitorError {}

export class PersistError extends MonitorError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
