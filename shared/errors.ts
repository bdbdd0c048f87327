export class FrameStatsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ParseError extends FrameStatsError {
  readonly token: string;
  readonly source?: string;
  readonly lineNumber?: number;

  constructor(
    message: string,
    token: string,
    location: { source?: string; lineNumber?: number } = {},
  ) {
    const where = [
      location.source,
      location.lineNumber !== undefined ? `line ${location.lineNumber}` : undefined,
    ]
      .filter((part): part is string => typeof part === "string")
      .join(":");
    super(where ? `${where}: ${message}` : message);
    this.token = token;
    this.source = location.source;
    this.lineNumber = location.lineNumber;
  }
}

/** Raised when a statistic needs more present values than a series holds. */
export class InsufficientDataError extends FrameStatsError {
  readonly operation: string;
  readonly required: number;
  readonly available: number;

  constructor(operation: string, required: number, available: number) {
    super(
      `${operation} requires at least ${required} value${required === 1 ? "" : "s"}, got ${available}`,
    );
    this.operation = operation;
    this.required = required;
    this.available = available;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
