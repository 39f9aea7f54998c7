/**
 * Error types thrown by the reporting core
 */

/** Base class so callers can tell report errors from everything else */
export class ReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A segment violates the model (end before start, unsafe timestamp, bad shape) */
export class InvalidSegmentError extends ReportError {
  /** Position of the offending segment in the input, when known */
  readonly index: number | null;

  constructor(message: string, index: number | null = null) {
    super(index === null ? message : `Segment ${index}: ${message}`);
    this.index = index;
  }
}

/** A timezone identifier the runtime cannot resolve */
export class UnknownTimeZoneError extends ReportError {
  readonly timeZone: string;

  constructor(timeZone: string) {
    super(`Unknown time zone "${timeZone}"`);
    this.timeZone = timeZone;
  }
}

/** Report configuration failed validation */
export class ConfigError extends ReportError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid report configuration: ${problems.join("; ")}`);
    this.problems = problems;
  }
}
