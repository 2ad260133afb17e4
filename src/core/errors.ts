/**
 * Error taxonomy for qwatch
 *
 * SubprocessError and ParseError abort a single refresh cycle.
 * FormatError degrades one table cell. LookupError means a field path
 * that the record does not have.
 */

export class QwatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The status command could not be started or exited abnormally */
export class SubprocessError extends QwatchError {
  readonly command: string;

  constructor(command: string, message: string, options?: { cause?: unknown }) {
    super(`${command}: ${message}`, options);
    this.command = command;
  }
}

/** The status command printed a document that is not well-formed XML */
export class ParseError extends QwatchError {}

/** A field value does not follow its expected textual convention */
export class FormatError extends QwatchError {
  readonly value: string;

  constructor(value: string, message: string) {
    super(message);
    this.value = value;
  }
}

/** A dotted field path does not resolve to a leaf value */
export class LookupError extends QwatchError {
  readonly path: string;

  constructor(path: string, message = `No field '${path}' in job record`) {
    super(message);
    this.path = path;
  }
}

/**
 * Human-readable message for any thrown value
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
