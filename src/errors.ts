/**
 * Base class for every failure the CLI reports. `message` holds the cause,
 * `prefix` the stage label printed in front of it.
 */
export abstract class QueryJsonError extends Error {
  abstract readonly prefix: string;
  readonly exitCode = 1;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** The single stderr line, without the trailing newline. */
  report(): string {
    return `${this.prefix}: ${this.message}`;
  }
}

export class UsageError extends QueryJsonError {
  readonly prefix = 'Error';
}

export class InvalidQueryError extends QueryJsonError {
  readonly prefix = 'Error: Invalid JSONPath query';
}

export class FileOpenError extends QueryJsonError {
  readonly prefix = 'Error opening file';
}

export class FileReadError extends QueryJsonError {
  readonly prefix = 'Error reading file';
}

export class JsonParseError extends QueryJsonError {
  readonly prefix = 'Error parsing JSON';
}

export class QuerySyntaxError extends QueryJsonError {
  readonly prefix = 'Error parsing JSONPath';
}

export class FormatError extends QueryJsonError {
  readonly prefix = 'Error formatting output';
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
