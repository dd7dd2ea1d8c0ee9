/**
 * Error types thrown by the runtime.
 *
 * Recoverable navigation failures (no path, stale handles, off-map targets) are
 * never thrown: they show up as return values and state transitions. Only
 * programming and data errors end up here.
 */

export class NavError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised when a component access would mix exclusive and shared borrows. */
export class BorrowConflictError extends NavError {
  readonly componentKey: string;

  constructor(componentKey: string, detail: string) {
    super(`Borrow conflict on "${componentKey}": ${detail}`);
    this.componentKey = componentKey;
  }
}

export class LevelFormatError extends NavError {}

export class ConfigError extends NavError {
  readonly field: string;

  constructor(field: string, detail: string) {
    super(`Invalid config "${field}": ${detail}`);
    this.field = field;
  }
}
