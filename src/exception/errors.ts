export class AutomationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AutomationError';
  }
}

// Configuration errors: a defect in the screen map or call site, never retried.

export class ScreenMappingError extends AutomationError {
  constructor(message: string) {
    super(message);
    this.name = 'ScreenMappingError';
  }
}

export class ElementConfigurationError extends AutomationError {
  constructor(message: string) {
    super(message);
    this.name = 'ElementConfigurationError';
  }
}

export class ActionConfigurationError extends AutomationError {
  constructor(message: string) {
    super(message);
    this.name = 'ActionConfigurationError';
  }
}

export class TableConfigurationError extends AutomationError {
  constructor(message: string) {
    super(message);
    this.name = 'TableConfigurationError';
  }
}

// Domain errors: the host rejected a commit.

export class StatusBarError extends AutomationError {
  constructor(message: string) {
    super(message);
    this.name = 'StatusBarError';
  }
}

export class TableFillError extends AutomationError {
  constructor(message: string) {
    super(message);
    this.name = 'TableFillError';
  }
}

export class TransactionError extends AutomationError {
  constructor(message: string) {
    super(message);
    this.name = 'TransactionError';
  }
}

// UI errors raised while talking to a control.

export class ElementNotFoundError extends AutomationError {
  constructor(
    message: string,
    public elementId: string,
  ) {
    super(message);
    this.name = 'ElementNotFoundError';
  }
}

export class ElementNotChangeableError extends AutomationError {
  constructor(
    message: string,
    public elementId: string,
  ) {
    super(message);
    this.name = 'ElementNotChangeableError';
  }
}

export class ComboOptionNotFoundError extends AutomationError {
  constructor(
    message: string,
    public option: string,
  ) {
    super(message);
    this.name = 'ComboOptionNotFoundError';
  }
}

/** Builds the error raised when the status line reports a failure. */
export type ErrorFactory = (message: string) => Error;
