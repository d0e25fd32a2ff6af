// src/core/errors/AutomationErrors.ts

export type ErrorDetails = Record<string, unknown>;

export class AutomationError extends Error {
  public readonly code: string;
  public readonly details: ErrorDetails;
  public readonly cause?: Error | undefined;

  constructor(message: string, code: string, details: ErrorDetails = {}, cause?: Error) {
    super(message);
    this.name = 'AutomationError';
    this.code = code;
    this.details = details;
    this.cause = cause;

    Object.setPrototypeOf(this, AutomationError.prototype);
  }
}

export class InvalidPageDefinitionError extends AutomationError {
  public readonly source: string;
  public readonly problems: string[];

  constructor(source: string, problems: string[]) {
    super(`Invalid page definition '${source}': ${problems.join('; ')}`, 'INVALID_PAGE_DEFINITION', { source, problems });
    this.name = 'InvalidPageDefinitionError';
    this.source = source;
    this.problems = problems;

    Object.setPrototypeOf(this, InvalidPageDefinitionError.prototype);
  }
}

export class ElementNotFoundError extends AutomationError {
  public readonly pageName: string;
  public readonly elementName: string;

  constructor(pageName: string, elementName: string, available: string[] = []) {
    super(`Element '${elementName}' is not defined on page '${pageName}'`, 'ELEMENT_NOT_FOUND', {
      pageName,
      elementName,
      available
    });
    this.name = 'ElementNotFoundError';
    this.pageName = pageName;
    this.elementName = elementName;

    Object.setPrototypeOf(this, ElementNotFoundError.prototype);
  }
}

export class ElementNotReadyError extends AutomationError {
  public readonly elementName: string;
  public readonly locator: string;
  public readonly waitType: string;
  public readonly timeoutMs: number;

  constructor(elementName: string, locator: string, waitType: string, timeoutMs: number) {
    super(
      `Element '${elementName}' (${locator}) was not ${waitType} within ${timeoutMs}ms`,
      'ELEMENT_NOT_READY',
      { elementName, locator, waitType, timeoutMs }
    );
    this.name = 'ElementNotReadyError';
    this.elementName = elementName;
    this.locator = locator;
    this.waitType = waitType;
    this.timeoutMs = timeoutMs;

    Object.setPrototypeOf(this, ElementNotReadyError.prototype);
  }
}

export class ActionFailedError extends AutomationError {
  public readonly elementName: string;
  public readonly action: string;

  constructor(elementName: string, action: string, locator: string, cause: unknown) {
    const causeError = toError(cause);
    super(
      `Action '${action}' failed on element '${elementName}' (${locator}): ${causeError.message}`,
      'ACTION_FAILED',
      { elementName, action, locator },
      causeError
    );
    this.name = 'ActionFailedError';
    this.elementName = elementName;
    this.action = action;

    Object.setPrototypeOf(this, ActionFailedError.prototype);
  }
}

export interface CandidateFailure {
  label: string;
  message: string;
}

export class AllCandidatesFailedError extends AutomationError {
  public readonly failures: CandidateFailure[];

  constructor(failures: CandidateFailure[], subject: string = 'operation') {
    const lines = failures.map((failure, index) => `  ${index + 1}. ${failure.label}: ${failure.message}`);
    super(
      `All ${failures.length} candidates failed for ${subject}:\n${lines.join('\n')}`,
      'ALL_CANDIDATES_FAILED',
      { subject, failures }
    );
    this.name = 'AllCandidatesFailedError';
    this.failures = failures;

    Object.setPrototypeOf(this, AllCandidatesFailedError.prototype);
  }
}

export class InvalidParameterError extends AutomationError {
  constructor(elementName: string, locator: string) {
    super(
      `Element '${elementName}' needs a non-empty parameter for locator '${locator}'`,
      'INVALID_PARAMETER',
      { elementName, locator }
    );
    this.name = 'InvalidParameterError';

    Object.setPrototypeOf(this, InvalidParameterError.prototype);
  }
}

export class IndexOutOfRangeError extends AutomationError {
  public readonly index: number;
  public readonly size: number;

  constructor(elementName: string, index: number, size: number) {
    super(
      `Index ${index} is out of range for collection '${elementName}' of size ${size}`,
      'INDEX_OUT_OF_RANGE',
      { elementName, index, size }
    );
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.size = size;

    Object.setPrototypeOf(this, IndexOutOfRangeError.prototype);
  }
}

export class StateMismatchError extends AutomationError {
  public readonly expected: boolean;
  public readonly actual: boolean;

  constructor(elementName: string, expected: boolean, actual: boolean) {
    super(
      `Checkbox '${elementName}' expected to be ${expected ? 'checked' : 'unchecked'} but was ${actual ? 'checked' : 'unchecked'}`,
      'STATE_MISMATCH',
      { elementName, expected, actual }
    );
    this.name = 'StateMismatchError';
    this.expected = expected;
    this.actual = actual;

    Object.setPrototypeOf(this, StateMismatchError.prototype);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
