/**
 * @fileoverview Address book error classes
 *
 * Every failure the command pipeline can produce is an AddressBookError.
 * The subclasses mirror the error taxonomy the presentation layer relies on:
 * validation, parse, command, not-found and storage failures. All of them are
 * recoverable at the boundary: the message is shown to the user and the
 * session continues.
 */

import { AddressBookErrorCode, ErrorCategory, getErrorCategory } from './codes';

/**
 * Structured context information for debugging and logging
 */
export interface ErrorContext {
  /** Operation being performed when error occurred */
  operation?: string;
  /** Raw command text, when the error came out of the command pipeline */
  commandText?: string;
  /** Additional contextual data */
  metadata?: Record<string, unknown>;
}

export interface AddressBookErrorOptions {
  /** Field or prefix the error refers to */
  field?: string;
  cause?: Error;
  context?: ErrorContext;
}

/**
 * Base error for all address book failures
 */
export class AddressBookError extends Error {
  public readonly name: string = 'AddressBookError';
  public readonly code: AddressBookErrorCode;
  public readonly category: ErrorCategory;
  public readonly details: string;
  public readonly field?: string;
  public readonly context?: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    code: AddressBookErrorCode,
    details: string,
    options: AddressBookErrorOptions = {}
  ) {
    super(details);

    this.code = code;
    this.category = getErrorCategory(code);
    this.details = details;
    this.field = options.field;
    this.context = options.context;
    this.timestamp = new Date();

    if (options.cause) {
      this.cause = options.cause;
    }

    // Maintain prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Check if this error is in a specific category
   */
  isCategory(category: ErrorCategory): boolean {
    return this.category === category;
  }

  /**
   * Serialize error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      field: this.field,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause instanceof Error ? {
        name: this.cause.name,
        message: this.cause.message,
      } : undefined,
    };
  }

  /**
   * Get a developer-friendly error description
   */
  getDescription(): string {
    let description = `[${this.code}] ${this.category}: ${this.message}`;

    if (this.field) {
      description += ` | Field: ${this.field}`;
    }

    if (this.context?.operation) {
      description += ` | Operation: ${this.context.operation}`;
    }

    return description;
  }
}

/** Malformed value object input */
export class ValidationError extends AddressBookError {
  public readonly name: string = 'ValidationError';
}

/** Command text that cannot be turned into a command */
export class ParseError extends AddressBookError {
  public readonly name: string = 'ParseError';
}

/** Valid syntax that cannot be applied to the current state */
export class CommandError extends AddressBookError {
  public readonly name: string = 'CommandError';
}

/** A referenced record or tag is absent */
export class NotFoundError extends AddressBookError {
  public readonly name: string = 'NotFoundError';
}

/** Snapshot load/save failures */
export class StorageError extends AddressBookError {
  public readonly name: string = 'StorageError';
}

/**
 * Helper function to wrap an existing error as an AddressBookError
 */
export function wrapError(
  cause: unknown,
  code: AddressBookErrorCode,
  details?: string,
  context?: ErrorContext
): AddressBookError {
  if (cause instanceof AddressBookError) {
    return cause;
  }
  const error = cause instanceof Error ? cause : new Error(String(cause));
  return new AddressBookError(code, details ?? error.message, { cause: error, context });
}

/**
 * Type guard to check if an error is an AddressBookError
 */
export function isAddressBookError(error: unknown): error is AddressBookError {
  return error instanceof AddressBookError;
}

/**
 * Message shown to the user for any thrown value
 */
export function toFeedback(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
