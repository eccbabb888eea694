/**
 * Custom error classes for DIDL-Lite parsing and serialization
 * Strict failures are thrown synchronously with enough context to log a diagnosable error
 */

/**
 * Base error class for all DIDL-related errors
 */
export class DidlError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'DidlError';
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DidlError);
    }
  }
}

/**
 * Error thrown when a document is structurally not acceptable DIDL-Lite
 * (wrong root element, illegal child element)
 */
export class DidlMetadataError extends DidlError {
  constructor(message: string) {
    super(message, 'DIDL_METADATA');
    this.name = 'DidlMetadataError';
  }
}

/**
 * Error thrown when a schema-mandatory attribute or child element is missing
 */
export class MissingRequiredFieldError extends DidlError {
  constructor(
    public readonly field: string,
    public readonly className: string
  ) {
    super(`Missing required field '${field}' for ${className}`, 'MISSING_REQUIRED_FIELD');
    this.name = 'MissingRequiredFieldError';
  }
}

/**
 * Error thrown when a mandatory XML attribute is absent or empty
 */
export class MissingRequiredAttributeError extends DidlError {
  constructor(
    public readonly attribute: string,
    public readonly element: string
  ) {
    super(`Missing required attribute '${attribute}' on <${element}>`, 'MISSING_REQUIRED_ATTRIBUTE');
    this.name = 'MissingRequiredAttributeError';
  }
}

/**
 * Error thrown when class-name resolution exhausts the dotted fallback chain
 */
export class UnknownDidlClassError extends DidlError {
  constructor(
    public readonly upnpClass: string,
    public readonly candidates: readonly string[] = []
  ) {
    super(
      candidates.length > 0
        ? `Unknown UPnP class '${upnpClass}' (tried ${candidates.join(', ')})`
        : `Unknown UPnP class '${upnpClass}'`,
      'UNKNOWN_DIDL_CLASS'
    );
    this.name = 'UnknownDidlClassError';
  }
}

/**
 * Error thrown when input is not well-formed XML
 */
export class MalformedXmlError extends DidlError {
  constructor(public readonly detail: string) {
    super(`Malformed XML: ${detail}`, 'MALFORMED_XML');
    this.name = 'MalformedXmlError';
  }
}

/**
 * Type guard to check if an error is a DidlError
 */
export function isDidlError(error: unknown): error is DidlError {
  return error instanceof DidlError;
}

/**
 * Type guard to check if an error is an UnknownDidlClassError
 */
export function isUnknownDidlClassError(error: unknown): error is UnknownDidlClassError {
  return error instanceof UnknownDidlClassError;
}

/**
 * Type guard to check if an error is a MalformedXmlError
 */
export function isMalformedXmlError(error: unknown): error is MalformedXmlError {
  return error instanceof MalformedXmlError;
}
