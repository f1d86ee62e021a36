/**
 * OpenStack Swift Error Types
 *
 * Error hierarchy for the Swift client. Every error raised by this package
 * extends {@link SwiftError}. Callers that only need to branch on an HTTP
 * status should use {@link isStatusCode}, which works structurally and does
 * not depend on the concrete error class.
 *
 * @module errors
 */

/**
 * Maximum number of response body characters kept in an error message.
 */
export const MAX_BODY_SNIPPET_LENGTH = 1024;

/**
 * Base Swift error class.
 */
export class SwiftError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SwiftError';
    this.code = code;
    Object.setPrototypeOf(this, SwiftError.prototype);
  }

  /**
   * HTTP status code if applicable.
   */
  get statusCode(): number | undefined {
    return undefined;
  }

  /**
   * Converts the error to a JSON representation.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Configuration error.
 */
export class ConfigurationError extends SwiftError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 'Configuration.Invalid');
    this.name = 'ConfigurationError';
    this.field = field;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Authentication error, raised when no token can be obtained.
 */
export class AuthenticationError extends SwiftError {
  private readonly _statusCode?: number;

  constructor(
    message: string,
    options?: { statusCode?: number; cause?: unknown }
  ) {
    super(message, 'Authentication.Failed', { cause: options?.cause });
    this.name = 'AuthenticationError';
    this._statusCode = options?.statusCode;
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }

  override get statusCode(): number | undefined {
    return this._statusCode;
  }
}

/**
 * Network/transport error.
 */
export class NetworkError extends SwiftError {
  constructor(
    message: string,
    code: 'ConnectionFailed' | 'Timeout' = 'ConnectionFailed',
    options?: { cause?: unknown }
  ) {
    super(message, `Network.${code}`, options);
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  static timeout(timeoutMs: number): NetworkError {
    return new NetworkError(`request timed out after ${timeoutMs}ms`, 'Timeout');
  }
}

/**
 * Raised before sending a request whose container or object name cannot be
 * expressed as a URL path.
 */
export class InvalidNameError extends SwiftError {
  public readonly resourceName: string;

  constructor(kind: 'container' | 'object', resourceName: string, reason: string) {
    super(`invalid ${kind} name ${JSON.stringify(resourceName)}: ${reason}`, 'Request.InvalidName');
    this.name = 'InvalidNameError';
    this.resourceName = resourceName;
    Object.setPrototypeOf(this, InvalidNameError.prototype);
  }
}

/**
 * Raised when a response carries a status code outside the set the
 * operation accepts.
 */
export class UnexpectedStatusCodeError extends SwiftError {
  public readonly actualCode: number;
  public readonly expectedCodes: readonly number[];
  public readonly responseBody: string;

  constructor(actualCode: number, expectedCodes: readonly number[], responseBody = '') {
    const snippet = responseBody.length > MAX_BODY_SNIPPET_LENGTH
      ? responseBody.slice(0, MAX_BODY_SNIPPET_LENGTH)
      : responseBody;
    let message = `expected ${expectedCodes.join('/')} response, got ${actualCode} instead`;
    if (snippet !== '') {
      message += `: ${snippet}`;
    }
    super(message, `HTTP_${actualCode}`);
    this.name = 'UnexpectedStatusCodeError';
    this.actualCode = actualCode;
    this.expectedCodes = [...expectedCodes];
    this.responseBody = snippet;
    Object.setPrototypeOf(this, UnexpectedStatusCodeError.prototype);
  }

  override get statusCode(): number {
    return this.actualCode;
  }
}

/**
 * Raised by header validation when a numeric or timestamp header cannot be
 * parsed.
 */
export class MalformedHeaderError extends SwiftError {
  public readonly headerName: string;

  constructor(headerName: string, reason: string) {
    super(`Bad header ${headerName}: ${reason}`, 'Headers.Malformed');
    this.name = 'MalformedHeaderError';
    this.headerName = headerName;
    Object.setPrototypeOf(this, MalformedHeaderError.prototype);
  }
}

/**
 * Raised by an upload whose locally computed MD5 does not match the Etag
 * reported by the server. The object has been stored at that point.
 */
export class ChecksumMismatchError extends SwiftError {
  public readonly expectedEtag: string;
  public readonly actualEtag: string;

  constructor(expectedEtag: string, actualEtag: string) {
    super(
      `Etag on uploaded object does not match MD5 checksum of uploaded data (local ${expectedEtag}, server ${actualEtag || '<none>'})`,
      'Upload.ChecksumMismatch'
    );
    this.name = 'ChecksumMismatchError';
    this.expectedEtag = expectedEtag;
    this.actualEtag = actualEtag;
    Object.setPrototypeOf(this, ChecksumMismatchError.prototype);
  }
}

/**
 * Raised when a downloaded object's content is consumed a second time.
 */
export class DownloadConsumedError extends SwiftError {
  constructor(objectName: string) {
    super(`content of object ${objectName} has already been consumed`, 'Download.Consumed');
    this.name = 'DownloadConsumedError';
    Object.setPrototypeOf(this, DownloadConsumedError.prototype);
  }
}

/**
 * One failed item inside a bulk operation report.
 */
export interface BulkObjectError {
  /** Container of the failed item. */
  containerName: string;
  /** Object name, empty when the item is the container itself. */
  objectName: string;
  /** Status code reported for this item. */
  statusCode: number;
  /** Full status line reported for this item, e.g. "409 Conflict". */
  status: string;
}

/**
 * Composite error of a bulk delete or bulk upload. Items that succeeded are
 * still counted on the error.
 */
export class BulkError extends SwiftError {
  /** Overall status code of the bulk operation. */
  public readonly overallStatusCode: number;
  /** Overall status line, e.g. "400 Bad Request". */
  public readonly overallStatus: string;
  /** Overall error message reported by the server, may be empty. */
  public readonly overallError: string;
  /** Per-item failures in the order reported by the server. */
  public readonly objectErrors: readonly BulkObjectError[];
  public readonly numberDeleted?: number;
  public readonly numberNotFound?: number;
  public readonly numberFilesCreated?: number;

  constructor(params: {
    overallStatus: string;
    overallError: string;
    objectErrors: readonly BulkObjectError[];
    numberDeleted?: number;
    numberNotFound?: number;
    numberFilesCreated?: number;
    cause?: unknown;
  }) {
    const message = params.objectErrors.length === 0
      ? `${params.overallStatus}: ${params.overallError}`
      : `${params.overallStatus} (+${params.objectErrors.length} object errors)`;
    super(message, 'Bulk.Failed', { cause: params.cause });
    this.name = 'BulkError';
    this.overallStatus = params.overallStatus;
    this.overallStatusCode = parseStatusLine(params.overallStatus);
    this.overallError = params.overallError;
    this.objectErrors = [...params.objectErrors];
    this.numberDeleted = params.numberDeleted;
    this.numberNotFound = params.numberNotFound;
    this.numberFilesCreated = params.numberFilesCreated;
    Object.setPrototypeOf(this, BulkError.prototype);
  }

  override get statusCode(): number {
    return this.overallStatusCode;
  }
}

/**
 * Parses the numeric part of a status line such as "404 Not Found".
 * Returns 0 if the line does not start with a number.
 */
export function parseStatusLine(status: string): number {
  const match = /^\s*(\d{3})\b/.exec(status);
  return match?.[1] !== undefined ? parseInt(match[1], 10) : 0;
}

/**
 * Reports whether the given error carries the given HTTP status code.
 *
 * Works for any value with a numeric `statusCode` property, so callers can
 * test for e.g. 404 without depending on a concrete error class.
 */
export function isStatusCode(error: unknown, code: number): boolean {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) {
    return false;
  }
  return error.statusCode === code;
}

/**
 * Type guard for errors raised by this package.
 */
export function isSwiftError(error: unknown): error is SwiftError {
  return error instanceof SwiftError;
}
