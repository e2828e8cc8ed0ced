/**
 * Common types for the file batch utilities
 *
 * This module defines the error types and the response structures used by the
 * core operations and the MCP tool surface.
 */

/**
 * Security error - thrown when a tool call violates the workspace policy
 *
 * Common causes:
 * - Path outside the configured workspace root
 * - Path under a blocked directory
 * - Write operation while the server runs read-only
 *
 * @example
 * ```typescript
 * throw new SecurityError("Path traversal detected - path outside workspace");
 * ```
 */
export class SecurityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SecurityError";
  }
}

/**
 * Validation error - thrown when input validation fails
 *
 * Validation errors indicate invalid parameters and are fixed by correcting
 * the input, e.g. an empty rename stem or a negative padding width.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Thrown by the manifest writer for a mode other than "simple" or "full".
 */
export class UnsupportedModeError extends ValidationError {
  readonly mode: string;

  constructor(mode: string) {
    super(`Unsupported manifest mode: ${mode}. Must be simple or full`);
    this.name = "UnsupportedModeError";
    this.mode = mode;
  }
}

/**
 * Filesystem error - thrown when a filesystem operation cannot be completed
 *
 * Errors raised by Node itself (ENOENT, EACCES, ...) are not wrapped; this
 * class covers the failures the utilities detect on their own.
 */
export class FileSystemError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FileSystemError";
  }
}

/**
 * Thrown when the collision probe of the recursive copy runs out of attempts
 * without finding a free destination name.
 */
export class DestinationNameExhaustedError extends FileSystemError {
  readonly fileName: string;
  readonly attempts: number;

  constructor(fileName: string, attempts: number) {
    super(
      `Could not resolve destination name for ${fileName} after ${attempts} attempts`
    );
    this.name = "DestinationNameExhaustedError";
    this.fileName = fileName;
    this.attempts = attempts;
  }
}

/**
 * MCP error response structure
 *
 * @example
 * ```json
 * {
 *   "error": {
 *     "code": "UNSUPPORTED_MODE",
 *     "message": "Unsupported manifest mode: wide. Must be simple or full",
 *     "details": { "type": "validation_error" }
 *   }
 * }
 * ```
 */
export interface MCPErrorResponse {
  error: {
    /** Error code (e.g., "FILE_NOT_FOUND", "UNSUPPORTED_MODE") */
    code: string;
    /** Human-readable error message */
    message: string;
    /** Optional additional error details */
    details?: Record<string, unknown>;
  };
}
