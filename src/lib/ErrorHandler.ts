/**
 * Error handler for the MCP tool surface
 * Provides structured error responses with specific error codes
 */

import {
  SecurityError,
  ValidationError,
  FileSystemError,
  UnsupportedModeError,
  DestinationNameExhaustedError,
  MCPErrorResponse,
} from "../types";
import { ILogger } from "../interfaces/ILogger";

/**
 * Error codes for different error types
 */
export enum ErrorCode {
  // Security errors
  SECURITY_ERROR = "SECURITY_ERROR",
  WORKSPACE_BOUNDARY_VIOLATION = "WORKSPACE_BOUNDARY_VIOLATION",
  BLOCKED_PATH = "BLOCKED_PATH",
  READ_ONLY_MODE = "READ_ONLY_MODE",

  // Validation errors
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
  UNSUPPORTED_MODE = "UNSUPPORTED_MODE",
  UNKNOWN_TOOL = "UNKNOWN_TOOL",

  // Filesystem errors
  FILESYSTEM_ERROR = "FILESYSTEM_ERROR",
  FILE_NOT_FOUND = "FILE_NOT_FOUND",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  FILE_EXISTS = "FILE_EXISTS",
  DISK_FULL = "DISK_FULL",
  INVALID_OPERATION = "INVALID_OPERATION",
  DESTINATION_NAME_EXHAUSTED = "DESTINATION_NAME_EXHAUSTED",

  // Generic errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * Converts errors to structured MCP error responses
 */
export class ErrorHandler {
  static toMCPError(error: unknown): MCPErrorResponse {
    if (!(error instanceof Error)) {
      return this.createErrorResponse(ErrorCode.INTERNAL_ERROR, String(error));
    }

    if (error instanceof SecurityError) {
      return this.handleSecurityError(error);
    }

    if (error instanceof ValidationError) {
      return this.handleValidationError(error);
    }

    if (error instanceof FileSystemError) {
      return this.handleFileSystemError(error);
    }

    // Node.js system errors
    if (this.isNodeError(error)) {
      return this.handleNodeError(error);
    }

    return {
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: error.message || "An unexpected error occurred",
        details: {
          name: error.name,
          stack:
            process.env["NODE_ENV"] === "development" ? error.stack : undefined,
        },
      },
    };
  }

  private static handleSecurityError(error: SecurityError): MCPErrorResponse {
    const message = error.message.toLowerCase();

    let code = ErrorCode.SECURITY_ERROR;
    let remediation = "Review the workspace policy";

    if (message.includes("outside workspace")) {
      code = ErrorCode.WORKSPACE_BOUNDARY_VIOLATION;
      remediation = "Ensure all paths are within the configured workspace root";
    } else if (message.includes("blocked")) {
      code = ErrorCode.BLOCKED_PATH;
      remediation = "This path is blocked by the security policy";
    } else if (message.includes("read-only")) {
      code = ErrorCode.READ_ONLY_MODE;
      remediation =
        "The workspace is in read-only mode. Copy, rename and list output are not allowed";
    }

    return {
      error: {
        code,
        message: error.message,
        details: {
          type: "security_violation",
          remediation,
        },
      },
    };
  }

  private static handleValidationError(
    error: ValidationError
  ): MCPErrorResponse {
    let code = ErrorCode.VALIDATION_ERROR;
    const details: Record<string, unknown> = {
      type: "validation_error",
      remediation: "Check the input parameters and try again",
    };

    if (error instanceof UnsupportedModeError) {
      code = ErrorCode.UNSUPPORTED_MODE;
      details["mode"] = error.mode;
      details["remediation"] = 'Use mode "simple" or "full"';
    } else if (error.message.toLowerCase().startsWith("unknown tool")) {
      code = ErrorCode.UNKNOWN_TOOL;
    } else if (error.message.toLowerCase().includes("argument")) {
      code = ErrorCode.INVALID_ARGUMENT;
    }

    return {
      error: {
        code,
        message: error.message,
        details,
      },
    };
  }

  private static handleFileSystemError(
    error: FileSystemError
  ): MCPErrorResponse {
    if (error instanceof DestinationNameExhaustedError) {
      return {
        error: {
          code: ErrorCode.DESTINATION_NAME_EXHAUSTED,
          message: error.message,
          details: {
            type: "filesystem_error",
            fileName: error.fileName,
            attempts: error.attempts,
            remediation:
              "Clear the destination directory or raise maxCollisionAttempts",
          },
        },
      };
    }

    return {
      error: {
        code: ErrorCode.FILESYSTEM_ERROR,
        message: error.message,
        details: {
          type: "filesystem_error",
          remediation: "Check the filesystem and try again",
        },
      },
    };
  }

  /**
   * Handle Node.js system errors (ENOENT, EACCES, etc.)
   */
  private static handleNodeError(
    error: NodeJS.ErrnoException
  ): MCPErrorResponse {
    let code = ErrorCode.FILESYSTEM_ERROR;
    let remediation = "Check the file path and permissions";

    switch (error.code) {
      case "ENOENT":
        code = ErrorCode.FILE_NOT_FOUND;
        remediation = "The specified file or directory does not exist";
        break;
      case "EACCES":
      case "EPERM":
        code = ErrorCode.PERMISSION_DENIED;
        remediation =
          "Insufficient permissions to access the file or directory";
        break;
      case "EEXIST":
        code = ErrorCode.FILE_EXISTS;
        remediation = "The destination appeared while the copy was running";
        break;
      case "ENOSPC":
        code = ErrorCode.DISK_FULL;
        remediation = "No space left on device";
        break;
      case "EISDIR":
        code = ErrorCode.INVALID_OPERATION;
        remediation = "Cannot perform this operation on a directory";
        break;
      case "ENOTDIR":
        code = ErrorCode.INVALID_OPERATION;
        remediation = "Not a directory";
        break;
    }

    return {
      error: {
        code,
        message: error.message,
        details: {
          type: "filesystem_error",
          errno: error.errno,
          syscall: error.syscall,
          path: error.path,
          remediation,
        },
      },
    };
  }

  private static isNodeError(error: Error): error is NodeJS.ErrnoException {
    return (
      "code" in error &&
      typeof error.code === "string" &&
      error.code.startsWith("E")
    );
  }

  static createErrorResponse(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>
  ): MCPErrorResponse {
    return {
      error: {
        code,
        message,
        details,
      },
    };
  }

  /**
   * Log error for debugging
   */
  static logError(
    logger: ILogger,
    error: unknown,
    context?: Record<string, unknown>
  ): void {
    if (error instanceof Error) {
      logger.error(error.message, {
        name: error.name,
        stack: error.stack,
        ...context,
      });
    } else {
      logger.error(String(error), context);
    }
  }
}
