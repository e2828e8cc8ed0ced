/**
 * Security manager interface for tool calls
 */

export type PathOperation = "read" | "write";

/**
 * Workspace policy applied to every path a tool receives
 */
export interface SecurityConfig {
  /** Workspace root - all tool paths are confined to this directory */
  workspaceRoot: string;

  /** Paths inside the workspace that are blocked (e.g. .git, node_modules) */
  blockedPaths: string[];

  /** Reject every write (copy destination, rename, manifest output) */
  readOnly: boolean;

  /** Emit audit records for completed operations */
  enableAuditLog: boolean;
}

export interface ISecurityManager {
  /**
   * Resolve a path against the workspace root and validate it
   *
   * @param filePath - Path as received by a tool, relative or absolute
   * @param operation - Whether the path is read or written
   * @returns The resolved absolute path
   * @throws SecurityError if the path leaves the workspace, is blocked, or is
   *   written while the workspace is read-only
   */
  validatePath(filePath: string, operation: PathOperation): string;

  /**
   * Record a completed operation in the audit log
   */
  auditOperation(operation: string, paths: string[], result: string): void;

  getWorkspaceRoot(): string;
}
