/**
 * Security manager implementation
 * Confines tool paths to the configured workspace
 */

import * as fs from "fs";
import * as path from "path";
import {
  ISecurityManager,
  SecurityConfig,
  PathOperation,
} from "../interfaces/ISecurityManager";
import { ILogger } from "../interfaces/ILogger";
import { SecurityError, FileSystemError } from "../types";
import { StderrLogger } from "./Logger";

export class SecurityManager implements ISecurityManager {
  private workspaceRoot: string;
  private blockedPaths: Set<string>;
  private config: SecurityConfig;
  private logger: ILogger;

  constructor(config: SecurityConfig, logger?: ILogger) {
    this.config = config;
    this.logger = logger ?? new StderrLogger("info", "SecurityManager");
    this.workspaceRoot = path.resolve(config.workspaceRoot);

    // Validate workspace root exists and is a directory
    if (!fs.existsSync(this.workspaceRoot)) {
      throw new SecurityError(
        `Workspace root does not exist: ${this.workspaceRoot}`
      );
    }

    const stats = fs.statSync(this.workspaceRoot);
    if (!stats.isDirectory()) {
      throw new SecurityError(
        `Workspace root is not a directory: ${this.workspaceRoot}`
      );
    }

    this.blockedPaths = new Set(
      config.blockedPaths.map((p) => path.resolve(this.workspaceRoot, p))
    );
  }

  validatePath(filePath: string, operation: PathOperation): string {
    const resolved = path.resolve(this.workspaceRoot, filePath);

    this.checkLocation(filePath, resolved);

    if (this.config.readOnly && operation === "write") {
      throw new SecurityError("Filesystem is in read-only mode");
    }

    // A symlink must not lead out of the workspace either
    this.checkLinkTargets(filePath, resolved);

    return resolved;
  }

  private checkLocation(input: string, resolved: string): void {
    // Workspace boundary
    if (
      !resolved.startsWith(this.workspaceRoot + path.sep) &&
      resolved !== this.workspaceRoot
    ) {
      this.auditSecurityViolation("workspace_escape", input, resolved);
      throw new SecurityError(
        "Path traversal detected - path outside workspace"
      );
    }

    for (const blocked of this.blockedPaths) {
      if (resolved === blocked || resolved.startsWith(blocked + path.sep)) {
        this.auditSecurityViolation("blocked_path", input, resolved);
        throw new SecurityError("Path is blocked by security policy");
      }
    }
  }

  /**
   * Follow a chain of links one hop at a time, checking every target
   */
  private checkLinkTargets(input: string, resolved: string): void {
    const visited = new Set<string>([resolved]);
    let current = resolved;
    let stats = fs.lstatSync(current, { throwIfNoEntry: false });

    while (stats && stats.isSymbolicLink()) {
      current = path.resolve(path.dirname(current), fs.readlinkSync(current));
      if (visited.has(current)) {
        throw new FileSystemError(`Symbolic link loop detected: ${input}`);
      }
      visited.add(current);

      this.checkLocation(input, current);
      stats = fs.lstatSync(current, { throwIfNoEntry: false });
    }
  }

  private auditSecurityViolation(
    type: string,
    input: string,
    resolved: string
  ): void {
    if (this.config.enableAuditLog) {
      this.logger.warn("Security violation", {
        type,
        input,
        resolved,
        workspaceRoot: this.workspaceRoot,
      });
    }
  }

  auditOperation(operation: string, paths: string[], result: string): void {
    if (this.config.enableAuditLog) {
      this.logger.info("Audit", { operation, paths, result });
    }
  }

  getWorkspaceRoot(): string {
    return this.workspaceRoot;
  }
}
