/**
 * Core interfaces for the file batch utilities
 */

export * from "./ILogger";
export * from "./ISecurityManager";
export * from "./IFileCopier";
export * from "./ISequentialRenamer";
export * from "./IFileLister";
