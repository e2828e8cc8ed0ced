/**
 * Core library exports
 */

export * from "./CaseInsensitiveString";
export * from "./Logger";
export * from "./FileCopier";
export * from "./SequentialRenamer";
export * from "./FileLister";
export * from "./SecurityManager";
export * from "./ConfigLoader";
export * from "./ErrorHandler";
export * from "./MCPTools";
export * from "./MCPServer";
