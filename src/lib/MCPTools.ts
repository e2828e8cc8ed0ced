/**
 * MCP tool definitions for the file batch utilities
 *
 * Provides 3 MCP tools:
 * 1. fs_copy_recursively - Copy matching files from a tree into one directory
 * 2. fs_rename_sequential - Rename the files of a directory to stem_NNNNN.ext
 * 3. fs_list_files - Write a delimited manifest of the files of a directory
 */

import { z } from "zod";
import { SecurityManager } from "./SecurityManager";
import { FileCopier } from "./FileCopier";
import { SequentialRenamer, DEFAULT_PADDING } from "./SequentialRenamer";
import { FileLister, DEFAULT_MANIFEST_PATH } from "./FileLister";
import { CopiedFile } from "../interfaces/IFileCopier";
import { RenamedFile } from "../interfaces/ISequentialRenamer";
import { ValidationError } from "../types";

const CopyRecursivelyArgs = z.object({
  source: z.string().min(1).describe("Source directory to walk recursively"),
  destination: z
    .string()
    .min(1)
    .describe("Existing directory receiving the flattened files"),
  extension: z
    .string()
    .optional()
    .describe("Extension to copy, without the dot (default: every file)"),
  preserveMetadata: z
    .boolean()
    .optional()
    .describe("Copy access and modification times (default: false)"),
});

const RenameSequentialArgs = z.object({
  path: z.string().min(1).describe("Directory whose files are renamed"),
  stem: z.string().min(1).describe("Name stem of the new file names"),
  padding: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_PADDING)
    .describe("Zero padding width of the sequence number (default: 5)"),
  startNumber: z
    .number()
    .int()
    .default(0)
    .describe("First sequence number (default: 0)"),
});

const ListFilesArgs = z.object({
  path: z.string().min(1).describe("Directory to list"),
  mode: z
    .string()
    .default("simple")
    .describe('Manifest format: "simple" or "full" (default: simple)'),
  output: z
    .string()
    .min(1)
    .default(DEFAULT_MANIFEST_PATH)
    .describe("Manifest file to write (default: files_list.csv)"),
  separator: z.string().default(",").describe('Field separator (default: ",")'),
});

export type CopyRecursivelyToolArgs = z.infer<typeof CopyRecursivelyArgs>;
export type RenameSequentialToolArgs = z.infer<typeof RenameSequentialArgs>;
export type ListFilesToolArgs = z.infer<typeof ListFilesArgs>;

export interface ToolSchema {
  name: string;
  description: string;
  inputSchema: z.AnyZodObject;
}

export interface JsonSchemaProperty {
  type: string;
  description?: string;
  enum?: string[];
  items?: JsonSchemaProperty;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

/**
 * Parse raw tool arguments, turning zod issues into a ValidationError
 */
export function parseToolArgs<T extends z.ZodTypeAny>(
  schema: T,
  args: unknown
): z.infer<T> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid tool argument - ${issues}`);
  }
  return result.data;
}

/**
 * Describe a zod field as JSON Schema. Covers the field types the tools use.
 */
export function toJsonSchemaProperty(schema: z.ZodTypeAny): JsonSchemaProperty {
  const description = schema.description;
  let inner: z.ZodTypeAny = schema;
  while (inner instanceof z.ZodOptional || inner instanceof z.ZodDefault) {
    inner =
      inner instanceof z.ZodOptional ? inner.unwrap() : inner.removeDefault();
  }

  let property: JsonSchemaProperty;
  if (inner instanceof z.ZodNumber) {
    property = { type: inner.isInt ? "integer" : "number" };
  } else if (inner instanceof z.ZodBoolean) {
    property = { type: "boolean" };
  } else if (inner instanceof z.ZodEnum) {
    property = { type: "string", enum: [...inner.options] };
  } else if (inner instanceof z.ZodArray) {
    property = { type: "array", items: toJsonSchemaProperty(inner.element) };
  } else {
    property = { type: "string" };
  }

  if (description !== undefined) {
    property.description = description;
  }
  return property;
}

/**
 * MCP Tools class
 * Provides all tool implementations for the file batch server
 */
export class MCPTools {
  private securityManager: SecurityManager;
  private fileCopier: FileCopier;
  private sequentialRenamer: SequentialRenamer;
  private fileLister: FileLister;

  constructor(
    securityManager: SecurityManager,
    fileCopier: FileCopier,
    sequentialRenamer: SequentialRenamer,
    fileLister: FileLister
  ) {
    this.securityManager = securityManager;
    this.fileCopier = fileCopier;
    this.sequentialRenamer = sequentialRenamer;
    this.fileLister = fileLister;
  }

  /**
   * Dispatch a tool call by name with unvalidated arguments
   */
  async callTool(name: string, args: unknown): Promise<object> {
    switch (name) {
      case "fs_copy_recursively":
        return this.fsCopyRecursively(
          parseToolArgs(CopyRecursivelyArgs, args)
        );

      case "fs_rename_sequential":
        return this.fsRenameSequential(
          parseToolArgs(RenameSequentialArgs, args)
        );

      case "fs_list_files":
        return this.fsListFiles(parseToolArgs(ListFilesArgs, args));

      default:
        throw new ValidationError(`Unknown tool: ${name}`);
    }
  }

  /**
   * Tool 1: fs_copy_recursively
   */
  async fsCopyRecursively(args: CopyRecursivelyToolArgs): Promise<{
    status: string;
    source: string;
    destination: string;
    filesCopied: number;
    bytesTransferred: number;
    duration: number;
    copied: CopiedFile[];
  }> {
    const validSource = this.securityManager.validatePath(args.source, "read");
    const validDestination = this.securityManager.validatePath(
      args.destination,
      "write"
    );

    const result = await this.fileCopier.copyRecursively(
      validSource,
      validDestination,
      args.extension,
      { preserveMetadata: args.preserveMetadata }
    );

    this.securityManager.auditOperation(
      "copy_recursively",
      [validSource, validDestination],
      `success: ${result.filesCopied} files, ${result.bytesTransferred} bytes, ${result.duration}ms`
    );

    return {
      status: "success",
      source: validSource,
      destination: validDestination,
      filesCopied: result.filesCopied,
      bytesTransferred: result.bytesTransferred,
      duration: result.duration,
      copied: result.copied,
    };
  }

  static getFsCopyRecursivelySchema(): ToolSchema {
    return {
      name: "fs_copy_recursively",
      description:
        "Copy files with a given extension from a directory tree into one flat directory, numbering names that collide",
      inputSchema: CopyRecursivelyArgs,
    };
  }

  /**
   * Tool 2: fs_rename_sequential
   */
  async fsRenameSequential(args: RenameSequentialToolArgs): Promise<{
    status: string;
    path: string;
    filesRenamed: number;
    renamed: RenamedFile[];
  }> {
    const validPath = this.securityManager.validatePath(args.path, "write");

    const result = await this.sequentialRenamer.renameSequential(
      validPath,
      args.stem,
      args.padding,
      args.startNumber
    );

    this.securityManager.auditOperation(
      "rename_sequential",
      [validPath],
      `success: ${result.filesRenamed} files`
    );

    return {
      status: "success",
      path: validPath,
      filesRenamed: result.filesRenamed,
      renamed: result.renamed,
    };
  }

  static getFsRenameSequentialSchema(): ToolSchema {
    return {
      name: "fs_rename_sequential",
      description:
        "Rename the files directly inside a directory to stem_NNNNN.ext in directory order",
      inputSchema: RenameSequentialArgs,
    };
  }

  /**
   * Tool 3: fs_list_files
   */
  async fsListFiles(args: ListFilesToolArgs): Promise<{
    status: string;
    path: string;
    output: string;
    filesListed: number;
  }> {
    const validPath = this.securityManager.validatePath(args.path, "read");
    const validOutput = this.securityManager.validatePath(args.output, "write");

    const result = await this.fileLister.listFiles(
      validPath,
      args.mode,
      validOutput,
      args.separator
    );

    this.securityManager.auditOperation(
      "list_files",
      [validPath, validOutput],
      `success: ${result.filesListed} files`
    );

    return {
      status: "success",
      path: validPath,
      output: result.outputPath,
      filesListed: result.filesListed,
    };
  }

  static getFsListFilesSchema(): ToolSchema {
    return {
      name: "fs_list_files",
      description:
        "Write a delimited list of the files directly inside a directory (simple: names, full: location, name, size, mtime)",
      inputSchema: ListFilesArgs,
    };
  }

  static getAllSchemas(): ToolSchema[] {
    return [
      MCPTools.getFsCopyRecursivelySchema(),
      MCPTools.getFsRenameSequentialSchema(),
      MCPTools.getFsListFilesSchema(),
    ];
  }

  /**
   * Tool list in the shape of an MCP tools/list response
   */
  static getToolDefinitions(): ToolDefinition[] {
    return MCPTools.getAllSchemas().map((schema) => {
      const properties: Record<string, JsonSchemaProperty> = {};
      const required: string[] = [];

      const shape: z.ZodRawShape = schema.inputSchema.shape;

      for (const [key, value] of Object.entries(shape)) {
        properties[key] = toJsonSchemaProperty(value);
        if (!value.isOptional()) {
          required.push(key);
        }
      }

      return {
        name: schema.name,
        description: schema.description,
        inputSchema: { type: "object", properties, required },
      };
    });
  }
}
