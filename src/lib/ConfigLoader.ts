/**
 * Configuration loader for the file batch utilities
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ValidationError } from "../types";
import { DEFAULT_MAX_COLLISION_ATTEMPTS } from "./FileCopier";

export const ConfigSchema = z.object({
  workspaceRoot: z.string().min(1),
  blockedPaths: z.array(z.string()).default([".git", "node_modules"]),
  readOnly: z.boolean().default(false),
  enableAuditLog: z.boolean().default(true),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  maxCollisionAttempts: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_COLLISION_ATTEMPTS),
});

export type FileBatchConfig = z.infer<typeof ConfigSchema>;

export const CONFIG_FILE_NAME = "file-batch-config.json";

export class ConfigLoader {
  /**
   * Load configuration from file or environment
   */
  static async loadConfig(
    env: NodeJS.ProcessEnv = process.env
  ): Promise<FileBatchConfig> {
    const configPath =
      env["FILE_BATCH_CONFIG"] || path.join(process.cwd(), CONFIG_FILE_NAME);

    let raw: Record<string, unknown> = {};
    if (fs.existsSync(configPath)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(configPath, "utf-8"));
      if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new ValidationError(
          `Configuration file must contain a JSON object: ${configPath}`
        );
      }
      raw = Object.fromEntries(Object.entries(parsed));
    }

    // Environment wins over the file
    if (env["FILE_BATCH_WORKSPACE_ROOT"]) {
      raw["workspaceRoot"] = env["FILE_BATCH_WORKSPACE_ROOT"];
    }
    if (env["FILE_BATCH_LOG_LEVEL"]) {
      raw["logLevel"] = env["FILE_BATCH_LOG_LEVEL"];
    }
    if (raw["workspaceRoot"] === undefined) {
      raw["workspaceRoot"] = process.cwd();
    }

    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ValidationError(`Invalid configuration argument: ${issues}`);
    }

    return result.data;
  }
}
