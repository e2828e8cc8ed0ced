#!/usr/bin/env node

/**
 * CLI entry point for the file batch MCP server
 */

import { startFileBatchServer } from "./index";

async function main(): Promise<void> {
  try {
    await startFileBatchServer();
  } catch (error) {
    console.error("Failed to start file batch server:", error);
    process.exit(1);
  }
}

process.on("unhandledRejection", (reason) => {
  console.error("[file-batch-utils] Unhandled promise rejection:", reason);
});

void main();
