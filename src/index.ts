/**
 * File batch utilities
 *
 * Flat recursive copy with collision-free names, sequential renaming and
 * directory manifests, usable as a library or as an MCP server over stdio.
 */

export * from "./interfaces";
export * from "./lib";
export * from "./types";

import { MCPServer } from "./lib/MCPServer";
import { ConfigLoader } from "./lib/ConfigLoader";

/**
 * Create and start the MCP server
 */
export async function startFileBatchServer(): Promise<MCPServer> {
  const config = await ConfigLoader.loadConfig();
  const server = new MCPServer(config);
  await server.start();
  return server;
}
