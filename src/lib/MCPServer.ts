/**
 * MCP Server exposing the file batch utilities over stdio
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { FileBatchConfig } from "./ConfigLoader";
import { SecurityManager } from "./SecurityManager";
import { FileCopier } from "./FileCopier";
import { SequentialRenamer } from "./SequentialRenamer";
import { FileLister } from "./FileLister";
import { MCPTools } from "./MCPTools";
import { ErrorHandler } from "./ErrorHandler";
import { StderrLogger } from "./Logger";

export const SERVER_NAME = "file-batch-utils";
export const SERVER_VERSION = "0.1.0";

export class MCPServer {
  private server: Server;
  private transport: StdioServerTransport;
  private logger: StderrLogger;
  private mcpTools: MCPTools;
  private isRunning: boolean = false;

  constructor(config: FileBatchConfig) {
    this.logger = new StderrLogger(config.logLevel, "MCPServer");

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    const securityManager = new SecurityManager(
      config,
      this.logger.child("SecurityManager")
    );
    this.mcpTools = new MCPTools(
      securityManager,
      new FileCopier({
        logger: this.logger.child("FileCopier"),
        maxCollisionAttempts: config.maxCollisionAttempts,
      }),
      new SequentialRenamer(this.logger.child("SequentialRenamer")),
      new FileLister(this.logger.child("FileLister"))
    );

    this.transport = new StdioServerTransport();

    this.server.onerror = (error) => {
      ErrorHandler.logError(this.logger, error, { source: "server" });
    };

    process.on("SIGINT", () => {
      this.logger.info("Received SIGINT, shutting down...");
      this.stop().catch((error) => ErrorHandler.logError(this.logger, error));
    });
    process.on("SIGTERM", () => {
      this.logger.info("Received SIGTERM, shutting down...");
      this.stop().catch((error) => ErrorHandler.logError(this.logger, error));
    });
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error("Server is already running");
    }

    this.logger.info(`Starting ${SERVER_NAME} v${SERVER_VERSION}`);

    try {
      this.registerHandlers();
      this.logger.info(
        `Registered ${MCPTools.getAllSchemas().length} MCP tools`
      );

      await this.server.connect(this.transport);
      this.logger.info("Connected stdio transport");

      this.isRunning = true;
      this.logger.info("Server started and ready to accept requests");
    } catch (error) {
      ErrorHandler.logError(this.logger, error, { phase: "start" });
      throw error;
    }
  }

  /**
   * Register MCP protocol handlers
   */
  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: MCPTools.getToolDefinitions(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      try {
        const result = await this.mcpTools.callTool(name, args);

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(result, null, 2),
            },
          ],
        };
      } catch (error) {
        ErrorHandler.logError(this.logger, error, { tool: name });
        const errorResponse = ErrorHandler.toMCPError(error);

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(errorResponse, null, 2),
            },
          ],
          isError: true,
        };
      }
    });
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      this.logger.info("Server is not running, skipping shutdown");
      return;
    }

    this.logger.info("Shutting down gracefully...");
    this.isRunning = false;

    try {
      await this.transport.close();
      await this.server.close();
      this.logger.info("Shutdown complete");
    } catch (error) {
      ErrorHandler.logError(this.logger, error, { phase: "shutdown" });
    } finally {
      process.exit(0);
    }
  }

  getServer(): Server {
    return this.server;
  }

  isServerRunning(): boolean {
    return this.isRunning;
  }
}
