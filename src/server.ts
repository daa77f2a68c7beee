import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { Request, Response } from "express";

import type { AppConfig } from "./config.js";
import { SnippetClient } from "./rpc/snippet-client.js";
import { ToolHandler, tools } from "./tool-handlers.js";
import { UiDevice } from "./ui/device.js";

const SERVER_NAME = "uiobject-rpc";
const SERVER_VERSION = "0.3.0";

/**
 * Build an MCP server exposing the UI object tools over `handler`
 */
export function createServer(handler: ToolHandler): Server {
  const server = new Server({ name: SERVER_NAME, version: SERVER_VERSION }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const result = await handler.handle(name, args ?? {});
      return {
        content: [{ type: "text", text: result.text }],
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error: ${message}` }],
        isError: true,
      };
    }
  });

  return server;
}

export class UiObjectMcpServer {
  private readonly client: SnippetClient;
  private readonly handler: ToolHandler;

  constructor(private config: AppConfig) {
    this.client = new SnippetClient({
      host: config.snippetHost,
      port: config.snippetPort,
      rpcTimeoutMs: config.rpcTimeoutMs,
    });
    this.handler = new ToolHandler(new UiDevice(this.client, { raiseOnMissing: config.raiseOnMissing }));
  }

  async run(): Promise<void> {
    await this.client.connect();

    if (this.config.transport === "http") {
      await this.runHttp();
    } else {
      await this.runStdio();
    }
  }

  private async runStdio(): Promise<void> {
    const server = createServer(this.handler);
    const transport = new StdioServerTransport();
    await server.connect(transport);

    console.error("UI object MCP server running on stdio");
    this.logStartup();

    const shutdown = async () => {
      await server.close();
      await this.client.close();
      process.exit(0);
    };
    process.on("SIGINT", () => void shutdown());
    process.on("SIGTERM", () => void shutdown());
  }

  private async runHttp(): Promise<void> {
    const express = (await import("express")).default;
    const { httpHost: host, httpPort: port } = this.config;

    const app = express();
    app.use(express.json());

    // Stateless mode: each request gets a fresh server + transport
    app.post("/mcp", async (req: Request, res: Response) => {
      const server = createServer(this.handler);

      try {
        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: undefined,
        });

        res.on("close", () => {
          void transport.close();
          void server.close();
        });

        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (error) {
        console.error(`HTTP request error: ${error instanceof Error ? error.message : String(error)}`);
        if (!res.headersSent) {
          res.status(500).json({
            jsonrpc: "2.0",
            error: { code: -32603, message: "Internal server error" },
            id: null,
          });
        }
      }
    });

    app.get("/mcp", (_req: Request, res: Response) => {
      res.status(405).json({
        jsonrpc: "2.0",
        error: { code: -32000, message: "Method not allowed. Use POST." },
        id: null,
      });
    });

    app.get("/health", (_req: Request, res: Response) => {
      res.json({
        status: "ok",
        server: SERVER_NAME,
        version: SERVER_VERSION,
        snippetConnected: this.client.isConnected(),
      });
    });

    const httpServer = app.listen(port, host, () => {
      console.error(`UI object MCP server running on http://${host}:${port}/mcp`);
      this.logStartup();
    });

    const shutdown = async () => {
      httpServer.close();
      await this.client.close();
      process.exit(0);
    };
    process.on("SIGINT", () => void shutdown());
    process.on("SIGTERM", () => void shutdown());
  }

  private logStartup(): void {
    console.error(`  Snippet server: ${this.config.snippetHost}:${this.config.snippetPort} (uid ${this.client.uid})`);
    console.error(`  RPC timeout: ${this.config.rpcTimeoutMs} ms`);
    console.error(`  Strict lookups: ${this.config.raiseOnMissing ? "ON" : "OFF"}`);
  }
}
