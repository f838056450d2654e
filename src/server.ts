import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { randomUUID } from "crypto";
import { fileURLToPath } from "url";

import { ConfigError, loadConfig } from "./config.js";
import { createGitHubLanguageFetcher } from "./services/github.js";
import { createVerifyRouter, verificationErrorHandler } from "./routes/verify.js";
import { createGithubTools } from "./tools/github.js";
import type { McpTool, Session } from "./types/index.js";
import type { LanguageFetcher } from "./types/github.js";

export const SERVER_NAME = "repo-lang-verifier";
export const SERVER_VERSION = "1.0.0";

const SESSION_IDLE_MS = 30 * 60 * 1000;

// Factory function to create a configured MCP server
export function createMcpServer(tools: McpTool[]): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Register all tools
  for (const tool of tools) {
    server.registerTool(
      tool.name,
      {
        description: tool.description,
        inputSchema: tool.inputSchema,
      },
      tool.handler as Parameters<typeof server.registerTool>[2]
    );
  }

  return server;
}

export interface AppDependencies {
  fetcher: LanguageFetcher;
  sessions?: Map<string, Session>;
}

// Setup Express app with the verification routes and the MCP HTTP transport
export function createApp({ fetcher, sessions = new Map() }: AppDependencies): Express {
  const tools = createGithubTools(fetcher);
  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.get("/", (_req: Request, res: Response) => {
    res.json({ message: "GitHub Repository Analyzer API" });
  });

  // Health check endpoint
  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      server: SERVER_NAME,
      version: SERVER_VERSION,
      tools: tools.map((t) => t.name),
    });
  });

  app.use(createVerifyRouter(fetcher));

  // MCP endpoint - handles POST requests
  app.post("/mcp", async (req: Request, res: Response, next: NextFunction) => {
    const sessionId = req.header("mcp-session-id");

    // Check if we have an existing session
    const session = sessionId ? sessions.get(sessionId) : undefined;

    // Create new server and transport for new sessions
    const server = session ? session.server : createMcpServer(tools);
    const transport =
      session?.transport ??
      new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        enableJsonResponse: true,
      });

    try {
      if (!session) await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      next(error);
      return;
    }

    if (session) return;

    // Store the session by its ID for future requests
    const newSessionId = transport.sessionId;
    if (newSessionId) {
      sessions.set(newSessionId, { server, transport });

      // Close the session after 30 minutes
      setTimeout(() => {
        const existingSession = sessions.get(newSessionId);
        if (existingSession) {
          sessions.delete(newSessionId);
          existingSession.transport.close().catch((error: unknown) => {
            console.error(`Failed to close MCP session ${newSessionId}:`, error);
          });
        }
      }, SESSION_IDLE_MS).unref();
    }
  });

  // Handle GET requests for SSE streams
  app.get("/mcp", async (req: Request, res: Response, next: NextFunction) => {
    const sessionId = req.header("mcp-session-id");
    const session = sessionId ? sessions.get(sessionId) : undefined;

    if (!session) {
      res.status(400).json({ error: "Invalid or missing session ID" });
      return;
    }

    try {
      await session.transport.handleRequest(req, res);
    } catch (error) {
      next(error);
    }
  });

  // Handle DELETE for session cleanup
  app.delete("/mcp", async (req: Request, res: Response, next: NextFunction) => {
    const sessionId = req.header("mcp-session-id");
    const session = sessionId ? sessions.get(sessionId) : undefined;

    if (sessionId && session) {
      sessions.delete(sessionId);
      try {
        await session.transport.close();
      } catch (error) {
        next(error);
        return;
      }
    }

    res.status(204).end();
  });

  app.use(verificationErrorHandler);

  return app;
}

// Only start server when running directly (not when imported for testing)
const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
  try {
    const config = loadConfig();
    const app = createApp({ fetcher: createGitHubLanguageFetcher(config) });

    app.listen(config.port, () => {
      console.log(`🚀 ${SERVER_NAME} running on http://localhost:${config.port}`);
      console.log(`🔎 Verify: POST http://localhost:${config.port}/verify`);
      console.log(`🔧 MCP endpoint: http://localhost:${config.port}/mcp`);
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}
