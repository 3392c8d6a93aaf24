// Interview Assistant Bot - Express Server
// Health check, plus the Telegram webhook endpoint when running in webhook mode.

import express, { type Express, type RequestHandler } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { createLogger, type Logger } from "./logger.js";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  /** Mounted with POST at `path` when given. */
  webhook?: { path: string; handler: RequestHandler };
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  /** Start listening on the given port (0 picks a free one). Resolves with the bound port. */
  listen(port: number): Promise<number>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app and HTTP server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions = {}): AppServer {
  const { logger = createLogger("Server"), webhook } = options;

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  if (webhook) {
    app.post(webhook.path, express.json(), webhook.handler);
    logger.info(`Webhook endpoint mounted at ${webhook.path}`);
  }

  return {
    app,
    httpServer,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        if (!httpServer.listening) {
          resolve();
          return;
        }
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}
