import { randomUUID } from "node:crypto";
import { createServer, type IncomingMessage, type Server } from "node:http";
import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import type { ChatHandler } from "./chat-handler.js";
import { InvalidRequestError, type RelayError, toRelayError } from "./errors.js";
import { type Logger, logger } from "./logger.js";

export interface HTTPServerOptions {
  port: number;
  host?: string;
  bodyLimit?: string;
}

interface BodyParserError {
  status: number;
  type?: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  );
}

function toRequestError(error: BodyParserError): InvalidRequestError {
  if (error.type === "entity.too.large") {
    return new InvalidRequestError("Request body too large");
  }
  if (error.type === "entity.parse.failed") {
    return new InvalidRequestError("Request body is not valid JSON");
  }
  return new InvalidRequestError("Request must be JSON");
}

// Raw body sizes seen by the JSON parser. An empty body parses to `{}`, so
// the route checks this to tell it apart from a literal `{}`.
const rawBodyLengths = new WeakMap<IncomingMessage, number>();

function recordBodyLength(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  rawBodyLengths.set(req, buf.length);
}

function sendError(res: Response, error: unknown, log: Logger): void {
  const relayError: RelayError = toRelayError(error);
  if (relayError.statusCode >= 500) {
    log.error(relayError.message, relayError.cause instanceof Error ? relayError.cause : relayError);
  } else {
    log.warn("Rejected chat request", { status: relayError.statusCode, error: relayError.message });
  }

  if (!res.headersSent) {
    res.status(relayError.statusCode).json({ error: relayError.message });
  }
}

export class HTTPServer {
  private app: Express;
  private httpServer: Server | null = null;
  private chatHandler: ChatHandler;
  private port: number;
  private host: string | undefined;
  private bodyLimit: string;

  constructor(chatHandler: ChatHandler, options: HTTPServerOptions) {
    this.chatHandler = chatHandler;
    this.port = options.port;
    this.host = options.host;
    this.bodyLimit = options.bodyLimit ?? "25mb";
    this.app = express();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get("/health", (_req: Request, res: Response) => {
      logger.debug("Health check request");
      res.json({ status: "ok" });
    });

    this.app.post(
      "/chat",
      express.json({ limit: this.bodyLimit, verify: recordBodyLength }),
      async (req: Request, res: Response) => {
        const requestId = randomUUID();
        const log = logger.child({ requestId });

        // Abandon the provider call if the client goes away first.
        const abort = new AbortController();
        res.on("close", () => {
          if (!res.writableFinished) {
            log.warn("Client disconnected before the reply was sent");
            abort.abort();
          }
        });

        try {
          if (!req.is("application/json")) {
            throw new InvalidRequestError("Request must be JSON");
          }
          if (!rawBodyLengths.get(req)) {
            throw new InvalidRequestError("Request body is not valid JSON");
          }
          const result = await this.chatHandler.handle(req.body, {
            signal: abort.signal,
            requestId,
          });
          res.json(result);
        } catch (error) {
          sendError(res, error, log);
        }
      }
    );

    this.app.use((req: Request, res: Response) => {
      logger.debug("404 - not found", { url: req.url });
      res.status(404).json({ error: "Not found" });
    });

    // Body parsing failures arrive here before any route handler runs.
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      const log = logger.child({ url: req.url });
      sendError(res, isBodyParserError(error) ? toRequestError(error) : error, log);
    });
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer(this.app);

      server.once("error", (error: Error) => {
        logger.error("HTTP server error", error);
        reject(error);
      });

      server.listen(this.port, this.host, () => {
        this.httpServer = server;
        logger.info("HTTP server started", { host: this.host, port: this.getPort() });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.httpServer;
      if (!server) {
        resolve();
        return;
      }

      server.close((error) => {
        if (error) {
          logger.error("Error closing HTTP server", error);
          reject(error);
        } else {
          this.httpServer = null;
          logger.info("HTTP server stopped");
          resolve();
        }
      });
      server.closeIdleConnections();
    });
  }

  isRunning(): boolean {
    return this.httpServer?.listening || false;
  }

  /**
   * Bound port once listening (useful when configured with port 0)
   */
  getPort(): number {
    const address = this.httpServer?.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.port;
  }
}
