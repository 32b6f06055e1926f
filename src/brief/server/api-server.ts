/**
 * Brief API server - REST endpoints for generation and stored briefs, plus a
 * WebSocket feed of generation events on /events
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { WebSocket, WebSocketServer } from "ws";
import { z } from "zod";
import { BriefDateSchema, TickerSchema } from "../brief/schema.js";
import { type BriefConfig, type GenerationMode, GenerationModeSchema } from "../config/types.js";
import { BriefErrorCode, errorMessage, isBriefError } from "../errors.js";
import { createBriefAgent } from "../orchestrator/agent.js";
import type { RunResult } from "../orchestrator/core.js";
import type { BriefLogger } from "../runtime/logger.js";
import { listBriefs, readBriefFile } from "../storage/brief-store.js";
import { DEFAULT_SEARCH_LIMIT, searchTickers } from "../sources/tickers.js";

/** Maximum request body size (1MB) */
const MAX_BODY_BYTES = 1024 * 1024;

export const EVENTS_PATH = "/events";

export const GenerateRequestSchema = z.object({
  ticker: TickerSchema,
  date: BriefDateSchema,
  mode: GenerationModeSchema.optional(),
});

export type GenerateRequest = z.infer<typeof GenerateRequestSchema>;

const StockQuerySchema = z.object({
  q: z.string().default(""),
  limit: z.coerce.number().int().positive().max(100).default(DEFAULT_SEARCH_LIMIT),
});

/**
 * Event frame sent to feed subscribers
 */
export interface EventFrame {
  type: "event";
  event: "generation";
  payload: GenerationEvent;
  seq: number;
}

export type GenerationEvent =
  | { phase: "started"; ticker: string; date: string; mode: GenerationMode }
  | {
      phase: "completed";
      ticker: string;
      date: string;
      mode: GenerationMode;
      runId: string;
      files: string[];
      issues: string[];
    }
  | {
      phase: "failed";
      ticker: string;
      date: string;
      mode: GenerationMode;
      runId?: string;
      error: string;
    };

/**
 * Runs one generation request to completion
 */
export type BriefRunner = (request: {
  ticker: string;
  date: string;
  mode: GenerationMode;
}) => Promise<RunResult>;

export interface BriefApiServerOptions {
  config: BriefConfig;
  logger: BriefLogger;
  /** Replaces the default agent-backed runner */
  runBrief?: BriefRunner;
  env?: NodeJS.ProcessEnv;
}

interface Subscriber {
  ws: WebSocket;
  eventSeq: number;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "content-type": "application/json; charset=utf-8",
    "content-length": Buffer.byteLength(payload),
  });
  res.end(payload);
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new HttpError(413, "PAYLOAD_TOO_LARGE", `Body exceeds maximum size of ${MAX_BODY_BYTES} bytes`);
    }
    chunks.push(buffer);
  }

  return Buffer.concat(chunks).toString("utf-8");
}

export class BriefApiServer {
  private readonly config: BriefConfig;
  private readonly logger: BriefLogger;
  private readonly runBrief: BriefRunner;

  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private subscribers: Map<WebSocket, Subscriber> = new Map();
  private inFlight: Set<Promise<void>> = new Set();
  private running = false;

  constructor(options: BriefApiServerOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.runBrief =
      options.runBrief ??
      ((request) =>
        createBriefAgent(request.mode, options.config, options.logger, { env: options.env }).run(
          request.ticker,
          request.date,
        ));
  }

  /**
   * Send an event frame to every subscriber
   */
  private broadcastEvent(payload: GenerationEvent): void {
    for (const [ws, subscriber] of this.subscribers) {
      if (ws.readyState !== WebSocket.OPEN) continue;

      subscriber.eventSeq++;
      const frame: EventFrame = {
        type: "event",
        event: "generation",
        payload,
        seq: subscriber.eventSeq,
      };

      ws.send(JSON.stringify(frame), (err) => {
        if (err) {
          this.logger.error("Failed to broadcast event", { error: err.message });
        }
      });
    }
  }

  /**
   * Run a generation in the background, reporting progress on the feed
   */
  private async generate(request: { ticker: string; date: string; mode: GenerationMode }): Promise<void> {
    const { ticker, date, mode } = request;
    this.logger.info(`Starting background generation for ${ticker} on ${date}`, { mode });
    this.broadcastEvent({ phase: "started", ticker, date, mode });

    try {
      const result = await this.runBrief(request);
      if (result.status === "success") {
        this.logger.info("Background generation completed", { runId: result.runId });
        this.broadcastEvent({
          phase: "completed",
          ticker,
          date,
          mode,
          runId: result.runId,
          files: [result.outputPaths.reportPath, result.outputPaths.jsonPath],
          issues: result.issues,
        });
      } else {
        this.logger.error(`Background generation failed: ${result.error}`, { runId: result.runId });
        this.broadcastEvent({ phase: "failed", ticker, date, mode, runId: result.runId, error: result.error });
      }
    } catch (error) {
      this.logger.error(`Background generation failed: ${errorMessage(error)}`);
      this.broadcastEvent({ phase: "failed", ticker, date, mode, error: errorMessage(error) });
    }
  }

  private async handleGenerate(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readBody(req);

    let raw: unknown;
    try {
      raw = body ? JSON.parse(body) : {};
    } catch {
      throw new HttpError(400, "PARSE_ERROR", "Invalid JSON");
    }

    const parsed = GenerateRequestSchema.safeParse(raw);
    if (!parsed.success) {
      throw new HttpError(400, "INVALID_REQUEST", "Invalid generate request", parsed.error.issues);
    }

    const request = {
      ticker: parsed.data.ticker,
      date: parsed.data.date,
      mode: parsed.data.mode ?? this.config.generation.defaultMode,
    };

    const task: Promise<void> = this.generate(request).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);

    sendJson(res, 202, {
      status: "accepted",
      message: `Generation started for ${request.ticker}`,
    });
  }

  private async handleGetBrief(res: ServerResponse, filename: string): Promise<void> {
    try {
      const stored = await readBriefFile(this.config.paths.outputDir, filename);
      sendJson(res, 200, stored.kind === "json" ? stored.brief : { content: stored.content });
    } catch (error) {
      if (isBriefError(error, BriefErrorCode.INVALID_FILENAME)) {
        throw new HttpError(400, error.code, error.message);
      }
      if (isBriefError(error, BriefErrorCode.BRIEF_NOT_FOUND)) {
        throw new HttpError(404, error.code, "Brief not found");
      }
      throw error;
    }
  }

  private async route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    const pathname = url.pathname;

    if (method === "POST" && pathname === "/api/generate") {
      return this.handleGenerate(req, res);
    }

    if (method === "GET" && pathname === "/api/briefs") {
      sendJson(res, 200, await listBriefs(this.config.paths.outputDir));
      return;
    }

    if (method === "GET" && pathname.startsWith("/api/briefs/")) {
      let filename: string;
      try {
        filename = decodeURIComponent(pathname.slice("/api/briefs/".length));
      } catch {
        throw new HttpError(400, BriefErrorCode.INVALID_FILENAME, "Invalid brief filename");
      }
      return this.handleGetBrief(res, filename);
    }

    if (method === "GET" && pathname === "/api/stocks") {
      const query = StockQuerySchema.safeParse(Object.fromEntries(url.searchParams));
      if (!query.success) {
        throw new HttpError(400, "INVALID_REQUEST", "Invalid stock query", query.error.issues);
      }
      sendJson(res, 200, searchTickers(query.data.q, query.data.limit));
      return;
    }

    throw new HttpError(404, "NOT_FOUND", `No route for ${method} ${pathname}`);
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      await this.route(req, res);
    } catch (error) {
      if (error instanceof HttpError) {
        sendJson(res, error.status, {
          error: {
            code: error.code,
            message: error.message,
            ...(error.details !== undefined && { details: error.details }),
          },
        });
        return;
      }

      this.logger.error("Request failed", { url: req.url, error: errorMessage(error) });
      sendJson(res, 500, { error: { code: "INTERNAL_ERROR", message: errorMessage(error) } });
    }
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    this.subscribers.set(ws, { ws, eventSeq: 0 });
    this.logger.debug("Event subscriber connected", { remoteAddress: req.socket.remoteAddress });

    ws.on("close", () => {
      this.subscribers.delete(ws);
      this.logger.debug("Event subscriber disconnected");
    });

    ws.on("error", (err) => {
      this.logger.error("WebSocket error", { error: err.message });
    });
  }

  /**
   * Start listening. Resolves with the bound address (port 0 picks a free port).
   */
  async start(): Promise<{ host: string; port: number }> {
    if (this.running) {
      throw new Error("Server is already running");
    }

    return new Promise((resolve, reject) => {
      const httpServer = createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          this.logger.error("Unhandled request error", { error: errorMessage(error) });
        });
      });
      this.httpServer = httpServer;

      this.wss = new WebSocketServer({ server: httpServer, path: EVENTS_PATH });
      this.wss.on("connection", (ws, req) => {
        this.handleConnection(ws, req);
      });

      httpServer.once("error", reject);

      httpServer.listen(this.config.server.port, this.config.server.host, () => {
        this.running = true;
        const address = httpServer.address();
        const port = address && typeof address === "object" ? address.port : this.config.server.port;

        this.logger.info("Brief API server started", { host: this.config.server.host, port });
        resolve({ host: this.config.server.host, port });
      });
    });
  }

  /**
   * Resolves once every accepted generation has finished
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  /**
   * Wait for in-flight generations, then close the feed and the server
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    await this.whenIdle();

    for (const [ws] of this.subscribers) {
      ws.close(1001, "Server shutting down");
    }
    this.subscribers.clear();

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
    }

    const httpServer = this.httpServer;
    this.httpServer = null;
    if (httpServer) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
        httpServer.closeAllConnections();
      });
    }

    this.logger.info("Brief API server stopped");
  }
}
