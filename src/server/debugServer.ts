/**
 * Debug Server - HTTP + WebSocket access to debug sessions
 *
 * - REST API for session management, stepping, inspection
 * - WebSocket for snapshot broadcasts to every client of a session
 */

import express, { type NextFunction, type Request, type Response } from "express";
import { createServer, type IncomingMessage, type Server } from "http";
import type { AddressInfo } from "net";
import { WebSocket, WebSocketServer } from "ws";
import { errorMessage } from "../core/eval/errors";
import { parseDocumentJson } from "../core/eval/json";
import type {
  Breakpoint,
  ClientCommand,
  HistoryEntry,
  IDebugService,
  LoadResult,
  RunSummary,
  SerializedValue,
  ServerEvent,
  SessionConfig,
  SessionStatus,
  Snapshot,
  StepResult,
} from "./debugService";
import { DebugSession } from "./debugSession";

// ============================================================
// DEBUG SERVER IMPLEMENTATION
// ============================================================

interface SessionInfo {
  session: DebugSession;
  clients: Set<WebSocket>;
}

export interface DebugServerOptions {
  port?: number;
  host?: string;
  /** Applied to every session created over the API */
  sessionDefaults?: SessionConfig;
  log?: (line: string) => void;
}

export class SessionNotFoundError extends Error {
  readonly code = "SESSION_NOT_FOUND";

  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toInt(text: string): number {
  const n = Number(text);
  if (!Number.isInteger(n)) throw new Error(`not an integer: ${text}`);
  return n;
}

function parseCommand(data: unknown): ClientCommand {
  if (!isRecord(data) || typeof data.type !== "string") throw new Error("command must be an object with a type");
  const num = (key: string): number => {
    const v = data[key];
    if (typeof v !== "number" || !Number.isInteger(v)) throw new Error(`${data.type}: '${key}' must be an integer`);
    return v;
  };
  const str = (key: string): string => {
    const v = data[key];
    if (typeof v !== "string") throw new Error(`${data.type}: '${key}' must be a string`);
    return v;
  };
  switch (data.type) {
    case "step":
    case "next":
    case "continue":
    case "back":
      return { type: data.type };
    case "stepN":
      return { type: "stepN", n: num("n") };
    case "goto":
      return { type: "goto", step: num("step") };
    case "inspect":
      return { type: "inspect", name: str("name") };
    case "addBreakpoint":
      return { type: "addBreakpoint", index: num("index") };
    case "removeBreakpoint":
      return { type: "removeBreakpoint", breakpointId: str("breakpointId") };
    default:
      throw new Error(`Unknown command: ${data.type}`);
  }
}

export class DebugServer implements IDebugService {
  private app: express.Application;
  private server: Server;
  private wss: WebSocketServer;
  private sessions = new Map<string, SessionInfo>();
  /** Request bodies as sent, for reading documents with their number kinds. */
  private rawBodies = new WeakMap<IncomingMessage, string>();
  private readonly port: number;
  private readonly host: string;
  private readonly sessionDefaults: SessionConfig;
  private readonly log: (line: string) => void;

  constructor(options: DebugServerOptions = {}) {
    this.port = options.port ?? 4317;
    this.host = options.host ?? "127.0.0.1";
    this.sessionDefaults = options.sessionDefaults ?? {};
    this.log = options.log ?? (line => console.log(line));

    this.app = express();
    this.app.use(
      express.json({
        limit: "10mb",
        verify: (req, _res, buf) => {
          this.rawBodies.set(req, buf.toString("utf8"));
        },
      }),
    );
    this.app.use(this.corsMiddleware);

    this.server = createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server, path: "/ws" });

    this.setupRoutes();
    this.setupWebSocket();
  }

  /** The express application, for in-process requests */
  get handler(): express.Application {
    return this.app;
  }

  // ─────────────────────────────────────────────────────────────
  // MIDDLEWARE
  // ─────────────────────────────────────────────────────────────

  private corsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
      return;
    }
    next();
  };

  // ─────────────────────────────────────────────────────────────
  // HTTP ROUTES
  // ─────────────────────────────────────────────────────────────

  /** Wraps a route body: JSON result, 404 for unknown sessions, `failStatus` otherwise. */
  private route<T>(failStatus: number, body: (req: Request) => Promise<T>, after?: (req: Request, value: T) => void) {
    return (req: Request, res: Response): void => {
      void body(req)
        .then(value => {
          res.json(value);
          after?.(req, value);
        })
        .catch((e: unknown) => {
          if (res.headersSent) {
            this.log(`debug server: ${req.method} ${req.path}: ${errorMessage(e)}`);
            return;
          }
          const status = e instanceof SessionNotFoundError ? 404 : failStatus;
          res.status(status).json({ error: errorMessage(e) });
        });
    };
  }

  private setupRoutes(): void {
    const app = this.app;
    const broadcastStep = (req: Request, result: StepResult): void => this.broadcastStep(req.params.id, result);

    app.get("/health", (_req, res) => {
      res.json({ status: "ok", sessions: this.sessions.size });
    });

    // ─── Session Management ───
    app.post(
      "/session",
      this.route(400, async req => {
        const body: unknown = req.body;
        const name = isRecord(body) && typeof body.name === "string" ? body.name : undefined;
        return { id: await this.createSession(name === undefined ? {} : { name }) };
      }),
    );
    app.get("/sessions", this.route(500, () => this.listSessions()));
    app.get("/session/:id", this.route(404, req => this.getSession(req.params.id)));
    app.delete(
      "/session/:id",
      this.route(404, async req => {
        await this.closeSession(req.params.id);
        return { success: true };
      }),
    );

    // ─── Execution ───
    app.post(
      "/session/:id/load",
      this.route(
        400,
        req => {
          const raw = this.rawBodies.get(req);
          const body: unknown = raw === undefined ? req.body : parseDocumentJson(raw);
          return this.loadDocument(req.params.id, isRecord(body) && "document" in body ? body.document : body);
        },
        req => this.broadcast(req.params.id, { type: "snapshot", snapshot: this.sessionOf(req.params.id).getSnapshot() }),
      ),
    );
    app.post("/session/:id/step", this.route(400, req => this.step(req.params.id), broadcastStep));
    app.post("/session/:id/step/:n", this.route(400, req => this.stepN(req.params.id, toInt(req.params.n)), broadcastStep));
    app.post("/session/:id/next", this.route(400, req => this.next(req.params.id), broadcastStep));
    app.post("/session/:id/continue", this.route(400, req => this.continue(req.params.id), broadcastStep));
    app.post("/session/:id/back", this.route(400, req => this.back(req.params.id), broadcastStep));

    // ─── Inspection ───
    app.get("/session/:id/snapshot", this.route(404, req => this.getSnapshot(req.params.id)));
    app.get(
      "/session/:id/variable/:name",
      this.route(404, async req => ({ value: await this.inspect(req.params.id, req.params.name) })),
    );
    app.get("/session/:id/result", this.route(404, req => this.getResult(req.params.id)));

    // ─── Breakpoints ───
    app.post(
      "/session/:id/breakpoint",
      this.route(400, async req => {
        const body: unknown = req.body;
        const index = isRecord(body) ? body.index : undefined;
        if (typeof index !== "number") throw new Error("'index' must be a number");
        return { id: await this.addBreakpoint(req.params.id, index) };
      }),
    );
    app.delete(
      "/session/:id/breakpoint/:bpId",
      this.route(404, async req => {
        await this.removeBreakpoint(req.params.id, req.params.bpId);
        return { success: true };
      }),
    );
    app.get("/session/:id/breakpoints", this.route(404, req => this.listBreakpoints(req.params.id)));

    // ─── Time Travel ───
    app.post(
      "/session/:id/goto/:step",
      this.route(
        400,
        req => this.goto(req.params.id, toInt(req.params.step)),
        (req, snapshot) => this.broadcast(req.params.id, { type: "snapshot", snapshot }),
      ),
    );
    app.get("/session/:id/history", this.route(404, req => this.getHistory(req.params.id)));
  }

  // ─────────────────────────────────────────────────────────────
  // WEBSOCKET
  // ─────────────────────────────────────────────────────────────

  private setupWebSocket(): void {
    this.wss.on("connection", (ws, req) => {
      // /ws?session=xxx
      const url = new URL(req.url ?? "", `http://${req.headers.host ?? "localhost"}`);
      const sessionId = url.searchParams.get("session");
      const info = sessionId === null ? undefined : this.sessions.get(sessionId);

      if (sessionId === null || info === undefined) {
        ws.close(4404, "Session not found");
        return;
      }

      info.clients.add(ws);
      ws.send(JSON.stringify({ type: "snapshot", snapshot: info.session.getSnapshot() } satisfies ServerEvent));

      ws.on("message", data => {
        try {
          this.handleCommand(sessionId, parseCommand(JSON.parse(data.toString())), ws);
        } catch (e) {
          ws.send(JSON.stringify({ type: "error", error: { message: errorMessage(e) } } satisfies ServerEvent));
        }
      });

      ws.on("close", () => {
        info.clients.delete(ws);
      });
    });
  }

  private handleCommand(sessionId: string, cmd: ClientCommand, ws: WebSocket): void {
    const session = this.sessionOf(sessionId);
    const reply = (event: ServerEvent): void => ws.send(JSON.stringify(event));

    switch (cmd.type) {
      case "step":
        return this.broadcastStep(sessionId, session.step());
      case "stepN":
        return this.broadcastStep(sessionId, session.stepN(cmd.n));
      case "next":
        return this.broadcastStep(sessionId, session.next());
      case "continue":
        return this.broadcastStep(sessionId, session.continue());
      case "back":
        return this.broadcastStep(sessionId, session.back());
      case "goto":
        return this.broadcast(sessionId, { type: "snapshot", snapshot: session.goto(cmd.step) });
      case "inspect":
        return reply({ type: "inspectResult", name: cmd.name, value: session.inspect(cmd.name) });
      case "addBreakpoint":
        return reply({ type: "breakpointAdded", id: session.addBreakpoint(cmd.index) });
      case "removeBreakpoint":
        session.removeBreakpoint(cmd.breakpointId);
        return reply({ type: "breakpointRemoved", id: cmd.breakpointId });
    }
  }

  private broadcastStep(sessionId: string, result: StepResult): void {
    this.broadcast(sessionId, { type: "snapshot", snapshot: result.snapshot });
    if (result.outcome === "breakpoint" && result.breakpointId !== undefined) {
      this.broadcast(sessionId, { type: "breakpointHit", breakpointId: result.breakpointId, snapshot: result.snapshot });
    } else if (result.outcome === "done") {
      this.broadcast(sessionId, { type: "done", result: this.sessionOf(sessionId).result() });
    }
  }

  private broadcast(sessionId: string, event: ServerEvent): void {
    const info = this.sessions.get(sessionId);
    if (!info) return;

    const msg = JSON.stringify(event);
    for (const client of info.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(msg);
      }
    }
  }

  // ─────────────────────────────────────────────────────────────
  // IDebugService IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  private sessionOf(sessionId: string): DebugSession {
    const info = this.sessions.get(sessionId);
    if (!info) throw new SessionNotFoundError(sessionId);
    return info.session;
  }

  /** Registers an existing session, e.g. one preloaded by the CLI. */
  addSession(session: DebugSession): string {
    this.sessions.set(session.id, { session, clients: new Set() });
    return session.id;
  }

  async createSession(config: SessionConfig = {}): Promise<string> {
    return this.addSession(new DebugSession({ ...this.sessionDefaults, ...config }));
  }

  async listSessions(): Promise<Array<{ id: string; name?: string; step: number; status: SessionStatus }>> {
    return Array.from(this.sessions.entries()).map(([id, info]) => ({
      id,
      name: info.session.config.name,
      step: info.session.stepCount,
      status: info.session.status,
    }));
  }

  async getSession(sessionId: string): Promise<{ id: string; config: SessionConfig; snapshot: Snapshot | null }> {
    const session = this.sessionOf(sessionId);
    return { id: sessionId, config: session.config, snapshot: session.getSnapshot() };
  }

  async closeSession(sessionId: string): Promise<void> {
    const info = this.sessions.get(sessionId);
    if (!info) throw new SessionNotFoundError(sessionId);
    for (const client of info.clients) {
      client.close(1000, "Session closed");
    }
    this.sessions.delete(sessionId);
  }

  async loadDocument(sessionId: string, doc: unknown): Promise<LoadResult> {
    return this.sessionOf(sessionId).load(doc);
  }

  async step(sessionId: string): Promise<StepResult> {
    return this.sessionOf(sessionId).step();
  }

  async stepN(sessionId: string, n: number): Promise<StepResult> {
    return this.sessionOf(sessionId).stepN(n);
  }

  async next(sessionId: string): Promise<StepResult> {
    return this.sessionOf(sessionId).next();
  }

  async continue(sessionId: string): Promise<StepResult> {
    return this.sessionOf(sessionId).continue();
  }

  async getSnapshot(sessionId: string): Promise<Snapshot | null> {
    return this.sessionOf(sessionId).getSnapshot();
  }

  async inspect(sessionId: string, name: string): Promise<SerializedValue | null> {
    return this.sessionOf(sessionId).inspect(name);
  }

  async getResult(sessionId: string): Promise<RunSummary> {
    return this.sessionOf(sessionId).result();
  }

  async addBreakpoint(sessionId: string, index: number): Promise<string> {
    return this.sessionOf(sessionId).addBreakpoint(index);
  }

  async removeBreakpoint(sessionId: string, breakpointId: string): Promise<void> {
    this.sessionOf(sessionId).removeBreakpoint(breakpointId);
  }

  async listBreakpoints(sessionId: string): Promise<Breakpoint[]> {
    return this.sessionOf(sessionId).listBreakpoints();
  }

  async toggleBreakpoint(sessionId: string, breakpointId: string, enabled: boolean): Promise<void> {
    this.sessionOf(sessionId).toggleBreakpoint(breakpointId, enabled);
  }

  async goto(sessionId: string, step: number): Promise<Snapshot> {
    return this.sessionOf(sessionId).goto(step);
  }

  async back(sessionId: string): Promise<StepResult> {
    return this.sessionOf(sessionId).back();
  }

  async getHistory(sessionId: string): Promise<HistoryEntry[]> {
    return this.sessionOf(sessionId).getHistory();
  }

  // ─────────────────────────────────────────────────────────────
  // SERVER LIFECYCLE
  // ─────────────────────────────────────────────────────────────

  /** Resolves with the bound port (useful with port 0). */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(this.port, this.host, () => {
        const address: AddressInfo | string | null = this.server.address();
        const port = typeof address === "object" && address !== null ? address.port : this.port;
        this.log(`Debug server running at http://${this.host}:${port}`);
        this.log(`   WebSocket: ws://${this.host}:${port}/ws?session=<id>`);
        this.log(`   API: http://${this.host}:${port}/sessions`);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      for (const info of this.sessions.values()) {
        for (const client of info.clients) client.terminate();
      }
      this.wss.close();
      this.server.close(err => (err ? reject(err) : resolve()));
    });
  }
}
