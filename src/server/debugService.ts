/**
 * Debug Service - contract for stepping through a Core IL program
 *
 * A session runs the document once on the reference interpreter with a step
 * hook, recording a snapshot before every statement. Stepping, breakpoints
 * and time travel then move a cursor over the recorded snapshots.
 */

// ============================================================
// SERVICE TYPES - What clients receive (JSON-serializable)
// ============================================================

export interface SerializedValue {
  /** Value tag: Int, Float, Str, Array, Map, ... */
  tag: string;
  /** Printed form, truncated */
  summary: string;
  /** Item count for containers */
  length?: number;
}

export interface SerializedBinding {
  name: string;
  value: SerializedValue;
}

/**
 * State just before one statement runs
 */
export interface Snapshot {
  /** Position in the recording, from 0 */
  step: number;
  /** Index of the statement within its own block */
  index: number;
  /** The statement is a direct child of the document body */
  topLevel: boolean;
  stmtType: string;
  /** One-line summary, e.g. `Let x = ...` */
  statement: string;
  /** Function call depth, 0 at top level */
  depth: number;
  /** Null at top level */
  locals: SerializedBinding[] | null;
  globals: SerializedBinding[];
  functions: string[];
  /** Lines printed before this statement */
  output: string[];
}

export type SessionStatus = "idle" | "paused" | "done" | "error";

export interface Breakpoint {
  id: string;
  /** Top-level statement index */
  index: number;
  enabled: boolean;
}

export interface SessionConfig {
  name?: string;
  /** Recording stops after this many snapshots */
  maxSnapshots?: number;
  /** Directory imports resolve against */
  baseDir?: string;
  maxCallDepth?: number;
}

export interface LoadResult {
  success: boolean;
  error?: string;
  /** Snapshots recorded */
  steps?: number;
  /** The program ran past `maxSnapshots` */
  truncated?: boolean;
}

export interface StepResult {
  /** Null once the cursor is past the last statement */
  snapshot: Snapshot | null;
  outcome: "stepped" | "breakpoint" | "done" | "error";
  breakpointId?: string;
}

export interface RunSummary {
  /** Everything the program printed */
  output: string[];
  exitCode: 0 | 1;
  error?: string;
}

export interface HistoryEntry {
  step: number;
  statement: string;
  depth: number;
}

/**
 * The Debug Service contract
 */
export interface IDebugService {
  // ─────────────────────────────────────────────────────────────
  // Session Management
  // ─────────────────────────────────────────────────────────────

  createSession(config?: SessionConfig): Promise<string>;

  listSessions(): Promise<Array<{ id: string; name?: string; step: number; status: SessionStatus }>>;

  getSession(sessionId: string): Promise<{ id: string; config: SessionConfig; snapshot: Snapshot | null }>;

  closeSession(sessionId: string): Promise<void>;

  // ─────────────────────────────────────────────────────────────
  // Execution
  // ─────────────────────────────────────────────────────────────

  /** Validate and record a document */
  loadDocument(sessionId: string, doc: unknown): Promise<LoadResult>;

  step(sessionId: string): Promise<StepResult>;

  stepN(sessionId: string, n: number): Promise<StepResult>;

  /** Step over calls: stop at the next statement at the same or a shallower depth */
  next(sessionId: string): Promise<StepResult>;

  /** Run until an enabled breakpoint or the end */
  continue(sessionId: string): Promise<StepResult>;

  // ─────────────────────────────────────────────────────────────
  // Inspection
  // ─────────────────────────────────────────────────────────────

  getSnapshot(sessionId: string): Promise<Snapshot | null>;

  /** A variable at the cursor, locals first */
  inspect(sessionId: string, name: string): Promise<SerializedValue | null>;

  getResult(sessionId: string): Promise<RunSummary>;

  // ─────────────────────────────────────────────────────────────
  // Breakpoints
  // ─────────────────────────────────────────────────────────────

  addBreakpoint(sessionId: string, index: number): Promise<string>;

  removeBreakpoint(sessionId: string, breakpointId: string): Promise<void>;

  listBreakpoints(sessionId: string): Promise<Breakpoint[]>;

  toggleBreakpoint(sessionId: string, breakpointId: string, enabled: boolean): Promise<void>;

  // ─────────────────────────────────────────────────────────────
  // Time Travel
  // ─────────────────────────────────────────────────────────────

  goto(sessionId: string, step: number): Promise<Snapshot>;

  back(sessionId: string): Promise<StepResult>;

  getHistory(sessionId: string): Promise<HistoryEntry[]>;
}

// ============================================================
// WEBSOCKET EVENTS - For real-time updates
// ============================================================

/**
 * Events the server sends to clients
 */
export type ServerEvent =
  | { type: "snapshot"; snapshot: Snapshot | null }
  | { type: "breakpointHit"; breakpointId: string; snapshot: Snapshot | null }
  | { type: "done"; result: RunSummary }
  | { type: "breakpointAdded"; id: string }
  | { type: "breakpointRemoved"; id: string }
  | { type: "inspectResult"; name: string; value: SerializedValue | null }
  | { type: "error"; error: { message: string } };

/**
 * Commands clients send to the server
 */
export type ClientCommand =
  | { type: "step" }
  | { type: "stepN"; n: number }
  | { type: "next" }
  | { type: "continue" }
  | { type: "back" }
  | { type: "goto"; step: number }
  | { type: "inspect"; name: string }
  | { type: "addBreakpoint"; index: number }
  | { type: "removeBreakpoint"; breakpointId: string };
