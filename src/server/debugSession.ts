/**
 * Debug Session - one recorded run of a Core IL document
 *
 * Manages a single debug session with:
 * - Document loading, validation and recording
 * - Cursor movement with breakpoint checking
 * - Variable inspection at the cursor
 * - Time travel over the recording
 */

import type { Document, Stmt } from "../core/ast";
import { prepare } from "../core/compiler/pipeline";
import { run, type Env, type FunctionTable } from "../core/eval/interp";
import { failureFromError } from "../outcome/fromError";
import { formatDiagnostic } from "../outcome/diagnostic";
import type {
  Breakpoint,
  HistoryEntry,
  LoadResult,
  RunSummary,
  SerializedValue,
  SessionConfig,
  SessionStatus,
  Snapshot,
  StepResult,
} from "./debugService";
import { serializeEnv, summarizeStatement } from "./stateSerializer";

export const DEFAULT_MAX_SNAPSHOTS = 10000;

type Recorded = Omit<Snapshot, "output"> & { outputLength: number };

class SnapshotLimitReached extends Error {
  constructor(readonly limit: number) {
    super(`recording stopped after ${limit} statements`);
    this.name = "SnapshotLimitReached";
  }
}

let sessionCounter = 0;

export class DebugSession {
  readonly id: string;
  readonly config: SessionConfig;

  private doc: Document | null = null;
  private recording: Recorded[] = [];
  private output: string[] = [];
  private exitCode: 0 | 1 = 0;
  private error: string | undefined;
  private truncated = false;

  /** Index into `recording`; equal to its length once past the end */
  private cursor = 0;
  private _status: SessionStatus = "idle";

  private breakpoints: Breakpoint[] = [];
  private nextBreakpointId = 1;

  constructor(config: SessionConfig = {}) {
    this.id = `session_${++sessionCounter}_${Date.now().toString(36)}`;
    this.config = config;
  }

  get status(): SessionStatus {
    return this._status;
  }

  /** Position of the cursor in the recording */
  get stepCount(): number {
    return this.cursor;
  }

  get totalSteps(): number {
    return this.recording.length;
  }

  // ─────────────────────────────────────────────────────────────
  // LOADING
  // ─────────────────────────────────────────────────────────────

  load(input: unknown): LoadResult {
    this.reset();
    let doc: Document;
    try {
      doc = prepare(input, { baseDir: this.config.baseDir }).doc;
    } catch (e) {
      this._status = "error";
      const f = failureFromError(e);
      this.error = f.diagnostics.length > 0 ? f.diagnostics.map(formatDiagnostic).join("\n") : f.message;
      return { success: false, error: this.error };
    }

    this.doc = doc;
    const limit = this.config.maxSnapshots ?? DEFAULT_MAX_SNAPSHOTS;
    const topLevel = new Set<Stmt>(doc.body);

    const record = (
      stmt: Stmt,
      index: number,
      locals: Env | null,
      globals: Env,
      functions: FunctionTable,
      depth: number,
    ): void => {
      if (this.recording.length >= limit) {
        this.truncated = true;
        throw new SnapshotLimitReached(limit);
      }
      this.recording.push({
        step: this.recording.length,
        index,
        topLevel: depth === 0 && topLevel.has(stmt),
        stmtType: stmt.type,
        statement: summarizeStatement(stmt),
        depth,
        locals: locals ? serializeEnv(locals) : null,
        globals: serializeEnv(globals),
        functions: Array.from(functions.keys()),
        outputLength: this.output.length,
      });
    };

    this.exitCode = run(doc, {
      stepHook: record,
      out: line => this.output.push(line),
      errorCallback: message => {
        this.error = message;
      },
      maxCallDepth: this.config.maxCallDepth,
    });

    this._status = this.recording.length > 0 ? "paused" : "done";
    return { success: true, steps: this.recording.length, truncated: this.truncated };
  }

  private reset(): void {
    this.doc = null;
    this.recording = [];
    this.output = [];
    this.exitCode = 0;
    this.error = undefined;
    this.truncated = false;
    this.cursor = 0;
  }

  // ─────────────────────────────────────────────────────────────
  // STEPPING
  // ─────────────────────────────────────────────────────────────

  step(): StepResult {
    return this.moveTo(this.cursor + 1);
  }

  stepN(n: number): StepResult {
    if (!Number.isInteger(n) || n < 0) throw new Error(`step count must be a non-negative integer: ${n}`);
    return this.moveTo(this.cursor + n);
  }

  next(): StepResult {
    const current = this.recording[this.cursor];
    if (current === undefined) return this.moveTo(this.cursor + 1);
    const at = this.findFrom(this.cursor + 1, s => s.depth <= current.depth);
    return this.moveTo(at ?? this.recording.length);
  }

  continue(): StepResult {
    const at = this.findFrom(this.cursor + 1, s => this.breakpointAt(s) !== undefined);
    return this.moveTo(at ?? this.recording.length);
  }

  back(): StepResult {
    return this.moveTo(Math.max(0, this.cursor - 1));
  }

  goto(step: number): Snapshot {
    if (!Number.isInteger(step) || step < 0 || step >= this.recording.length) {
      throw new Error(`step out of range: ${step} (recorded ${this.recording.length})`);
    }
    this.moveTo(step);
    return this.snapshotAt(step);
  }

  private moveTo(position: number): StepResult {
    if (this.doc === null) return { snapshot: null, outcome: "error" };
    this.cursor = Math.min(position, this.recording.length);
    if (this.cursor === this.recording.length) {
      this._status = "done";
      return { snapshot: null, outcome: "done" };
    }
    this._status = "paused";
    const snapshot = this.snapshotAt(this.cursor);
    const bp = this.breakpointAt(snapshot);
    return bp ? { snapshot, outcome: "breakpoint", breakpointId: bp.id } : { snapshot, outcome: "stepped" };
  }

  private findFrom(start: number, pred: (s: Recorded) => boolean): number | undefined {
    for (let i = start; i < this.recording.length; i++) {
      if (pred(this.recording[i])) return i;
    }
    return undefined;
  }

  // ─────────────────────────────────────────────────────────────
  // INSPECTION
  // ─────────────────────────────────────────────────────────────

  getSnapshot(): Snapshot | null {
    return this.cursor < this.recording.length ? this.snapshotAt(this.cursor) : null;
  }

  private snapshotAt(i: number): Snapshot {
    const { outputLength, ...rest } = this.recording[i];
    return { ...rest, output: this.output.slice(0, outputLength) };
  }

  inspect(name: string): SerializedValue | null {
    const s = this.recording[this.cursor];
    if (s === undefined) return null;
    const binding = s.locals?.find(b => b.name === name) ?? s.globals.find(b => b.name === name);
    return binding?.value ?? null;
  }

  result(): RunSummary {
    const summary: RunSummary = { output: [...this.output], exitCode: this.exitCode };
    if (this.error !== undefined) summary.error = this.error;
    return summary;
  }

  getHistory(): HistoryEntry[] {
    return this.recording.map(s => ({ step: s.step, statement: s.statement, depth: s.depth }));
  }

  // ─────────────────────────────────────────────────────────────
  // BREAKPOINTS
  // ─────────────────────────────────────────────────────────────

  addBreakpoint(index: number): string {
    if (!Number.isInteger(index) || index < 0) throw new Error(`invalid statement index: ${index}`);
    if (this.doc && index >= this.doc.body.length) {
      throw new Error(`statement index out of range: ${index} (body has ${this.doc.body.length})`);
    }
    const id = `bp_${this.nextBreakpointId++}`;
    this.breakpoints.push({ id, index, enabled: true });
    return id;
  }

  removeBreakpoint(id: string): void {
    const at = this.breakpoints.findIndex(b => b.id === id);
    if (at < 0) throw new Error(`Breakpoint not found: ${id}`);
    this.breakpoints.splice(at, 1);
  }

  toggleBreakpoint(id: string, enabled: boolean): void {
    const bp = this.breakpoints.find(b => b.id === id);
    if (!bp) throw new Error(`Breakpoint not found: ${id}`);
    bp.enabled = enabled;
  }

  listBreakpoints(): Breakpoint[] {
    return this.breakpoints.map(b => ({ ...b }));
  }

  private breakpointAt(s: Pick<Snapshot, "topLevel" | "index">): Breakpoint | undefined {
    if (!s.topLevel) return undefined;
    return this.breakpoints.find(b => b.enabled && b.index === s.index);
  }
}
