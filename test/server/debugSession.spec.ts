import { describe, it, expect } from "vitest";
import { DebugServer, DebugSession, SessionNotFoundError } from "../../src/server";
import { assign, bin, call, doc, fn, let_, lit, print, ret, v } from "../helpers/coreil";

const program = doc([
  let_("x", lit(1)),
  fn("inc", ["n"], [ret(bin("+", v("n"), lit(1)))]),
  assign("x", call("inc", v("x"))),
  print(v("x")),
]);

function loaded(): DebugSession {
  const session = new DebugSession();
  expect(session.load(program)).toEqual({ success: true, steps: 5, truncated: false });
  return session;
}

describe("DebugSession", () => {
  it("records one snapshot before every statement", () => {
    const session = loaded();
    expect(session.status).toBe("paused");
    expect(session.getHistory()).toEqual([
      { step: 0, statement: "Let x = ...", depth: 0 },
      { step: 1, statement: "FuncDef inc(n)", depth: 0 },
      { step: 2, statement: "Assign x = ...", depth: 0 },
      { step: 3, statement: "Return ...", depth: 1 },
      { step: 4, statement: "Print (1 arg)", depth: 0 },
    ]);
  });

  it("steps forward and back through the recording", () => {
    const session = loaded();
    const first = session.step();
    expect(first.outcome).toBe("stepped");
    expect(first.snapshot?.globals).toEqual([{ name: "x", value: { tag: "Int", summary: "1" } }]);

    session.step();
    const returned = session.step();
    expect(returned.snapshot?.topLevel).toBe(false);
    expect(returned.snapshot?.locals).toEqual([{ name: "n", value: { tag: "Int", summary: "1" } }]);
    expect(session.inspect("n")).toEqual({ tag: "Int", summary: "1" });

    expect(session.back().snapshot?.stmtType).toBe("Assign");
  });

  it("steps over calls with next", () => {
    const session = loaded();
    session.goto(2);
    const over = session.next();
    expect(over.snapshot?.stmtType).toBe("Print");
    expect(session.inspect("x")).toEqual({ tag: "Int", summary: "2" });
    expect(over.snapshot?.output).toEqual([]);
  });

  it("continues to a top-level breakpoint and then to the end", () => {
    const session = loaded();
    expect(session.addBreakpoint(3)).toBe("bp_1");
    const hit = session.continue();
    expect([hit.outcome, hit.breakpointId, hit.snapshot?.step]).toEqual(["breakpoint", "bp_1", 4]);

    session.toggleBreakpoint("bp_1", false);
    session.goto(0);
    expect(session.continue()).toEqual({ snapshot: null, outcome: "done" });
    expect(session.status).toBe("done");
    expect(session.result()).toEqual({ output: ["2"], exitCode: 0 });
  });

  it("rejects bad breakpoints and steps", () => {
    const session = loaded();
    expect(() => session.addBreakpoint(7)).toThrow("statement index out of range: 7 (body has 4)");
    expect(() => session.removeBreakpoint("bp_9")).toThrow("Breakpoint not found: bp_9");
    expect(() => session.goto(5)).toThrow("step out of range: 5 (recorded 5)");
    expect(() => session.stepN(-1)).toThrow("step count must be a non-negative integer: -1");
  });

  it("reports validation failures as diagnostics", () => {
    const session = new DebugSession();
    expect(session.load(doc([print(v("y"))]))).toEqual({
      success: false,
      error: "$.body[0].args[0].name: error [E0100] variable 'y' used before definition",
    });
    expect(session.status).toBe("error");
    expect(session.step()).toEqual({ snapshot: null, outcome: "error" });
  });

  it("keeps the runtime error of the recorded run", () => {
    const session = new DebugSession();
    session.load(doc([print(bin("//", lit(1), lit(0)))]));
    expect(session.result()).toEqual({ output: [], exitCode: 1, error: "division by zero" });
  });

  it("stops recording at the snapshot limit", () => {
    const session = new DebugSession({ maxSnapshots: 2 });
    expect(session.load(program)).toEqual({ success: true, steps: 2, truncated: true });
    expect(session.result().error).toBe("recording stopped after 2 statements");
  });
});

describe("DebugServer", () => {
  it("manages sessions without listening", async () => {
    const server = new DebugServer({ log: () => undefined, sessionDefaults: { maxSnapshots: 100 } });
    const id = await server.createSession({ name: "demo" });
    expect(await server.listSessions()).toEqual([{ id, name: "demo", step: 0, status: "idle" }]);

    expect(await server.loadDocument(id, program)).toEqual({ success: true, steps: 5, truncated: false });
    expect((await server.getSession(id)).config).toEqual({ maxSnapshots: 100, name: "demo" });
    expect((await server.stepN(id, 4)).snapshot?.stmtType).toBe("Print");
    expect(await server.inspect(id, "x")).toEqual({ tag: "Int", summary: "2" });

    await server.closeSession(id);
    await expect(server.getSnapshot(id)).rejects.toBeInstanceOf(SessionNotFoundError);
    await expect(server.step("nope")).rejects.toThrow("Session not found: nope");
  });
});
