// src/core/toolchain/parity.ts
// Backend parity: a program must print the same lines and exit with the same
// code on every backend as it does on the reference interpreter.

import * as path from "path";
import { writeArtifact } from "../codegen/artifact";
import { UnsupportedOperationError } from "../codegen/errors";
import type { TargetName } from "../codegen/registry";
import { compile, prepare } from "../compiler/pipeline";
import { run } from "../eval/interp";
import { runTarget, type RunTargetOptions } from "./runTarget";

export interface ParityOptions extends RunTargetOptions {
  /** Each target's artifact is written to `<outRoot>/<target>` */
  outRoot: string;
  optimize?: boolean;
  baseDir?: string;
  log?: (line: string) => void;
}

export type ParityOutcome =
  | { target: TargetName; status: "match" }
  | { target: TargetName; status: "mismatch"; expected: string; actual: string; expectedExit: number; actualExit: number }
  | { target: TargetName; status: "skipped"; reason: string };

export interface ParityReport {
  expected: { stdout: string; exitCode: number };
  outcomes: ParityOutcome[];
  ok: boolean;
}

const normalize = (text: string): string => text.replace(/\r\n/g, "\n").replace(/\n+$/, "");

/** Runs `input` on the interpreter and on each target, comparing output. */
export function checkParity(input: unknown, targets: readonly TargetName[], options: ParityOptions): ParityReport {
  const log = options.log ?? (() => undefined);
  const prepared = prepare(input, options);
  const lines: string[] = [];
  const exitCode = run(prepared.doc, { out: line => lines.push(line) });
  const expected = normalize(lines.join("\n"));

  const outcomes: ParityOutcome[] = [];
  for (const target of targets) {
    let files: string[];
    try {
      files = writeArtifact(path.join(options.outRoot, target), compile(input, { ...options, target }).output);
    } catch (e) {
      if (!(e instanceof UnsupportedOperationError)) throw e;
      log(`${target}: skipped (${e.message})`);
      outcomes.push({ target, status: "skipped", reason: e.message });
      continue;
    }
    log(`${target}: wrote ${files.length} file${files.length === 1 ? "" : "s"}`);

    const result = runTarget(target, path.join(options.outRoot, target), options);
    const actual = normalize(result.stdout);
    if (actual === expected && result.exitCode === exitCode) {
      log(`${target}: match`);
      outcomes.push({ target, status: "match" });
    } else {
      log(`${target}: MISMATCH`);
      outcomes.push({
        target,
        status: "mismatch",
        expected,
        actual,
        expectedExit: exitCode,
        actualExit: result.exitCode,
      });
    }
  }

  return {
    expected: { stdout: expected, exitCode },
    outcomes,
    ok: outcomes.every(o => o.status !== "mismatch"),
  };
}
