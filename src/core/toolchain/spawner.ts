// src/core/toolchain/spawner.ts
// Subordinate processes behind an injectable interface.

import { spawnSync } from "child_process";

export interface SpawnRequest {
  command: string;
  args: string[];
  cwd: string;
  timeoutMs: number;
}

export interface SpawnResult {
  /** Exit status; null when the process was killed or never started */
  status: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** The command could not be found */
  missing: boolean;
}

export type Spawner = (request: SpawnRequest) => SpawnResult;

function errorCode(error: Error | undefined): string | undefined {
  if (error === undefined) return undefined;
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
}

export const nodeSpawner: Spawner = ({ command, args, cwd, timeoutMs }) => {
  const result = spawnSync(command, args, {
    cwd,
    timeout: timeoutMs,
    encoding: "utf8",
    maxBuffer: 64 * 1024 * 1024,
  });
  const code = errorCode(result.error);
  return {
    status: result.status,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    timedOut: code === "ETIMEDOUT",
    missing: code === "ENOENT",
  };
};
