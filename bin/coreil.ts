#!/usr/bin/env tsx
// bin/coreil.ts
// Command-line entry point.
//
// Run:  npx tsx bin/coreil.ts <command> [options] <file>

import { runCli } from "./coreil-cli-lib";

runCli(process.argv.slice(2), {
  out: line => console.log(line),
  err: line => console.error(line),
  cwd: process.cwd(),
  env: process.env,
  onServerStarted: server => {
    process.once("SIGINT", () => {
      console.log("\nShutting down...");
      server.stop().then(
        () => process.exit(0),
        (e: unknown) => {
          console.error(e);
          process.exit(1);
        },
      );
    });
  },
}).then(
  code => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(e);
    process.exitCode = 1;
  },
);
