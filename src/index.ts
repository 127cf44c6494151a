#!/usr/bin/env node
import { parseCliArgs } from './cli';
import { UsageError } from './errors';
import { runEnumeration, SessionTracker } from './runEnumeration';
import type { EnumOptions } from './types';

const sessions = new SessionTracker();

async function main(): Promise<number> {
  let options: EnumOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      console.error('Run with --help for usage.');
      return 1;
    }
    throw err;
  }
  return runEnumeration(options, console, sessions.open);
}

// --- Shutdown Handlers ---
const abort = (signal: string) => {
  console.log(`\n${signal} received, closing the session`);
  void sessions
    .closeActive()
    .catch((err) => console.error("Error during shutdown:", err))
    .finally(() => process.exit(130));
};

process.on("SIGINT", () => abort("SIGINT"));
process.on("SIGTERM", () => abort("SIGTERM"));
process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});
process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason);
  process.exit(1);
});

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Enumeration error:", err);
    process.exitCode = 1;
  });
