#!/usr/bin/env -S node --import tsx
import { CliUsageError, runAgent, usage } from "../src/cli";

runAgent().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${message}\n`);
  if (err instanceof CliUsageError) {
    process.stderr.write(`${usage()}\n`);
    process.exit(2);
  }
  process.exit(1);
});
