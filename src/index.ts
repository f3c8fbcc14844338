#!/usr/bin/env node
import { runCli } from "./cli.js";

runCli(process.argv).catch((err: unknown) => {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
