#!/usr/bin/env tsx
import { runCli } from "./program";

runCli(process.argv.slice(2), { cwd: process.cwd() }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
