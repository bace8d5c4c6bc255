#!/usr/bin/env node
import { runCli } from "./run";

try {
  process.exitCode = runCli(process.argv.slice(2), { env: process.env });
} catch (err) {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exitCode = 1;
}
