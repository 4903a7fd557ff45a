#!/usr/bin/env node
import { runCli } from "./cli-program";

void runCli(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
