#!/usr/bin/env node
import { createProgram } from "./program.js";

const program = createProgram({
  // eslint-disable-next-line no-console
  log: (line) => console.log(line),
});

void program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  // eslint-disable-next-line no-console
  console.error(`error: ${message}`);
  process.exitCode = 1;
});
