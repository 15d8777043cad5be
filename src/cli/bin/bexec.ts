// src/cli/bin/bexec.ts
// CLI bootstrap (executes the parser).
import { runCli } from '..';

void runCli().then((code) => {
  process.exitCode = code;
});
