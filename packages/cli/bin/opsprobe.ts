#!/usr/bin/env -S node --import tsx
/**
 * Thin wrapper that launches the CLI from its TypeScript sources through tsx.
 * Used by the `opsprobe` bin entry and `npm start`.
 */
import { runCli } from '../src/runner.js';

runCli(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.exitCode = 1;
    if (error instanceof Error && error.message) {
      console.error(error.message);
      return;
    }

    console.error(String(error));
  });
