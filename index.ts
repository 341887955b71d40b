#!/usr/bin/env node
/**
 * policy-gate — CLI entry point
 *
 * Wires the command set to process stdio and picks the decision store:
 * in-memory under NODE_ENV=test, SQLite otherwise.
 */

import { runGateCli } from "./src/cli.js";
import { errorMessage } from "./src/errors.js";
import { InMemoryDecisionStore, SQLiteDecisionStore } from "./src/storage.js";
import type { DecisionStore } from "./src/types.js";

const useMemory = process.env.NODE_ENV === "test";

try {
  process.exitCode = await runGateCli(process.argv, {
    io: {
      out: (text) => process.stdout.write(`${text}\n`),
      err: (text) => process.stderr.write(`${text}\n`),
    },
    createStore: (config): DecisionStore =>
      useMemory ? new InMemoryDecisionStore() : new SQLiteDecisionStore(config.storePath),
  });
} catch (err) {
  process.stderr.write(`policy-gate: unexpected failure: ${errorMessage(err)}\n`);
  process.exitCode = 3;
}
