import assert from "node:assert/strict";
import test from "node:test";

import { parseArgs } from "../src/args";

test("parseArgs reads the summary command and database path", () => {
  assert.deepEqual(parseArgs(["node", "summarizer-perf", "summary", "--db", "metrics.db"]), {
    command: "summary",
    dbPath: "metrics.db"
  });
});

test("parseArgs reads the export output path", () => {
  assert.deepEqual(
    parseArgs(["node", "summarizer-perf", "export", "--db", "metrics.db", "--out", "out/metrics.json"]),
    {
      command: "export",
      dbPath: "metrics.db",
      outPath: "out/metrics.json"
    }
  );
});

test("parseArgs leaves unknown commands undefined and picks up help", () => {
  assert.deepEqual(parseArgs(["node", "summarizer-perf", "replay", "--help"]), {
    command: undefined,
    help: true
  });
});

test("parseArgs ignores a flag with no value", () => {
  assert.deepEqual(parseArgs(["node", "summarizer-perf", "summary", "--db"]), {
    command: "summary"
  });
});
