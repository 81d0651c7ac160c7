#!/usr/bin/env node
import { parseArgs } from "./args";
import { runExport, runSummary } from "./commands";

function printUsage(): void {
  process.stdout.write(
    "\nusage: summarizer-perf <command> --db <path>\n\n" +
      "commands:\n" +
      "  summary       print aggregate statistics for a stored metrics database\n" +
      "  export        print every stored entry as a JSON array\n\n" +
      "options:\n" +
      "  --db <path>   sqlite metrics database (required)\n" +
      "  --out <path>  write the export to a file instead of stdout\n" +
      "\n"
  );
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);

  if (args.help === true || args.command === undefined) {
    printUsage();
    if (args.help !== true) {
      process.exitCode = 1;
    }
    return;
  }

  if (args.dbPath === undefined) {
    process.stderr.write("--db <path> is required\n");
    process.exitCode = 1;
    return;
  }

  if (args.command === "summary") {
    const result = runSummary(args.dbPath);
    if (!result.ok) {
      process.stderr.write(`${JSON.stringify(result, null, 2)}\n`);
      process.exitCode = 1;
      return;
    }
    process.stdout.write(`${JSON.stringify(result.value, null, 2)}\n`);
    return;
  }

  const result = runExport(args.dbPath, args.outPath);
  if (!result.ok) {
    process.stderr.write(`${JSON.stringify(result, null, 2)}\n`);
    process.exitCode = 1;
    return;
  }
  process.stdout.write(`${JSON.stringify(result.value.entries ?? result.value, null, 2)}\n`);
}

void main().catch((error: unknown) => {
  process.stderr.write(`${String(error)}\n`);
  process.exit(1);
});
