import type { RuntimeCommand, RuntimeParsedArgs } from "./types";

function isRuntimeCommand(value: string | undefined): value is RuntimeCommand {
  return value === "summary" || value === "export";
}

export function parseArgs(argv: readonly string[]): RuntimeParsedArgs {
  const commandCandidate = argv[2];
  const command = isRuntimeCommand(commandCandidate) ? commandCandidate : undefined;

  let dbPath: string | undefined;
  let outPath: string | undefined;
  let help = false;

  for (let i = 2; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "--help" || token === "-h") {
      help = true;
      continue;
    }
    if (token === "--db") {
      const value = argv[i + 1];
      if (typeof value === "string" && value.length > 0) {
        dbPath = value;
      }
      i += 1;
      continue;
    }
    if (token === "--out") {
      const value = argv[i + 1];
      if (typeof value === "string" && value.length > 0) {
        outPath = value;
      }
      i += 1;
      continue;
    }
  }

  return {
    command,
    ...(dbPath !== undefined ? { dbPath } : {}),
    ...(outPath !== undefined ? { outPath } : {}),
    ...(help ? { help: true } : {})
  };
}
