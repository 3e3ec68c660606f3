import type { Readable } from "node:stream";
import { analyseStream, type AnalyseDeps } from "./analysis.ts";
import { config } from "./config.ts";
import { drugRules } from "./drugRules.ts";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  openFile(path: string): Readable;
  serve(port: number): void;
}

export const USAGE = [
  "Usage:",
  "  genorisk analyse <file.vcf> [drugs]   print drug reports as JSON (default: every supported drug)",
  "  genorisk serve [--port <n>]           start the HTTP API",
].join("\n");

function parsePort(args: readonly string[]): number | null {
  const idx = args.indexOf("--port");
  if (idx === -1) return config.PORT;
  const port = Number(args[idx + 1]);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : null;
}

/** Runs one command and resolves to the process exit code. */
export async function runCli(argv: readonly string[], io: CliIO, deps: AnalyseDeps = {}): Promise<number> {
  const [command, ...args] = argv;

  switch (command) {
    case "analyse":
    case "analyze": {
      const [file, drugs = drugRules.supportedDrugs.join(",")] = args;
      if (!file) {
        io.err(USAGE);
        return 2;
      }
      if (!file.endsWith(".vcf")) {
        io.err("File must be a .vcf file");
        return 2;
      }
      try {
        const reports = await analyseStream(io.openFile(file), drugs, deps);
        io.out(JSON.stringify(reports, null, 2));
        return 0;
      } catch (err) {
        io.err(`analysis failed: ${err instanceof Error ? err.message : String(err)}`);
        return 1;
      }
    }

    case "serve": {
      const port = parsePort(args);
      if (port === null) {
        io.err("--port must be an integer between 1 and 65535");
        return 2;
      }
      io.serve(port);
      return 0;
    }

    case "help":
    case "--help":
    case "-h":
      io.out(USAGE);
      return 0;

    case undefined:
      io.err(USAGE);
      return 2;

    default:
      io.err(`Unknown command: ${command}\n${USAGE}`);
      return 2;
  }
}
