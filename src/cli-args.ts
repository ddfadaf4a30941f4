import { parseArgs } from "node:util";
import { resolvePublisherConfig, type PublisherConfig } from "./config";
import { InvalidArgumentError, errorMessage } from "./errors";
import type { TerminatorMode } from "./types/types";

export const USAGE =
  "Usage: frame-stimulus [--host H] [--port P] [--delimiter none|newline] " +
  "[--min-chunk N] [--max-chunk N] [--jitter-ms N] [--seed N]";

const toNumber = (flag: string, value: string | undefined): number | undefined => {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`--${flag} expects a number, got "${value}"`);
  }
  return parsed;
};

const toTerminator = (value: string | undefined): TerminatorMode | undefined => {
  if (value === undefined) return undefined;
  if (value === "none" || value === "newline") return value;
  throw new InvalidArgumentError(
    `--delimiter must be "none" or "newline", got "${value}"`,
  );
};

const readFlags = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv.filter(arg => arg !== "--"),
      options: {
        host: { type: "string" },
        port: { type: "string" },
        delimiter: { type: "string" },
        "min-chunk": { type: "string" },
        "max-chunk": { type: "string" },
        "jitter-ms": { type: "string" },
        seed: { type: "string" },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new InvalidArgumentError(errorMessage(err));
  }
};

/**
 * Parse command-line flags into a validated configuration.
 */
export function parseCliArgs(argv: string[]): PublisherConfig {
  const values = readFlags(argv);

  return resolvePublisherConfig({
    host: values.host,
    port: toNumber("port", values.port),
    terminator: toTerminator(values.delimiter),
    minChunk: toNumber("min-chunk", values["min-chunk"]),
    maxChunk: toNumber("max-chunk", values["max-chunk"]),
    jitterMs: toNumber("jitter-ms", values["jitter-ms"]),
    seed: toNumber("seed", values.seed),
  });
}
