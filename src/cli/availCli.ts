import { readFileSync } from "fs";
import { rulesFromServiceConfig, type ServiceConfig } from "../infra/config.js";
import { AvailDocumentError } from "../infra/error.js";
import { logger } from "../infra/logger.js";
import { processAvailRequest } from "../services/availPipeline.js";

export const USAGE = "Usage: avail-rq <request.xml | request.json | -> [--enforce-child-accompaniment]";

export interface CliIo {
  readInput(path: string): string;
  stdout(text: string): void;
  stderr(text: string): void;
  now?: Date;
}

export const processIo: CliIo = {
  // "-" reads stdin (fd 0)
  readInput: (path) => readFileSync(path === "-" ? 0 : path, "utf8"),
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

/**
 * Run one request through the pipeline and print the response.
 * Returns the exit code: 0 for any response (priced or `error` body),
 * 1 for bad usage, unreadable input or a malformed document.
 */
export function runAvailCli(argv: string[], serviceConfig: ServiceConfig, io: CliIo = processIo): number {
  const flags = argv.filter((a) => a.startsWith("--"));
  const positional = argv.filter((a) => !a.startsWith("--"));
  const unknown = flags.filter((f) => f !== "--enforce-child-accompaniment");

  if (positional.length !== 1 || unknown.length > 0) {
    io.stderr(USAGE);
    return 1;
  }

  const rules = rulesFromServiceConfig({
    ...serviceConfig,
    features: {
      ...serviceConfig.features,
      enforceChildAccompaniment:
        flags.includes("--enforce-child-accompaniment") || serviceConfig.features.enforceChildAccompaniment,
    },
  });

  try {
    const text = io.readInput(positional[0]);
    io.stdout(processAvailRequest(text, { rules, now: io.now }));
    return 0;
  } catch (err) {
    if (err instanceof AvailDocumentError) {
      logger.error({ issues: err.issues }, err.message);
      io.stderr(err.issues.length > 0 ? `${err.message}\n  ${err.issues.join("\n  ")}` : err.message);
      return 1;
    }
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ err }, "Failed to process availability request");
    io.stderr(message);
    return 1;
  }
}
