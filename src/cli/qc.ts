#!/usr/bin/env node
/**
 * Command line front end for preflight planning and article QC.
 *
 * Runs against the in-memory collaborators built from a fixtures file, so
 * every command works offline.
 *
 * Usage:
 *   npx tsx src/cli/qc.ts preflight --order <file|id> [--out <file>] [--json]
 *   npx tsx src/cli/qc.ts validate --article <file> --matrix <file> [--auto-fix] [--out <file>] [--json]
 *   npx tsx src/cli/qc.ts run [--order <id>] [--concurrency <n>] [--auto-fix] [--json]
 *
 * Commands:
 *   preflight   Build the matrix for one order and print the writer brief
 *   validate    Score an article against a stored matrix
 *   run         Take fixture orders through a full order cycle
 *
 * Options:
 *   --fixtures <path>    Fixtures file (default: data/sample-fixtures.json)
 *   --order <file|id>    Order JSON file, or the id of a fixture order
 *   --article <path>     Article markdown to score
 *   --matrix <path>      Matrix JSON written by `preflight --out`
 *   --out <path>         preflight: write the matrix; validate: write the article as scored
 *   --auto-fix           Allow one automatic fix before the final report
 *   --concurrency <n>    Orders in flight for `run` (default: WORKER_CONCURRENCY)
 *   --json               Output JSON instead of text
 *   -h, --help           Show help
 *
 * Environment:
 *   RUN_ID               Run id to log under instead of a fresh one
 *   See .env.example for the rest (LOG_LEVEL, WORKER_CONCURRENCY, ...)
 *
 * Exit codes:
 *   0 - Matrix built, article APPROVED, or every order completed
 *   1 - Anything else
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { parseArgs } from "node:util";

import { loadAppConfig, validateConfig, type AppConfig } from "../config/index.js";
import { DEFAULT_QC_POLICY } from "../config/qc/defaults.js";
import { loadQcPolicy } from "../config/qc/loader.js";
import { createLogger, initRunId, isLogLevel, type Logger } from "../logging/index.js";
import { RuleTableLemmatizer } from "../lexical/lemmatizer.js";
import { createOrderRecord } from "../orders/machine.js";
import {
  InMemoryCollaborators,
  OrderLeaseManager,
  OrderPipeline,
  PreflightService,
  loadSampleFixtures,
  runBatch,
  type BatchOutcome,
  type LoadedFixtures,
} from "../pipeline/index.js";
import { createWriterBrief, formatWriterBrief } from "../preflight/brief.js";
import { parsePreflightMatrix } from "../preflight/builder.js";
import { OrderSchema, type Order } from "../preflight/schema.js";
import { formatValidationReport } from "../qc/format.js";
import {
  loadReferenceData,
  loadTrustRegistryFile,
  readJsonFile,
  type ReferenceData,
} from "../reference/loader.js";
import { PreflightError } from "../types/errors.js";

// ============================================================
// Types
// ============================================================

export type CliCommand = "preflight" | "validate" | "run";

export interface CliArgs {
  command: CliCommand;
  fixtures?: string;
  order?: string;
  article?: string;
  matrix?: string;
  out?: string;
  autoFix: boolean;
  concurrency?: number;
  json: boolean;
}

/** Where command output goes; console by default, a buffer in tests. */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDeps {
  io?: CliIO;
  logger?: Logger;
  config?: AppConfig;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const COMMANDS: readonly CliCommand[] = ["preflight", "validate", "run"];

const CONSOLE_IO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

// ============================================================
// Colors
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
} as const;

const useColors = process.stdout.isTTY === true && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function header(io: CliIO, title: string): void {
  io.out(c("bold", "═".repeat(60)));
  io.out(c("bold", `  ${title}`));
  io.out(c("bold", "═".repeat(60)));
}

// ============================================================
// Argument Parsing
// ============================================================

const USAGE = `Usage:
  qc preflight --order <file|id> [--out <file>] [--json]
  qc validate --article <file> --matrix <file> [--auto-fix] [--out <file>] [--json]
  qc run [--order <id>] [--concurrency <n>] [--auto-fix] [--json]

Options:
  --fixtures <path>    Fixtures file (default: data/sample-fixtures.json)
  -h, --help           Show help`;

function isCommand(value: string | undefined): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse argv (without the node and script entries).
 *
 * @returns null when help was asked for
 * @throws CliUsageError for an unknown command, a missing required option
 *   or a bad number
 */
export function parseCliArgs(argv: string[]): CliArgs | null {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      fixtures: { type: "string" },
      order: { type: "string" },
      article: { type: "string" },
      matrix: { type: "string" },
      out: { type: "string" },
      "auto-fix": { type: "boolean", default: false },
      concurrency: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    return null;
  }

  const [command] = positionals;
  if (!isCommand(command)) {
    throw new CliUsageError(
      command === undefined ? "A command is required" : `Unknown command: ${command}`
    );
  }

  let concurrency: number | undefined;
  if (values.concurrency !== undefined) {
    concurrency = Number(values.concurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new CliUsageError(`--concurrency must be a positive integer, got ${values.concurrency}`);
    }
  }

  const args: CliArgs = {
    command,
    fixtures: values.fixtures,
    order: values.order,
    article: values.article,
    matrix: values.matrix,
    out: values.out,
    autoFix: values["auto-fix"] === true,
    concurrency,
    json: values.json === true,
  };

  if (command === "preflight" && args.order === undefined) {
    throw new CliUsageError("--order is required for preflight");
  }
  if (command === "validate") {
    if (args.article === undefined) {
      throw new CliUsageError("--article is required for validate");
    }
    if (args.matrix === undefined) {
      throw new CliUsageError("--matrix is required for validate");
    }
  }
  return args;
}

/**
 * An order from a JSON file when the value names one, else the fixture
 * order with that id.
 *
 * @throws PreflightError INVALID_ORDER for a file that fails the schema
 * @throws CliUsageError for an id the fixtures do not have
 */
export function resolveOrder(value: string, loaded: LoadedFixtures): Order {
  if (existsSync(value)) {
    const result = OrderSchema.safeParse(readJsonFile(value));
    if (!result.success) {
      const [first] = result.error.issues;
      throw new PreflightError(
        "INVALID_ORDER",
        `Order file ${value} is invalid: ${first ? `${first.path.join(".")}: ${first.message}` : "unknown"}`,
        { path: value }
      );
    }
    return result.data;
  }
  const order = loaded.fixtures.orders.find((candidate) => candidate.id === value);
  if (order === undefined) {
    throw new CliUsageError(`No order file or fixture order named ${value}`);
  }
  return order;
}

/** One line per batch outcome: id, status, final state and last reason. */
export function formatBatchLine(outcome: BatchOutcome): string {
  if (outcome.record === undefined) {
    const error = outcome.error;
    return `${outcome.orderId}  ${outcome.status}  ${error ? `${error.kind}: ${error.message}` : "no record"}`;
  }
  const last = outcome.record.history[outcome.record.history.length - 1];
  const reason = last?.reason === undefined ? "" : `  ${last.reason}`;
  return `${outcome.orderId}  ${outcome.status}  ${outcome.record.state}${reason}`;
}

// ============================================================
// Runtime
// ============================================================

interface Runtime {
  loaded: LoadedFixtures;
  reference: ReferenceData;
  service: PreflightService;
  pipeline(autoFix: boolean): OrderPipeline;
}

function createRuntime(args: CliArgs, config: AppConfig, logger: Logger): Runtime {
  const reference = loadReferenceData();
  const registry = loadTrustRegistryFile();
  const policy = loadQcPolicy(DEFAULT_QC_POLICY);
  const lemmatizer = new RuleTableLemmatizer(reference.lemmaRules);
  const loaded = args.fixtures === undefined ? loadSampleFixtures() : loadSampleFixtures(args.fixtures);
  const collaborators = new InMemoryCollaborators(loaded, registry);
  const service = new PreflightService({
    collaborators,
    reference,
    policy,
    lemmatizer,
    timeoutMs: config.collectorTimeoutMs,
    logger,
  });
  const leases = new OrderLeaseManager(config.leaseTtlMs);

  return {
    loaded,
    reference,
    service,
    pipeline: (autoFix) =>
      new OrderPipeline({
        service,
        collaborators,
        leases,
        reference,
        timeoutMs: config.collectorTimeoutMs,
        autoFix,
        workerId: config.appName,
        logger,
      }),
  };
}

// ============================================================
// Commands
// ============================================================

async function preflightCommand(args: CliArgs, runtime: Runtime, io: CliIO): Promise<number> {
  const order = resolveOrder(args.order ?? "", runtime.loaded);
  const result = await runtime.service.buildPreflight(order);
  if (!result.success) {
    io.err(c("red", `Preflight failed: ${result.error.kind}: ${result.error.message}`));
    return 1;
  }

  const matrix = result.value;
  if (args.out !== undefined) {
    writeFileSync(args.out, `${JSON.stringify(matrix, null, 2)}\n`, "utf-8");
  }

  if (args.json) {
    io.out(JSON.stringify(matrix, null, 2));
    return 0;
  }

  header(io, `PREFLIGHT: ${order.id}`);
  io.out(formatWriterBrief(createWriterBrief(order, matrix, runtime.reference.rulebook)));
  io.out("");
  io.out(`Fingerprint: ${matrix.inputFingerprint}`);
  if (args.out !== undefined) {
    io.out(c("dim", `Matrix written to ${args.out}`));
  }
  return 0;
}

async function validateCommand(args: CliArgs, runtime: Runtime, io: CliIO): Promise<number> {
  const matrix = parsePreflightMatrix(readJsonFile(args.matrix ?? ""));
  const articleText = readFileSync(args.article ?? "", "utf-8");

  const result = await runtime.service.validate(articleText, matrix, args.autoFix);
  if (!result.success) {
    io.err(c("red", `Validation failed: ${result.error.kind}: ${result.error.message}`));
    return 1;
  }

  const { report, article } = result.value;
  if (args.out !== undefined) {
    writeFileSync(args.out, article, "utf-8");
  }

  if (args.json) {
    io.out(JSON.stringify(report, null, 2));
  } else {
    header(io, `QC: ${matrix.orderId}`);
    io.out(formatValidationReport(report));
    const color = report.status === "APPROVED" ? "green" : report.status === "BLOCKED" ? "red" : "yellow";
    io.out("");
    io.out(c(color, `Status: ${report.status}`));
  }
  return report.status === "APPROVED" ? 0 : 1;
}

async function runCommand(
  args: CliArgs,
  runtime: Runtime,
  io: CliIO,
  config: AppConfig
): Promise<number> {
  const orders =
    args.order === undefined
      ? runtime.loaded.fixtures.orders
      : [resolveOrder(args.order, runtime.loaded)];

  const outcomes = await runBatch(
    orders.map((order) => ({ record: createOrderRecord(order.id), order })),
    runtime.pipeline(args.autoFix),
    { concurrency: args.concurrency ?? config.workerConcurrency }
  );

  if (args.json) {
    io.out(JSON.stringify(outcomes, null, 2));
  } else {
    header(io, `ORDER RUN: ${outcomes.length} order(s)`);
    for (const outcome of outcomes) {
      const line = formatBatchLine(outcome);
      io.out(outcome.status === "COMPLETED" ? c("green", line) : c("red", line));
    }
  }
  return outcomes.every((outcome) => outcome.status === "COMPLETED") ? 0 : 1;
}

// ============================================================
// Entry
// ============================================================

/**
 * Run one command and return its exit code. Usage errors print the usage
 * text; anything else thrown propagates to the caller.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? CONSOLE_IO;

  let args: CliArgs | null;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    io.err(c("red", `Error: ${message}`));
    io.err(USAGE);
    return 1;
  }
  if (args === null) {
    io.out(USAGE);
    return 0;
  }

  const config = deps.config ?? loadAppConfig();
  validateConfig(config);
  const logger =
    deps.logger ??
    createLogger({
      level: isLogLevel(config.logLevel) ? config.logLevel : "info",
      file: config.logToFile,
      logDir: config.logDir,
      scope: config.appName,
    });

  const runtime = createRuntime(args, config, logger);
  switch (args.command) {
    case "preflight":
      return preflightCommand(args, runtime, io);
    case "validate":
      return validateCommand(args, runtime, io);
    case "run":
      return runCommand(args, runtime, io, config);
  }
}

async function main(): Promise<void> {
  initRunId(process.env.RUN_ID || undefined);
  const code = await runCli(process.argv.slice(2));
  process.exit(code);
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("qc.ts") ||
   process.argv[1].endsWith("qc.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Error: ${message}`));
    process.exit(1);
  });
}
