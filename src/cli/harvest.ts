#!/usr/bin/env node
import type { HarvestResult } from "../application/harvest/harvest.usecase";
import { runHarvests } from "../composition/root";
import { describeTarget, parseFetchTarget, type FetchTarget } from "../core/target/fetchTarget";
import { loadEnv } from "../shared/config/env";

type ErrorContext = Partial<{
  status: number;
  page: number;
  url: string;
  path: string;
}>;

type CliErrorEnvelope = {
  event: "harvest.cli_failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  stack?: string;
};

export type CliArgs = {
  targets: FetchTarget[];
  progress: boolean;
};

const usage = "Usage: github-harvester <followers|contributors|forks>[:<identity>] [...] [--progress]";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of ["status", "page"] as const) {
    const raw = value[key];
    if (typeof raw === "number" && Number.isFinite(raw)) sanitizedContext[key] = raw;
  }
  for (const key of ["url", "path"] as const) {
    const raw = value[key];
    if (typeof raw === "string") sanitizedContext[key] = raw;
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "harvest.cli_failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const parseCliArgs = (argv: readonly string[], defaultUsername?: string): CliArgs => {
  const progress = argv.includes("--progress");
  const unknownFlag = argv.find((arg) => arg.startsWith("--") && arg !== "--progress");
  if (unknownFlag) throw new Error(`Unknown option ${unknownFlag}. ${usage}`);

  const targets = argv.filter((arg) => !arg.startsWith("--")).map((arg) => parseFetchTarget(arg, defaultUsername));
  if (targets.length === 0) throw new Error(`No harvest target given. ${usage}`);

  return { targets, progress };
};

const toResultLine = (result: HarvestResult) =>
  result.status === "completed"
    ? {
        event: "harvest.result",
        status: result.status,
        target: describeTarget(result.target),
        exportPath: result.exportPath,
        recordCount: result.recordCount
      }
    : {
        event: "harvest.result",
        status: result.status,
        target: describeTarget(result.target),
        code: result.code,
        reason: result.reason,
        recordCount: result.recordCount,
        partialExportPath: result.partialExportPath ?? null
      };

/** Prints one result line per job; exits 1 when any job failed. */
export const executeHarvestCli = async (argv: readonly string[] = process.argv.slice(2)): Promise<void> => {
  let anyFailed = false;
  const controller = new AbortController();
  const abandon = () => controller.abort();
  process.once("SIGINT", abandon);

  try {
    const args = parseCliArgs(argv, loadEnv().GITHUB_USERNAME);
    const results = await runHarvests(args.targets, {
      signal: controller.signal,
      onProgress: args.progress
        ? (update) => {
            // eslint-disable-next-line no-console
            console.log(JSON.stringify({ event: "harvest.progress", ...update }));
          }
        : undefined
    });

    for (const result of results) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(toResultLine(result)));
    }
    anyFailed = results.some((result) => result.status === "failed");
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    anyFailed = true;
  } finally {
    process.removeListener("SIGINT", abandon);
  }

  if (anyFailed) process.exit(1);
};

if (require.main === module) {
  void executeHarvestCli();
}
