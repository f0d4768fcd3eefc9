import { OperationCancelledError } from "../api/errors";
import { loadConfig } from "../config";
import {
  createCommandContext,
  runCleanupDownloads,
  runDiscoverBatches,
  runDiscoverFacets,
  runDiscoverIssues,
  runDiscoverPeriodicals,
  runDownload,
  runEnqueueFacet,
  runFixFacets,
  runPlanFacets,
  runPlanStateFacets,
  runPopulateQueue,
  runRetryFailed,
  runStatus,
} from "../core/commands";
import { FORCED_EXIT_CODE, ShutdownController } from "../core/shutdown";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createStore } from "../store";

const COMMANDS = [
  "discover-periodicals",
  "discover-issues",
  "plan-facets",
  "plan-state-facets",
  "discover-facets",
  "enqueue-facet",
  "populate-queue",
  "discover-batches",
  "fix-facets",
  "download",
  "retry-failed",
  "cleanup-downloads",
  "status",
] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  ignoreHttpsErrors: boolean;
  maxPages?: number;
  maxItems?: number;
  lccn?: string;
  startYear?: number;
  endYear?: number;
  yearsPerFacet?: number;
  estimate: boolean;
  states?: string[];
  facetId?: number;
  batchSize?: number;
  maxBatches?: number;
  autoEnqueue: boolean;
  session?: string;
  continuous: boolean;
  maxIdleMinutes?: number;
  dryRun: boolean;
}

const HELP_TEXT = `
Usage:
  newsarchive <command> [options]

Commands:
  discover-periodicals [--max-pages <n>]
  discover-issues --lccn <id>
  plan-facets --start-year <y> --end-year <y> [--years-per-facet <n>] [--estimate]
  plan-state-facets [--states <a,b>]
  discover-facets [--facet-id <n>] [--batch-size <n>] [--max-items <n>]
  enqueue-facet --facet-id <n> [--max-items <n>]
  populate-queue [--max-items <n>]
  discover-batches [--max-batches <n>] [--auto-enqueue] [--session <name>]
  fix-facets
  download [--max-items <n>] [--continuous] [--max-idle-minutes <n>] [--dry-run]
  retry-failed
  cleanup-downloads
  status

Options:
  --config <path>        Optional path to JSON config file
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help

A first Ctrl-C stops after the current unit of work; a second one exits at once.
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

function intOption(argv: string[], flag: string): number | undefined {
  const raw = optionValue(argv, flag);
  const parsed = raw ? Number.parseInt(raw, 10) : Number.NaN;
  return Number.isFinite(parsed) ? parsed : undefined;
}

function floatOption(argv: string[], flag: string): number | undefined {
  const raw = optionValue(argv, flag);
  const parsed = raw ? Number.parseFloat(raw) : Number.NaN;
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const states = optionValue(argv, "--states")
    ?.split(",")
    .map((state) => state.trim())
    .filter((state) => state.length > 0);

  return {
    command,
    configPath: optionValue(argv, "--config"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    maxPages: intOption(argv, "--max-pages"),
    maxItems: intOption(argv, "--max-items"),
    lccn: optionValue(argv, "--lccn"),
    startYear: intOption(argv, "--start-year"),
    endYear: intOption(argv, "--end-year"),
    yearsPerFacet: intOption(argv, "--years-per-facet"),
    estimate: argv.includes("--estimate"),
    states: states && states.length > 0 ? states : undefined,
    facetId: intOption(argv, "--facet-id"),
    batchSize: intOption(argv, "--batch-size"),
    maxBatches: intOption(argv, "--max-batches"),
    autoEnqueue: argv.includes("--auto-enqueue"),
    session: optionValue(argv, "--session"),
    continuous: argv.includes("--continuous"),
    maxIdleMinutes: floatOption(argv, "--max-idle-minutes"),
    dryRun: argv.includes("--dry-run"),
  };
}

/** Names the first required option a command is missing, if any. */
export function missingOption(parsed: ParsedCliArgs): string | undefined {
  switch (parsed.command) {
    case "discover-issues":
      return parsed.lccn ? undefined : "--lccn";
    case "plan-facets":
      if (parsed.startYear === undefined) {
        return "--start-year";
      }
      return parsed.endYear === undefined ? "--end-year" : undefined;
    case "enqueue-facet":
      return parsed.facetId === undefined ? "--facet-id" : undefined;
    default:
      return undefined;
  }
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }
  const missing = missingOption(parsed);
  if (missing) {
    console.error(`${parsed.command} requires ${missing}`);
    return 1;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }
  const runId = createRunId();
  const logger = new Logger({ component: "cli", runId, level: config.logLevel });
  const metrics = new MetricsRegistry();
  const shutdown = new ShutdownController({ logger: logger.child("shutdown"), forceExitTimeoutMs: config.forceExitTimeoutMs });
  const store = createStore(config);
  const base = createCommandContext({ runId, config, store, logger, metrics, shutdown });
  const context = { ...base, logger: logger.child(parsed.command) };

  logger.info("command_start", {
    command: parsed.command,
    baseUrl: config.baseUrl,
    storePath: config.storePath,
    requestDelayMs: base.client.requestDelayMs,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });
  shutdown.install();

  try {
    switch (parsed.command) {
      case "discover-periodicals":
        await runDiscoverPeriodicals(context, parsed.maxPages);
        break;
      case "discover-issues":
        await runDiscoverIssues(context, parsed.lccn ?? "");
        break;
      case "plan-facets":
        await runPlanFacets(context, parsed.startYear ?? 0, parsed.endYear ?? 0, parsed.yearsPerFacet, parsed.estimate);
        break;
      case "plan-state-facets":
        await runPlanStateFacets(context, parsed.states);
        break;
      case "discover-facets":
        await runDiscoverFacets(context, parsed.facetId, parsed.batchSize, parsed.maxItems);
        break;
      case "enqueue-facet":
        await runEnqueueFacet(context, parsed.facetId ?? 0, parsed.maxItems);
        break;
      case "populate-queue":
        await runPopulateQueue(context, parsed.maxItems);
        break;
      case "discover-batches":
        await runDiscoverBatches(context, {
          sessionName: parsed.session,
          maxBatches: parsed.maxBatches,
          autoEnqueue: parsed.autoEnqueue,
        });
        break;
      case "fix-facets":
        await runFixFacets(context);
        break;
      case "download":
        await runDownload(context, {
          maxItems: parsed.maxItems,
          continuous: parsed.continuous,
          maxIdleMinutes: parsed.maxIdleMinutes,
          dryRun: parsed.dryRun,
        });
        break;
      case "retry-failed":
        await runRetryFailed(context);
        break;
      case "cleanup-downloads":
        await runCleanupDownloads(context);
        break;
      case "status":
        await runStatus(context);
        break;
      default: {
        const exhaustive: never = parsed.command;
        console.error(`Unsupported command: ${String(exhaustive)}`);
        return 1;
      }
    }

    if (shutdown.requested) {
      logger.warn("command_interrupted", { command: parsed.command });
      return FORCED_EXIT_CODE;
    }
    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    if (error instanceof OperationCancelledError) {
      logger.warn("command_interrupted", { command: parsed.command, error: error.message });
      return FORCED_EXIT_CODE;
    }
    throw error;
  } finally {
    shutdown.dispose();
    await store.close();
    metrics.logSummary(logger);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
