import { AuthError, VkApiClient } from "../api";
import { loadConfig } from "../config";
import { runFetch, runFiles, runPipeline } from "../core/commands";
import type { CommandContext } from "../core/commands";
import { BulkDownloader } from "../download";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createStore } from "../store";

export type CommandName = "fetch" | "files" | "run";

export interface ParsedCliArgs {
  command: CommandName;
  ownerRef?: string;
  statBeg?: string;
  token?: string;
  configPath?: string;
  verbose: boolean;
  ignoreHttpsErrors: boolean;
}

const HELP_TEXT = `
Usage:
  vk-group-archiver <command> --owner <id|screen_name> [options]

Commands:
  fetch   Dump community content through the API
  files   Download banner, attachments, album photos and documents from the dumps
  run     fetch, then files

  Screen names are resolved through the API, so they need a token. A numeric
  id lets "files" run on existing dumps without one.

Options:
  -o, --owner <ref>      Community id or screen name
  -s, --stat-beg <date>  Also dump statistics since DD/MM/YYYY
  --token <token>        API access token (or VK_ACCESS_TOKEN)
  --config <path>        Optional path to JSON config file
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -v, --verbose          Debug logging
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "fetch" || raw === "files" || raw === "run") {
    return raw;
  }
  return undefined;
}

function readOption(argv: string[], names: string[]): string | undefined {
  for (const name of names) {
    const index = argv.indexOf(name);
    const value = index >= 0 ? argv[index + 1] : undefined;
    // Negative ids are values, not flags.
    if (value && (!value.startsWith("-") || /^-\d+$/.test(value))) {
      return value;
    }
  }
  return undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  return {
    command,
    ownerRef: readOption(argv, ["--owner", "-o"]),
    statBeg: readOption(argv, ["--stat-beg", "-s"]),
    token: readOption(argv, ["--token"]),
    configPath: readOption(argv, ["--config"]),
    verbose: argv.includes("--verbose") || argv.includes("-v"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
  };
}

/** DD/MM/YYYY at local midnight, as a unix timestamp in seconds. */
export function parseStatsStart(raw: string): number | undefined {
  const match = /^(\d{2})\/(\d{2})\/(\d{4})$/.exec(raw.trim());
  if (!match) {
    return undefined;
  }

  const day = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const year = Number.parseInt(match[3], 10);
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return undefined;
  }
  return Math.floor(date.getTime() / 1000);
}

/** SIGINT is a clean stop: dumps and files already written stay on disk. */
export function createStopHandler(logger: Logger, exit: (code: number) => void = (code) => process.exit(code)): () => void {
  return () => {
    logger.info("stopped_by_user");
    exit(0);
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  if (!parsed.ownerRef) {
    console.error("--owner is required");
    return 1;
  }

  let statsFromTimestamp: number | undefined;
  if (parsed.statBeg) {
    statsFromTimestamp = parseStatsStart(parsed.statBeg);
    if (statsFromTimestamp === undefined) {
      console.error(`Failed to read the statistics start date "${parsed.statBeg}", use DD/MM/YYYY`);
      return 1;
    }
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.token) {
    config = { ...config, accessToken: parsed.token };
  }
  if (parsed.ignoreHttpsErrors) {
    config = { ...config, ignoreHttpsErrors: true };
  }
  if (parsed.verbose) {
    config = { ...config, logLevel: "debug" };
  }

  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const context: CommandContext = {
    runId,
    config,
    api: new VkApiClient({ config, logger: logger.child("api"), metrics }),
    store: createStore(config),
    downloader: new BulkDownloader({ config, logger: logger.child("download"), metrics }),
    logger,
    metrics,
  };
  const options = { ownerRef: parsed.ownerRef, statsFromTimestamp };
  const startedAt = Date.now();
  const onStop = createStopHandler(logger);
  process.once("SIGINT", onStop);

  logger.debug("verbose_mode_enabled");
  logger.info("command_start", {
    command: parsed.command,
    ownerRef: parsed.ownerRef,
    statsFromTimestamp,
    dataRoot: config.dataRoot,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    switch (parsed.command) {
      case "fetch":
        await runFetch({ ...context, logger: logger.child("fetch") }, options);
        break;
      case "files":
        await runFiles({ ...context, logger: logger.child("files") }, options);
        break;
      case "run":
        await runPipeline({ ...context, logger: logger.child("pipeline") }, options);
        break;
    }

    logger.info("command_complete", { command: parsed.command, durationMs: Date.now() - startedAt });
    return 0;
  } catch (error) {
    if (error instanceof AuthError) {
      logger.error("auth_failed", { error: error.message, durationMs: Date.now() - startedAt });
      return 1;
    }
    throw error;
  } finally {
    process.off("SIGINT", onStop);
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
