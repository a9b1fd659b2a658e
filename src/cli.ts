import { config as loadDotenv } from "dotenv";
import { parseArgs } from "node:util";
import { loadConfig, type AppConfig } from "./config.js";
import { createPageFetcher } from "./fetcher.js";
import { createLogger, type Logger } from "./logger.js";
import { runWatcher, type MonitorDeps } from "./monitor.js";
import { buildChannels } from "./notifier.js";
import { startSchedule } from "./scheduler.js";
import { SnapshotStore } from "./store.js";
import { describeError } from "./utils.js";

export const USAGE = `Usage: listing-watcher [--once] [--debug] [--daemon] [--env <file>]

  --once        run a single check and exit (default)
  --debug, -v   verbose logging
  --daemon      keep running and check on CRON_SCHEDULE
  --env <file>  read settings from <file> instead of ./.env
  --help, -h    show this help`;

export interface CliOptions {
  once: boolean;
  debug: boolean;
  daemon: boolean;
  help: boolean;
  envFile?: string;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      once: { type: "boolean", default: false },
      debug: { type: "boolean", short: "v", default: false },
      daemon: { type: "boolean", default: false },
      env: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  if (values.once && values.daemon) {
    throw new Error("--once and --daemon cannot be combined");
  }

  return {
    once: !values.daemon,
    debug: values.debug ?? false,
    daemon: values.daemon ?? false,
    help: values.help ?? false,
    envFile: values.env,
  };
}

function createDeps(config: AppConfig, logger: Logger): MonitorDeps {
  const store = new SnapshotStore(config.STATE_DIR, logger);
  return {
    fetchPage: createPageFetcher({ timeoutMs: config.FETCH_TIMEOUT_MS, userAgent: config.USER_AGENT }),
    store,
    // Resolved per run so a daemon picks up a Telegram chat id that appears later
    channels: () => buildChannels(config, { store, logger }),
    logger,
  };
}

function runDaemon(config: AppConfig, deps: MonitorDeps, logger: Logger): Promise<number> {
  return new Promise((resolve) => {
    logger.info(`Watcher starting. Schedule: ${config.CRON_SCHEDULE}`);
    const schedule = startSchedule(config.CRON_SCHEDULE, () => runWatcher(config, deps), logger);

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, stopping.`);
      schedule.stop();
      resolve(0);
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));

    // Run immediately at startup
    schedule
      .runNow()
      .then(() => logger.debug("Initial run finished."))
      .catch((err: unknown) => logger.error("Initial run error", err));
  });
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    console.error(`${describeError(err)}\n\n${USAGE}`);
    return 2;
  }
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  loadDotenv(options.envFile ? { path: options.envFile } : undefined);
  const logger = createLogger("WATCH", options.debug);

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    logger.error(describeError(err));
    return 1;
  }

  const deps = createDeps(config, logger);
  if (options.daemon) return runDaemon(config, deps, logger);
  return runWatcher(config, deps);
}
