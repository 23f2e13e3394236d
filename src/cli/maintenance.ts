/**
 * Queue maintenance CLI.
 *
 * Usage: npm run maintenance -- [options]
 *
 *   --clear-all      delete every status, lease and queued job
 *   --clean-failed   delete failed statuses older than --age minutes
 *   --reap           mark processing jobs without a live lease as failed
 *   --age <minutes>  age for --clean-failed and the loop (default 5)
 *   --loop           run clean + reap every minute until interrupted (default)
 */
import config from "../config";
import { logger } from "../monitoring/logger";
import { QueueClient } from "../queue/queue.client";
import { cleanFailedJobs, reapAbandonedJobs } from "../queue/queue.maintenance";
import { MaintenanceScheduler, reapGraceMs } from "../scheduler/maintenance.scheduler";
import { errorMessage } from "../shared/errors/service.error";

export type MaintenanceCommand = "clear-all" | "clean-failed" | "reap" | "loop";

export interface CliOptions {
  command: MaintenanceCommand;
  ageMinutes: number;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/** The first action flag wins; no action flag means --loop */
export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { command: "loop", ageMinutes: 5, help: false };
  let command: MaintenanceCommand | null = null;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--clear-all":
        command ??= "clear-all";
        break;
      case "--clean-failed":
        command ??= "clean-failed";
        break;
      case "--reap":
        command ??= "reap";
        break;
      case "--loop":
        command ??= "loop";
        break;
      case "--age": {
        const raw = argv[++i] ?? "";
        const age = parseInt(raw, 10);
        if (Number.isNaN(age) || age < 0) {
          throw new CliUsageError(`--age expects a number of minutes, got "${raw}"`);
        }
        opts.ageMinutes = age;
        break;
      }
      case "--help":
      case "-h":
        opts.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  opts.command = command ?? "loop";
  return opts;
}

function printUsage(): void {
  console.error(`
Usage: npm run maintenance -- [options]

Options:
  --clear-all        Delete every job status, lease and queued job
  --clean-failed     Delete failed jobs older than --age minutes
  --reap             Fail processing jobs whose worker lease expired
  --age <minutes>    Age for failed-job cleanup (default: 5)
  --loop             Clean and reap every minute until interrupted (default)
  --help, -h         Show this help
`);
}

async function runOnce(client: QueueClient, opts: CliOptions): Promise<void> {
  switch (opts.command) {
    case "clear-all": {
      const deleted = await client.clearAll([config.pwmrQueue]);
      logger.info({ keys: deleted }, "Cleared all queue data");
      break;
    }
    case "clean-failed": {
      const removed = await cleanFailedJobs(client, opts.ageMinutes);
      logger.info({ count: removed.length }, `Cleaned up ${removed.length} failed job(s)`);
      break;
    }
    case "reap": {
      const reaped = await reapAbandonedJobs(client, reapGraceMs());
      logger.info({ count: reaped.length }, `Reaped ${reaped.length} abandoned job(s)`);
      break;
    }
    case "loop":
      break;
  }
}

async function main(): Promise<void> {
  let opts: CliOptions;
  try {
    opts = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(errorMessage(error));
    printUsage();
    process.exit(1);
  }
  if (opts.help) {
    printUsage();
    return;
  }

  const client = new QueueClient();

  if (opts.command !== "loop") {
    try {
      await runOnce(client, opts);
    } finally {
      await client.close();
    }
    return;
  }

  const scheduler = new MaintenanceScheduler(client, opts.ageMinutes);
  await scheduler.runCycle();
  scheduler.start();

  const shutdown = (): void => {
    logger.info("Stopping maintenance loop");
    scheduler.stop();
    client
      .close()
      .catch((error: unknown) => {
        logger.warn({ error: errorMessage(error) }, "Queue close failed");
      })
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.fatal({ error: errorMessage(error) }, "Maintenance failed");
    process.exit(1);
  });
}
