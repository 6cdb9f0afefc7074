#!/usr/bin/env node
import "reflect-metadata";
import { INestApplicationContext, Logger, LogLevel } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { Command, InvalidArgumentError } from "commander";
import { AppModule } from "./app.module";
import { CollectorService } from "./collector/collector.service";
import { WaitTimeStoreService } from "./queue-data/wait-time-store.service";
import {
  ConfigurationError,
  describeError,
} from "./common/errors/collector.errors";
import { formatStatusReport, toStatusJson } from "./commands/status-report";

const EXIT_CONFIGURATION_ERROR = 2;

const logger = new Logger("WaitCollector");

function parseParkId(value: string, previous: number[] = []): number[] {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new InvalidArgumentError("Park id must be a positive integer.");
  }
  return [...previous, id];
}

async function withContext<T>(
  logLevels: LogLevel[],
  work: (app: INestApplicationContext) => Promise<T>,
): Promise<T> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevels,
    abortOnError: false,
  });

  try {
    return await work(app);
  } finally {
    await app.close();
  }
}

function buildProgram(): Command {
  const program = new Command();

  program
    .name("wait-collector")
    .description("Collects ride wait times from Queue-Times.com into SQLite")
    .version("1.0.0");

  program
    .command("collect")
    .description("Run one collection cycle for the tracked parks")
    .option("-p, --park <id...>", "Only collect these park ids", parseParkId)
    .option("-v, --verbose", "Enable debug logging", false)
    .action(async (options: { park?: number[]; verbose: boolean }) => {
      const levels: LogLevel[] = options.verbose
        ? ["log", "error", "warn", "debug"]
        : ["log", "error", "warn"];

      const summary = await withContext(levels, (app) =>
        app.get(CollectorService).run({ parkIds: options.park }),
      );

      for (const result of summary.results) {
        if (result.state === "failed") {
          console.error(
            `❌ ${result.parkName} (${result.parkId}) failed in ${result.failedIn}: ${result.failure.cause}`,
          );
        }
      }
      process.exitCode = summary.exitCode;
    });

  program
    .command("status")
    .description("Show the newest observation per park and row counts")
    .option("--json", "Print machine-readable JSON", false)
    .action(async (options: { json: boolean }) => {
      const report = await withContext(["error", "warn"], async (app) => {
        const store = app.get(WaitTimeStoreService);
        return { parks: await store.status(), counts: await store.counts() };
      });

      if (options.json) {
        console.log(toStatusJson(report));
        return;
      }
      for (const line of formatStatusReport(report)) {
        console.log(line);
      }
    });

  return program;
}

async function main(argv: string[]): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`Configuration error: ${error.message}`);
      process.exitCode = EXIT_CONFIGURATION_ERROR;
      return;
    }
    logger.error(`Unexpected failure: ${describeError(error)}`);
    process.exitCode = 1;
  }
}

void main(process.argv);
