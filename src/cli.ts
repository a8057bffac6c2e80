#!/usr/bin/env node
import { Command, Option } from "commander";

import { collectId, exitCodeFor, resolveIds, toPositiveInt } from "./cliArgs.js";
import { getConfig } from "./config.js";
import { openDb } from "./db/db.js";
import { runPipeline } from "./etl/pipeline.js";
import { createJsonFetcher } from "./http/fetcher.js";
import { log } from "./logger.js";
import { createPokeApiClient } from "./pokeapi/client.js";
import { countRows, createLoader } from "./storage/loader.js";

type RunCommandOptions = {
  ids?: number[];
  startId?: number;
  endId?: number;
  db?: string;
  failOnError: boolean;
};

type StatsCommandOptions = {
  db?: string;
};

const program = new Command();
program
  .name("pokepipeline")
  .description("Fetch Pokémon from PokéAPI, normalize them and load them into SQLite");

program
  .command("run", { isDefault: true })
  .description("Fetch, transform and load a set of Pokémon ids (default: 1-20)")
  .addOption(new Option("--ids <id...>", "Pokémon ids to fetch").argParser(collectId).conflicts(["startId", "endId"]))
  .option("--start-id <n>", "First id of an inclusive range", toPositiveInt)
  .option("--end-id <n>", "Last id of the range (default: --start-id)", toPositiveInt)
  .option("--db <path>", "SQLite file (default: $POKEPIPELINE_DB_PATH or pokepipeline.db)")
  .option("--fail-on-error", "Exit non-zero when any id fails", false)
  .action(async (opts: RunCommandOptions) => {
    const cfg = getConfig();
    const ids = resolveIds(opts);
    const db = openDb(opts.db ?? cfg.dbPath);

    try {
      const fetcher = createJsonFetcher({
        timeoutMs: cfg.http.timeoutMs,
        retry: {
          maxAttempts: cfg.http.maxAttempts,
          initialDelayMs: cfg.http.retryBaseMs,
          maxDelayMs: cfg.http.retryMaxMs
        }
      });
      const client = createPokeApiClient({ baseUrl: cfg.pokeapi.baseUrl, fetcher });

      log.cli.info({ db: db.name, count: ids.length, first: ids[0], last: ids[ids.length - 1] }, "run started");
      const summary = await runPipeline({ ids, client, loader: createLoader(db) });
      console.log(JSON.stringify(summary, null, 2));

      if (summary.networkUnreachable) {
        log.cli.fatal({ baseUrl: cfg.pokeapi.baseUrl }, "API unreachable for every requested id");
      }
      process.exitCode = exitCodeFor(summary, { failOnError: opts.failOnError });
    } finally {
      db.close();
    }
  });

program
  .command("stats")
  .description("Print row counts of every table")
  .option("--db <path>", "SQLite file (default: $POKEPIPELINE_DB_PATH or pokepipeline.db)")
  .action((opts: StatsCommandOptions) => {
    const cfg = getConfig();
    const db = openDb(opts.db ?? cfg.dbPath);
    try {
      console.log(JSON.stringify(countRows(db), null, 2));
    } finally {
      db.close();
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  log.cli.fatal({ err }, "aborted");
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
