import { describeError, EvolutionResolutionError, FetchError, StorageError } from "../errors.js";
import { log, type Logger } from "../logger.js";
import type { FetchedDocument } from "../http/fetcher.js";
import type { PokeApiClient } from "../pokeapi/client.js";
import type { Loader } from "../storage/loader.js";
import { resolveEvolution } from "./evolution.js";
import { readSpeciesUrl, transform } from "./transform.js";
import type {
  NormalizedRecord,
  PipelineFailure,
  PipelineStage,
  PipelineSummary,
  PipelineWarning,
  PokemonState,
  ResolvedEvolution
} from "./types.js";

export type RunPipelineInput = {
  ids: number[];
  client: PokeApiClient;
  loader: Loader;
  logger?: Logger;
  onProgress?: (event: { id: number; state: PokemonState }) => void;
};

class StageFailure extends Error {
  constructor(
    readonly stage: PipelineStage,
    readonly original: unknown
  ) {
    super(describeError(original).message);
  }
}

/**
 * Fetch -> transform -> load for each id in turn. A failure of one id is
 * recorded and the run moves on; only a fatal StorageError (the database
 * itself is gone) escapes.
 */
export async function runPipeline(input: RunPipelineInput): Promise<PipelineSummary> {
  const logger = input.logger ?? log.etl;
  const summary: PipelineSummary = {
    requested: input.ids.length,
    succeeded: [],
    failed: [],
    warnings: [],
    retries: 0,
    networkUnreachable: false
  };
  const fetchFailures: FetchError[] = [];

  const counted = async (pending: Promise<FetchedDocument>): Promise<FetchedDocument> => {
    try {
      const doc = await pending;
      summary.retries += doc.attempts - 1;
      return doc;
    } catch (cause) {
      if (cause instanceof FetchError) summary.retries += cause.attempts - 1;
      throw cause;
    }
  };

  for (const id of input.ids) {
    const idLogger = logger.child({ pokemonId: id });
    const setState = (state: PokemonState) => {
      idLogger.debug({ state }, "state");
      input.onProgress?.({ id, state });
    };
    const warn = (error: EvolutionResolutionError) => {
      const warning: PipelineWarning = { id, stage: "evolution", error: describeError(error) };
      summary.warnings.push(warning);
      idLogger.warn({ err: error }, "evolution skipped");
    };

    setState("pending");
    try {
      setState("fetching");
      const pokemonJson = await stage("fetching", async () => (await counted(input.client.getPokemon(id))).data);

      let speciesJson: unknown = null;
      const speciesUrl = readSpeciesUrl(pokemonJson) ?? input.client.speciesUrl(id);
      try {
        speciesJson = (await counted(input.client.getSpecies(speciesUrl))).data;
      } catch (cause) {
        if (!(cause instanceof FetchError)) throw new StageFailure("fetching", cause);
        warn(new EvolutionResolutionError({ speciesId: id, reason: cause.message }, { cause }));
      }

      setState("transforming");
      const record: NormalizedRecord = await stage("transforming", async () => transform(id, pokemonJson, speciesJson));

      let evolution: ResolvedEvolution | null = null;
      if (speciesJson !== null) {
        try {
          evolution = await resolveEvolution(speciesJson, {
            getEvolutionChain: (url) => counted(input.client.getEvolutionChain(url))
          });
        } catch (cause) {
          warn(
            cause instanceof EvolutionResolutionError
              ? cause
              : new EvolutionResolutionError({ speciesId: id, reason: describeError(cause).message }, { cause })
          );
        }
      }

      setState("loading");
      const loaded = await stage("loading", async () => input.loader.load(record, evolution));

      summary.succeeded.push(id);
      setState("done");
      idLogger.info(
        { name: record.pokemon.name, ...loaded, chainId: evolution?.chainId ?? null },
        "stored"
      );
    } catch (cause) {
      if (!(cause instanceof StageFailure)) throw cause;
      if (cause.original instanceof StorageError && cause.original.fatal) throw cause.original;
      if (cause.original instanceof FetchError) fetchFailures.push(cause.original);

      const failure: PipelineFailure = { id, stage: cause.stage, error: describeError(cause.original) };
      summary.failed.push(failure);
      setState("failed");
      idLogger.error({ stage: cause.stage, err: cause.original }, "failed");
    }
  }

  summary.networkUnreachable =
    summary.succeeded.length === 0 &&
    summary.failed.length > 0 &&
    fetchFailures.length === summary.failed.length &&
    fetchFailures.every((e) => e.kind === "network" || e.kind === "timeout");

  logger.info(
    {
      requested: summary.requested,
      succeeded: summary.succeeded.length,
      failed: summary.failed.length,
      warnings: summary.warnings.length,
      retries: summary.retries
    },
    "run finished"
  );
  return summary;
}

async function stage<T>(name: PipelineStage, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (cause) {
    throw new StageFailure(name, cause);
  }
}
