export type PokemonRow = {
  id: number;
  name: string;
  height: number | null;
  weight: number | null;
  baseExperience: number | null;
  speciesUrl: string | null;
  evolutionChainId: number | null;
};

export type TypeSlot = { typeName: string; slot: number };

export type AbilitySlot = { abilityName: string; isHidden: boolean; slot: number };

export type StatValue = { statName: string; baseValue: number; effort: number };

export type NormalizedRecord = {
  pokemon: PokemonRow;
  types: TypeSlot[];
  abilities: AbilitySlot[];
  stats: StatValue[];
};

export type EvolutionEdge = { fromId: number; toId: number };

export type ResolvedEvolution = {
  chainId: number | null;
  edges: EvolutionEdge[];
};

export type PipelineStage = "fetching" | "transforming" | "loading";

export type PokemonState = "pending" | PipelineStage | "done" | "failed";

export type ErrorSummary = { name: string; message: string };

export type PipelineFailure = { id: number; stage: PipelineStage; error: ErrorSummary };

export type PipelineWarning = { id: number; stage: "evolution"; error: ErrorSummary };

export type PipelineSummary = {
  requested: number;
  succeeded: number[];
  failed: PipelineFailure[];
  warnings: PipelineWarning[];
  retries: number;
  networkUnreachable: boolean;
};
