import type { ZodError } from "zod";

import { TransformError } from "../errors.js";
import { PokemonDocumentSchema, SpeciesDocumentSchema } from "../pokeapi/schemas.js";
import { parseTrailingId } from "./evolution.js";
import type { NormalizedRecord } from "./types.js";

/**
 * Maps one `/pokemon/{id}` document (plus its species document, when one was
 * fetched) to the rows the loader writes. Optional fields that are missing or
 * malformed become null; a required field with the wrong shape throws
 * `TransformError` naming the dotted path of the first offending field.
 */
export function transform(pokemonId: number, pokemonJson: unknown, speciesJson: unknown): NormalizedRecord {
  const parsed = PokemonDocumentSchema.safeParse(pokemonJson);
  if (!parsed.success) {
    throw new TransformError({ pokemonId, field: firstIssuePath(parsed.error), detail: parsed.error.issues[0]?.message });
  }
  const doc = parsed.data;

  return {
    pokemon: {
      id: doc.id,
      name: doc.name,
      height: doc.height,
      weight: doc.weight,
      baseExperience: doc.base_experience,
      speciesUrl: doc.species?.url ?? null,
      evolutionChainId: readEvolutionChainId(speciesJson)
    },
    types: doc.types.map((t) => ({ typeName: t.type.name, slot: t.slot })),
    abilities: doc.abilities.map((a) => ({ abilityName: a.ability.name, isHidden: a.is_hidden, slot: a.slot })),
    stats: doc.stats.map((s) => ({ statName: s.stat.name, baseValue: s.base_stat, effort: s.effort }))
  };
}

/** The species URL embedded in a Pokémon document, if it has a usable one. */
export function readSpeciesUrl(pokemonJson: unknown): string | null {
  const parsed = PokemonDocumentSchema.pick({ species: true }).safeParse(pokemonJson);
  if (!parsed.success) return null;
  return parsed.data.species?.url ?? null;
}

function readEvolutionChainId(speciesJson: unknown): number | null {
  if (speciesJson === null) return null;
  const parsed = SpeciesDocumentSchema.safeParse(speciesJson);
  if (!parsed.success) return null;
  const url = parsed.data.evolution_chain?.url;
  return url ? parseTrailingId(url) : null;
}

function firstIssuePath(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue || issue.path.length === 0) return "<root>";
  return issue.path.join(".");
}
