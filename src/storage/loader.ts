import { isFatalStorageFailure, toStorageError, type Db } from "../db/db.js";
import type { NormalizedRecord, ResolvedEvolution } from "../etl/types.js";
import { log, type Logger } from "../logger.js";

export type LookupTable = "types" | "abilities";

export type LoadResult = {
  pokemonId: number;
  types: number;
  abilities: number;
  stats: number;
  evolutionEdges: number;
};

export type Loader = {
  upsertLookup(table: LookupTable, name: string): number;
  load(record: NormalizedRecord, evolution: ResolvedEvolution | null): LoadResult;
};

export type TableCounts = Record<
  "pokemon" | "types" | "abilities" | "pokemon_types" | "pokemon_abilities" | "stats" | "evolutions",
  number
>;

/**
 * Writes normalized records. The name -> id caches for `types` and
 * `abilities` live as long as the loader and are seeded from the tables, so a
 * second run against the same file reuses the ids already stored there.
 */
export function createLoader(db: Db, logger: Logger = log.db): Loader {
  const caches: Record<LookupTable, Map<string, number>> = {
    types: seedCache(db, "types"),
    abilities: seedCache(db, "abilities")
  };

  const run = <T>(operation: string, fn: () => T): T => {
    try {
      return fn();
    } catch (cause) {
      throw toStorageError(operation, cause, isFatalStorageFailure(db, cause));
    }
  };

  const upsertLookup = (table: LookupTable, name: string): number => {
    const cached = caches[table].get(name);
    if (cached !== undefined) return cached;

    const id = run(`upsert ${table} "${name}"`, () => {
      db.prepare(`INSERT INTO ${table}(name) VALUES (?) ON CONFLICT(name) DO NOTHING`).run(name);
      const row = db.prepare<[string], { id: number }>(`SELECT id FROM ${table} WHERE name = ? LIMIT 1`).get(name);
      if (!row) throw new Error(`row for "${name}" missing right after insert`);
      return row.id;
    });
    caches[table].set(name, id);
    logger.debug({ table, name, id }, "lookup row created");
    return id;
  };

  const upsertPokemon = db.prepare(`
    INSERT INTO pokemon(id, name, height, weight, base_experience, species_url, evolution_chain_id)
    VALUES (@id, @name, @height, @weight, @baseExperience, @speciesUrl, @evolutionChainId)
    ON CONFLICT(id) DO UPDATE SET
      name = excluded.name,
      height = excluded.height,
      weight = excluded.weight,
      base_experience = excluded.base_experience,
      species_url = excluded.species_url,
      evolution_chain_id = excluded.evolution_chain_id
  `);
  const delTypes = db.prepare("DELETE FROM pokemon_types WHERE pokemon_id = ?");
  const insType = db.prepare("INSERT INTO pokemon_types(pokemon_id, type_id, slot) VALUES (?, ?, ?)");
  const delAbilities = db.prepare("DELETE FROM pokemon_abilities WHERE pokemon_id = ?");
  const insAbility = db.prepare(
    "INSERT INTO pokemon_abilities(pokemon_id, ability_id, is_hidden, slot) VALUES (?, ?, ?, ?)"
  );
  const delStats = db.prepare("DELETE FROM stats WHERE pokemon_id = ?");
  const insStat = db.prepare("INSERT INTO stats(pokemon_id, stat_name, base_value, effort) VALUES (?, ?, ?, ?)");
  const insEdge = db.prepare(
    "INSERT OR IGNORE INTO evolutions(chain_id, from_pokemon_id, to_pokemon_id) VALUES (?, ?, ?)"
  );

  return {
    upsertLookup,
    load(record, evolution) {
      const pokemonId = record.pokemon.id;
      const evolutionChainId = evolution?.chainId ?? record.pokemon.evolutionChainId;

      run(`write pokemon ${pokemonId}`, () => {
        upsertPokemon.run({ ...record.pokemon, evolutionChainId });
      });

      // Lookup rows commit on their own, before the join transactions below.
      const typeIds = record.types.map((t) => ({ typeId: upsertLookup("types", t.typeName), slot: t.slot }));
      const abilityIds = record.abilities.map((a) => ({
        abilityId: upsertLookup("abilities", a.abilityName),
        isHidden: a.isHidden,
        slot: a.slot
      }));

      run(`write pokemon_types for ${pokemonId}`, () =>
        db.transaction(() => {
          delTypes.run(pokemonId);
          for (const t of typeIds) insType.run(pokemonId, t.typeId, t.slot);
        })()
      );

      run(`write pokemon_abilities for ${pokemonId}`, () =>
        db.transaction(() => {
          delAbilities.run(pokemonId);
          for (const a of abilityIds) insAbility.run(pokemonId, a.abilityId, a.isHidden ? 1 : 0, a.slot);
        })()
      );

      run(`write stats for ${pokemonId}`, () =>
        db.transaction(() => {
          delStats.run(pokemonId);
          for (const s of record.stats) insStat.run(pokemonId, s.statName, s.baseValue, s.effort);
        })()
      );

      const edges = evolution?.edges ?? [];
      if (edges.length > 0) {
        run(`write evolutions for ${pokemonId}`, () =>
          db.transaction(() => {
            for (const e of edges) insEdge.run(evolution?.chainId ?? null, e.fromId, e.toId);
          })()
        );
      }

      return {
        pokemonId,
        types: typeIds.length,
        abilities: abilityIds.length,
        stats: record.stats.length,
        evolutionEdges: edges.length
      };
    }
  };
}

function seedCache(db: Db, table: LookupTable): Map<string, number> {
  const rows = db.prepare<[], { id: number; name: string }>(`SELECT id, name FROM ${table}`).all();
  return new Map(rows.map((r) => [r.name, r.id]));
}

export function countRows(db: Db): TableCounts {
  const count = (table: keyof TableCounts): number =>
    db.prepare<[], { c: number }>(`SELECT COUNT(1) AS c FROM ${table}`).get()?.c ?? 0;

  return {
    pokemon: count("pokemon"),
    types: count("types"),
    abilities: count("abilities"),
    pokemon_types: count("pokemon_types"),
    pokemon_abilities: count("pokemon_abilities"),
    stats: count("stats"),
    evolutions: count("evolutions")
  };
}
