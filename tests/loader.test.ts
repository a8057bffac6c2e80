import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";

import { ensureSchema, openDb, type Db } from "../src/db/db.js";
import { migrations } from "../src/db/migrations.js";
import { StorageError } from "../src/errors.js";
import { transform } from "../src/etl/transform.js";
import { countRows, createLoader } from "../src/storage/loader.js";
import { pokemonDoc, speciesDoc } from "./helpers/fakeApi.js";

const bulbasaur = transform(
  1,
  pokemonDoc({
    id: 1,
    name: "bulbasaur",
    types: ["grass", "poison"],
    abilities: [{ name: "overgrow" }, { name: "chlorophyll", hidden: true }]
  }),
  speciesDoc(1, "bulbasaur", 1)
);

const oddish = transform(
  43,
  pokemonDoc({ id: 43, name: "oddish", types: ["grass", "poison"], abilities: [{ name: "chlorophyll" }, { name: "run-away", hidden: true }] }),
  null
);

function typeRows(db: Db, pokemonId: number) {
  return db
    .prepare<[number], { name: string; slot: number }>(
      "SELECT t.name, pt.slot FROM pokemon_types pt JOIN types t ON t.id = pt.type_id WHERE pt.pokemon_id = ? ORDER BY pt.slot"
    )
    .all(pokemonId);
}

describe("schema", () => {
  test("creates the tables once and is idempotent", () => {
    const db = openDb(":memory:");
    ensureSchema(db);
    ensureSchema(db);
    const versions = db.prepare<[], { version: number }>("SELECT version FROM schema_migrations ORDER BY version").all();
    expect(versions.map((v) => v.version)).toEqual([1]);
    expect(countRows(db)).toEqual({
      pokemon: 0,
      types: 0,
      abilities: 0,
      pokemon_types: 0,
      pokemon_abilities: 0,
      stats: 0,
      evolutions: 0
    });
    db.close();
  });

  test("a failing migration is fatal and leaves earlier versions untouched", () => {
    const db = openDb(":memory:");
    const broken = [...migrations, { version: 2, name: "broken", sql: "CREATE TABLE pokemon(id INTEGER)" }];

    let caught: unknown;
    try {
      ensureSchema(db, broken);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(StorageError);
    expect(caught).toMatchObject({ operation: "ensure schema", fatal: true });
    const versions = db.prepare<[], { version: number }>("SELECT version FROM schema_migrations ORDER BY version").all();
    expect(versions.map((v) => v.version)).toEqual([1]);
    db.close();
  });
});

describe("openDb", () => {
  test("reopening an existing file keeps rows and lookup ids", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pokepipeline-"));
    const dbPath = path.join(dir, "nested", "dex.db");
    try {
      const first = openDb(dbPath);
      createLoader(first).load(bulbasaur, null);
      const grass = createLoader(first).upsertLookup("types", "grass");
      first.close();

      const second = openDb(dbPath);
      expect(createLoader(second).upsertLookup("types", "grass")).toBe(grass);
      expect(countRows(second)).toMatchObject({ pokemon: 1, types: 2, abilities: 2 });
      second.close();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  test("a path that cannot be opened is a fatal StorageError", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pokepipeline-"));
    try {
      expect(() => openDb(dir)).toThrow(StorageError);
      try {
        openDb(dir);
      } catch (err) {
        expect(err).toMatchObject({ fatal: true });
      }
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("createLoader", () => {
  test("upsertLookup creates once and then returns the same id", () => {
    const db = openDb(":memory:");
    const loader = createLoader(db);
    const grass = loader.upsertLookup("types", "grass");
    const fire = loader.upsertLookup("types", "fire");
    expect(loader.upsertLookup("types", "grass")).toBe(grass);
    expect(fire).not.toBe(grass);

    const second = createLoader(db);
    expect(second.upsertLookup("types", "grass")).toBe(grass);
    expect(countRows(db).types).toBe(2);
    db.close();
  });

  test("writes one join row per type and ability with source slots", () => {
    const db = openDb(":memory:");
    const loader = createLoader(db);

    const res = loader.load(bulbasaur, null);

    expect(res).toEqual({ pokemonId: 1, types: 2, abilities: 2, stats: 6, evolutionEdges: 0 });
    expect(typeRows(db, 1)).toEqual([
      { name: "grass", slot: 1 },
      { name: "poison", slot: 2 }
    ]);
    const abilities = db
      .prepare<[number], { name: string; is_hidden: number; slot: number }>(
        "SELECT a.name, pa.is_hidden, pa.slot FROM pokemon_abilities pa JOIN abilities a ON a.id = pa.ability_id WHERE pa.pokemon_id = ? ORDER BY pa.slot"
      )
      .all(1);
    expect(abilities).toEqual([
      { name: "overgrow", is_hidden: 0, slot: 1 },
      { name: "chlorophyll", is_hidden: 1, slot: 2 }
    ]);
    const row = db
      .prepare<[number], { name: string; base_experience: number | null; evolution_chain_id: number | null }>(
        "SELECT name, base_experience, evolution_chain_id FROM pokemon WHERE id = ?"
      )
      .get(1);
    expect(row).toEqual({ name: "bulbasaur", base_experience: 64, evolution_chain_id: 1 });
    db.close();
  });

  test("shares lookup rows between Pokémon and survives reloading", () => {
    const db = openDb(":memory:");
    const loader = createLoader(db);
    loader.load(bulbasaur, null);
    loader.load(oddish, null);
    const before = countRows(db);

    createLoader(db).load(bulbasaur, null);
    createLoader(db).load(oddish, null);

    expect(before).toMatchObject({ pokemon: 2, types: 2, abilities: 3, pokemon_types: 4, pokemon_abilities: 4, stats: 12 });
    expect(countRows(db)).toEqual(before);
    db.close();
  });

  test("stores evolution edges even when endpoints were never loaded", () => {
    const db = openDb(":memory:");
    const loader = createLoader(db);
    const evolution = {
      chainId: 1,
      edges: [
        { fromId: 1, toId: 2 },
        { fromId: 2, toId: 3 }
      ]
    };

    expect(loader.load(bulbasaur, evolution).evolutionEdges).toBe(2);
    loader.load(bulbasaur, evolution);

    const edges = db
      .prepare<[], { chain_id: number; from_pokemon_id: number; to_pokemon_id: number }>(
        "SELECT chain_id, from_pokemon_id, to_pokemon_id FROM evolutions ORDER BY from_pokemon_id"
      )
      .all();
    expect(edges).toEqual([
      { chain_id: 1, from_pokemon_id: 1, to_pokemon_id: 2 },
      { chain_id: 1, from_pokemon_id: 2, to_pokemon_id: 3 }
    ]);
    db.close();
  });

  test("a rejected write is a non-fatal StorageError", () => {
    const db = openDb(":memory:");
    const loader = createLoader(db);
    const duplicateStat = {
      ...bulbasaur,
      stats: [
        { statName: "hp", baseValue: 45, effort: 0 },
        { statName: "hp", baseValue: 50, effort: 0 }
      ]
    };

    let caught: unknown;
    try {
      loader.load(duplicateStat, null);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(StorageError);
    expect(caught).toMatchObject({ operation: "write stats for 1", fatal: false });
    // the stats transaction rolled back; earlier groups and lookups stand
    expect(countRows(db)).toMatchObject({ pokemon: 1, types: 2, pokemon_types: 2, stats: 0 });
    db.close();
  });

  test("writing through a closed connection is fatal", () => {
    const db = openDb(":memory:");
    const loader = createLoader(db);
    db.close();
    expect(() => loader.load(bulbasaur, null)).toThrow(StorageError);
    try {
      loader.load(bulbasaur, null);
    } catch (err) {
      expect(err).toMatchObject({ fatal: true });
    }
  });
});
