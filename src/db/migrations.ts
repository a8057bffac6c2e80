export type Migration = { version: number; name: string; sql: string };

export const migrations: Migration[] = [
  {
    version: 1,
    name: "pokemon_tables",
    sql: `
      CREATE TABLE IF NOT EXISTS pokemon(
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        height INTEGER,
        weight INTEGER,
        base_experience INTEGER,
        species_url TEXT,
        evolution_chain_id INTEGER
      );

      CREATE TABLE IF NOT EXISTS types(
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL UNIQUE
      );

      CREATE TABLE IF NOT EXISTS abilities(
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL UNIQUE
      );

      CREATE TABLE IF NOT EXISTS pokemon_types(
        pokemon_id INTEGER NOT NULL REFERENCES pokemon(id) ON DELETE CASCADE,
        type_id INTEGER NOT NULL REFERENCES types(id) ON DELETE CASCADE,
        slot INTEGER NOT NULL,
        PRIMARY KEY(pokemon_id, type_id)
      );

      CREATE TABLE IF NOT EXISTS pokemon_abilities(
        pokemon_id INTEGER NOT NULL REFERENCES pokemon(id) ON DELETE CASCADE,
        ability_id INTEGER NOT NULL REFERENCES abilities(id) ON DELETE CASCADE,
        is_hidden INTEGER NOT NULL CHECK(is_hidden IN (0, 1)),
        slot INTEGER NOT NULL,
        PRIMARY KEY(pokemon_id, ability_id)
      );

      CREATE TABLE IF NOT EXISTS stats(
        pokemon_id INTEGER NOT NULL REFERENCES pokemon(id) ON DELETE CASCADE,
        stat_name TEXT NOT NULL,
        base_value INTEGER NOT NULL,
        effort INTEGER NOT NULL,
        PRIMARY KEY(pokemon_id, stat_name)
      );

      -- endpoints may name Pokémon that were never loaded, so no foreign keys here
      CREATE TABLE IF NOT EXISTS evolutions(
        chain_id INTEGER,
        from_pokemon_id INTEGER NOT NULL,
        to_pokemon_id INTEGER NOT NULL,
        PRIMARY KEY(from_pokemon_id, to_pokemon_id)
      );

      CREATE INDEX IF NOT EXISTS idx_pokemon_types_type ON pokemon_types(type_id);
      CREATE INDEX IF NOT EXISTS idx_pokemon_abilities_ability ON pokemon_abilities(ability_id);
      CREATE INDEX IF NOT EXISTS idx_evolutions_chain ON evolutions(chain_id);
    `
  }
];
