import type { FetchedDocument, JsonFetcher } from "../http/fetcher.js";

export type PokeApiClient = {
  baseUrl: string;
  pokemonUrl(id: number): string;
  speciesUrl(id: number): string;
  getPokemon(id: number): Promise<FetchedDocument>;
  getSpecies(url: string): Promise<FetchedDocument>;
  getEvolutionChain(url: string): Promise<FetchedDocument>;
};

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

export function createPokeApiClient(opts: { baseUrl: string; fetcher: JsonFetcher }): PokeApiClient {
  const baseUrl = normalizeBaseUrl(opts.baseUrl);

  return {
    baseUrl,
    pokemonUrl: (id) => `${baseUrl}/pokemon/${id}`,
    speciesUrl: (id) => `${baseUrl}/pokemon-species/${id}`,
    async getPokemon(id) {
      return await opts.fetcher.fetchJson(`${baseUrl}/pokemon/${id}`);
    },
    async getSpecies(url) {
      return await opts.fetcher.fetchJson(url);
    },
    async getEvolutionChain(url) {
      return await opts.fetcher.fetchJson(url);
    }
  };
}
