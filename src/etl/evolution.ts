import { describeError, EvolutionResolutionError, FetchError } from "../errors.js";
import type { PokeApiClient } from "../pokeapi/client.js";
import { ChainNodeSchema, EvolutionChainDocumentSchema, SpeciesDocumentSchema, type ChainNode } from "../pokeapi/schemas.js";
import type { EvolutionEdge, ResolvedEvolution } from "./types.js";

/** `https://pokeapi.co/api/v2/evolution-chain/67/` -> 67 */
export function parseTrailingId(url: string): number | null {
  const segment = url.split("?")[0]?.split("/").filter(Boolean).pop();
  if (!segment || !/^\d+$/.test(segment)) return null;
  const id = Number.parseInt(segment, 10);
  return id > 0 ? id : null;
}

/**
 * Depth-first, document-order flattening of an evolution tree into
 * parent -> child edges. Uses an explicit stack and checks each node's shape
 * as it is popped, so chain depth never touches the call stack.
 */
export function flattenEvolutionChain(root: unknown, speciesId: number | null = null): EvolutionEdge[] {
  const read = (raw: unknown): { id: number; node: ChainNode } => {
    const parsed = ChainNodeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EvolutionResolutionError({ speciesId, reason: "evolution chain node has an unexpected shape" });
    }
    const node = parsed.data;
    const id = parseTrailingId(node.species.url);
    if (id === null) {
      throw new EvolutionResolutionError({
        speciesId,
        reason: `chain node "${node.species.name}" has no id in ${node.species.url}`
      });
    }
    return { id, node };
  };

  const edges: EvolutionEdge[] = [];
  const stack: { parentId: number; raw: unknown }[] = [];
  const pushChildren = (parentId: number, node: ChainNode) => {
    for (const child of [...node.evolves_to].reverse()) {
      stack.push({ parentId, raw: child });
    }
  };

  const first = read(root);
  pushChildren(first.id, first.node);
  for (let frame = stack.pop(); frame; frame = stack.pop()) {
    const { id, node } = read(frame.raw);
    edges.push({ fromId: frame.parentId, toId: id });
    pushChildren(id, node);
  }
  return edges;
}

/**
 * Follows a species document's `evolution_chain` reference and returns the
 * chain id with its flattened edges. A species without a chain reference
 * resolves to no edges.
 */
export async function resolveEvolution(
  speciesJson: unknown,
  client: Pick<PokeApiClient, "getEvolutionChain">
): Promise<ResolvedEvolution> {
  const species = SpeciesDocumentSchema.safeParse(speciesJson);
  if (!species.success) {
    throw new EvolutionResolutionError({ speciesId: looseId(speciesJson), reason: "species document has an unexpected shape" });
  }
  const speciesId = species.data.id;
  const chainUrl = species.data.evolution_chain?.url;
  if (!chainUrl) return { chainId: null, edges: [] };

  const chainId = parseTrailingId(chainUrl);
  if (chainId === null) {
    throw new EvolutionResolutionError({ speciesId, reason: `malformed evolution chain url ${chainUrl}` });
  }

  let chainJson: unknown;
  try {
    chainJson = (await client.getEvolutionChain(chainUrl)).data;
  } catch (cause) {
    const reason = cause instanceof FetchError ? cause.message : `unexpected error fetching ${chainUrl}`;
    throw new EvolutionResolutionError({ speciesId, reason }, { cause });
  }

  try {
    const chain = EvolutionChainDocumentSchema.safeParse(chainJson);
    if (!chain.success) {
      throw new EvolutionResolutionError({ speciesId, reason: `evolution chain ${chainId} has an unexpected shape` });
    }
    return { chainId, edges: flattenEvolutionChain(chain.data.chain, speciesId) };
  } catch (cause) {
    if (cause instanceof EvolutionResolutionError) throw cause;
    throw new EvolutionResolutionError(
      { speciesId, reason: `evolution chain ${chainId} could not be read: ${describeError(cause).message}` },
      { cause }
    );
  }
}

function looseId(json: unknown): number | null {
  if (typeof json !== "object" || json === null || !("id" in json)) return null;
  return typeof json.id === "number" ? json.id : null;
}
