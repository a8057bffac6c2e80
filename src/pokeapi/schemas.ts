import { z } from "zod";

export const NamedResourceSchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1)
});

export type NamedResource = z.infer<typeof NamedResourceSchema>;

/** Integer fields the API sometimes leaves null; anything else non-integer reads as null too. */
const OptionalInt = z.number().int().nullable().optional().catch(null).transform((v) => v ?? null);

export const PokemonTypeSlotSchema = z.object({
  slot: z.number().int().catch(0),
  type: NamedResourceSchema
});

export const PokemonAbilitySlotSchema = z.object({
  slot: z.number().int().catch(0),
  is_hidden: z.boolean().catch(false),
  ability: NamedResourceSchema
});

export const PokemonStatSchema = z.object({
  base_stat: z.number().int().catch(0),
  effort: z.number().int().catch(0),
  stat: NamedResourceSchema
});

export const PokemonDocumentSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  height: OptionalInt,
  weight: OptionalInt,
  base_experience: OptionalInt,
  species: NamedResourceSchema.nullable().catch(null),
  types: z.array(PokemonTypeSlotSchema).optional().default([]),
  abilities: z.array(PokemonAbilitySlotSchema).optional().default([]),
  stats: z.array(PokemonStatSchema).optional().default([])
});

export type PokemonDocument = z.infer<typeof PokemonDocumentSchema>;

export const SpeciesDocumentSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  evolution_chain: z.object({ url: z.string() }).nullable().optional()
});

export type SpeciesDocument = z.infer<typeof SpeciesDocumentSchema>;

/**
 * One level of an evolution chain. Children stay unparsed; the chain walker
 * checks each node as it reaches it.
 */
export const ChainNodeSchema = z.object({
  species: NamedResourceSchema,
  evolves_to: z.array(z.unknown()).optional().default([])
});

export type ChainNode = z.infer<typeof ChainNodeSchema>;

export const EvolutionChainDocumentSchema = z.object({
  id: z.number().int().positive(),
  chain: z.unknown()
});
