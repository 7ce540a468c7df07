/**
 * Entity id layout: [12 bits generation][20 bits index]
 */
export const INDEX_BITS = 20;
export const GENERATION_BITS = 12;
export const INDEX_MASK = (1 << INDEX_BITS) - 1;
export const MAX_GENERATION = (1 << GENERATION_BITS) - 1;

/** Upper bound on live entities in one registry. */
export const MAX_ENTITIES = 1 << 16;
