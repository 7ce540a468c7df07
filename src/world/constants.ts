/** Blocks per chunk edge. */
export const CHUNK_SIZE = 16;

/** Blocks per chunk (CHUNK_SIZE x CHUNK_SIZE). */
export const CHUNK_CELLS = CHUNK_SIZE * CHUNK_SIZE;

/** Block id for empty space. Never rendered. */
export const AIR = 0;
