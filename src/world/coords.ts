/**
 * Chunk coordinate helpers
 */

import { CHUNK_SIZE } from './constants';

export interface ChunkCoord {
    readonly cx: number;
    readonly cy: number;
}

export function chunkCoord(cx: number, cy: number): ChunkCoord {
    return { cx, cy };
}

/** Map key for a chunk coordinate. */
export function chunkKey(cx: number, cy: number): string {
    return `${cx},${cy}`;
}

export function isFetchable(cx: number, cy: number): boolean {
    return cx >= 0 && cy >= 0;
}

/**
 * Chunk owning a world block position. Fractional positions are floored.
 */
export function chunkOf(worldX: number, worldY: number): ChunkCoord {
    return {
        cx: Math.floor(Math.floor(worldX) / CHUNK_SIZE),
        cy: Math.floor(Math.floor(worldY) / CHUNK_SIZE)
    };
}

/**
 * Chunk under a pixel position, where one block is `pixelScale` pixels wide.
 */
export function chunkOfPixel(pixelX: number, pixelY: number, pixelScale: number): ChunkCoord {
    const span = CHUNK_SIZE * pixelScale;
    return { cx: Math.floor(pixelX / span), cy: Math.floor(pixelY / span) };
}

/**
 * Streaming radius, in chunks, that covers a screen of the given pixel size.
 */
export function viewportRadiusForScreen(
    width: number,
    height: number,
    pixelScale: number
): { radiusX: number; radiusY: number } {
    return {
        radiusX: Math.ceil(width / 32 / pixelScale),
        radiusY: Math.ceil(height / 32 / pixelScale)
    };
}
