/**
 * World Chunk Store
 *
 * Sparse cache of the 16x16 chunks around the player. A chunk is present
 * either with the blocks from one chunk_data message or as an empty
 * placeholder waiting for its reply.
 *
 * Cell layout is reversed relative to the wire: flat payload index i lands in
 * local cell (i % 16, i / 16) with value blocks[255 - i], and a world block
 * (x, y) lives in cell (15 - x mod 16, 15 - y mod 16). Servers depend on
 * this, so both halves must stay in step.
 */

import { MalformedMessageError } from '../errors';
import { MessageOfType, requestChunk, unloadChunk, BlockPosition } from '../protocol/messages';
import { AIR, CHUNK_CELLS, CHUNK_SIZE } from './constants';
import { ChunkCoord, chunkKey, isFetchable } from './coords';

const DEBUG_WORLD = false;

export type ChunkRequest = MessageOfType<'request_chunk'> | MessageOfType<'unload_chunk'>;

interface Chunk {
    readonly cx: number;
    readonly cy: number;
    /** Block ids indexed by ly * 16 + lx. */
    readonly cells: number[];
    placeholder: boolean;
}

function emptyCells(): number[] {
    return new Array<number>(CHUNK_CELLS).fill(AIR);
}

/** Block ids are opaque to the store but must be integers. */
function checkBlockId(blockId: number): void {
    if (!Number.isSafeInteger(blockId)) {
        throw new RangeError(`Block id must be an integer, got ${blockId}`);
    }
}

function localCellIndex(worldX: number, worldY: number): number {
    const lx = CHUNK_SIZE - 1 - (worldX % CHUNK_SIZE);
    const ly = CHUNK_SIZE - 1 - (worldY % CHUNK_SIZE);
    return ly * CHUNK_SIZE + lx;
}

export class ChunkStore {
    private readonly chunks = new Map<string, Chunk>();

    get size(): number {
        return this.chunks.size;
    }

    has(cx: number, cy: number): boolean {
        return this.chunks.has(chunkKey(cx, cy));
    }

    isPlaceholder(cx: number, cy: number): boolean {
        return this.chunks.get(chunkKey(cx, cy))?.placeholder ?? false;
    }

    loadedCoords(): ChunkCoord[] {
        return Array.from(this.chunks.values(), ({ cx, cy }) => ({ cx, cy }));
    }

    clear(): void {
        this.chunks.clear();
    }

    /**
     * Store a full chunk, replacing whatever was at (cx, cy).
     *
     * @throws MalformedMessageError if `blocks` does not hold exactly 256 ids
     * @throws RangeError if an id is not an integer
     */
    ingestChunkData(cx: number, cy: number, blocks: ArrayLike<number>): void {
        if (blocks.length !== CHUNK_CELLS) {
            throw new MalformedMessageError(
                `Chunk (${cx}, ${cy}) has ${blocks.length} blocks, expected ${CHUNK_CELLS}`
            );
        }

        const cells = emptyCells();
        for (let i = 0; i < CHUNK_CELLS; i++) {
            const blockId = blocks[CHUNK_CELLS - 1 - i];
            checkBlockId(blockId);
            cells[i] = blockId;
        }
        this.chunks.set(chunkKey(cx, cy), { cx, cy, cells, placeholder: false });
    }

    /**
     * Set one world block. Returns false (and does nothing) when the owning
     * chunk is not loaded or the position is negative.
     *
     * @throws RangeError if `blockId` is not an integer
     */
    applyBlockChange(worldX: number, worldY: number, blockId: number): boolean {
        checkBlockId(blockId);
        const x = Math.floor(worldX);
        const y = Math.floor(worldY);
        if (x < 0 || y < 0) return false;

        const chunk = this.chunks.get(chunkKey(Math.floor(x / CHUNK_SIZE), Math.floor(y / CHUNK_SIZE)));
        if (!chunk) return false;

        chunk.cells[localCellIndex(x, y)] = blockId;
        return true;
    }

    /**
     * Set every listed position to `blockId`. Returns how many were applied.
     */
    applyBatchBlockChange(positions: readonly BlockPosition[], blockId: number): number {
        checkBlockId(blockId);
        let applied = 0;
        for (const { x, y } of positions) {
            if (this.applyBlockChange(x, y, blockId)) applied++;
        }
        return applied;
    }

    /**
     * Block id at a world position. Air for negative positions and for chunks
     * that are not loaded.
     */
    getBlock(worldX: number, worldY: number): number {
        const x = Math.floor(worldX);
        const y = Math.floor(worldY);
        if (x < 0 || y < 0) return AIR;

        const chunk = this.chunks.get(chunkKey(Math.floor(x / CHUNK_SIZE), Math.floor(y / CHUNK_SIZE)));
        if (!chunk) return AIR;
        return chunk.cells[localCellIndex(x, y)];
    }

    /**
     * Raw read of local cell (lx, ly) of chunk (cx, cy), no axis reversal.
     */
    getCell(cx: number, cy: number, lx: number, ly: number): number {
        const chunk = this.chunks.get(chunkKey(cx, cy));
        if (!chunk || lx < 0 || ly < 0 || lx >= CHUNK_SIZE || ly >= CHUNK_SIZE) return AIR;
        return chunk.cells[ly * CHUNK_SIZE + lx];
    }

    /**
     * Bring the store in line with the window [center - radius, center + radius].
     * Chunks outside are removed and unloaded; absent chunks inside get a
     * placeholder and are requested. Negative coordinates are never emitted.
     *
     * @returns the messages to send, unloads first
     */
    reconcileViewport(center: ChunkCoord, radiusX: number, radiusY: number): ChunkRequest[] {
        const out: ChunkRequest[] = [];
        const minX = center.cx - radiusX;
        const maxX = center.cx + radiusX;
        const minY = center.cy - radiusY;
        const maxY = center.cy + radiusY;

        for (const [key, chunk] of this.chunks) {
            const inside = chunk.cx >= minX && chunk.cx <= maxX && chunk.cy >= minY && chunk.cy <= maxY;
            if (inside) continue;

            this.chunks.delete(key);
            if (isFetchable(chunk.cx, chunk.cy)) {
                out.push(unloadChunk(chunk.cx, chunk.cy));
            }
        }

        for (let cx = minX; cx <= maxX; cx++) {
            for (let cy = minY; cy <= maxY; cy++) {
                if (!isFetchable(cx, cy)) continue;
                const key = chunkKey(cx, cy);
                if (this.chunks.has(key)) continue;

                this.chunks.set(key, { cx, cy, cells: emptyCells(), placeholder: true });
                out.push(requestChunk(cx, cy));
            }
        }

        if (DEBUG_WORLD && out.length > 0) {
            console.log(`[world] viewport (${center.cx}, ${center.cy}): ${out.map(m => `${m.type}(${m.cx},${m.cy})`).join(' ')}`);
        }
        return out;
    }

    /**
     * Visit every non-air block with its world position. Placeholder chunks
     * are visited too (they hold only block changes received while waiting).
     */
    forEachBlock(callback: (worldX: number, worldY: number, blockId: number) => void): void {
        for (const chunk of this.chunks.values()) {
            const baseX = chunk.cx * CHUNK_SIZE;
            const baseY = chunk.cy * CHUNK_SIZE;
            for (let i = 0; i < CHUNK_CELLS; i++) {
                const blockId = chunk.cells[i];
                if (blockId === AIR) continue;
                const lx = i % CHUNK_SIZE;
                const ly = Math.floor(i / CHUNK_SIZE);
                callback(baseX + CHUNK_SIZE - 1 - lx, baseY + CHUNK_SIZE - 1 - ly, blockId);
            }
        }
    }
}
