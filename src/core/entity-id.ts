/**
 * Entity ID Allocator
 *
 * Hands out process-unique entity ids. A freed index is reused with its
 * generation bumped, so an id held past destroy() never matches the new
 * occupant of the same slot.
 */

import {
    MAX_ENTITIES,
    INDEX_MASK,
    INDEX_BITS,
    MAX_GENERATION
} from './constants';

export class EntityIdAllocator {
    /** Generation counter for each entity slot */
    private generations: Uint16Array;

    /** Free list of available indices, sorted ascending */
    private freeList: number[] = [];

    /** Next index to allocate if free list is empty */
    private nextIndex: number = 0;

    constructor(private readonly capacity: number = MAX_ENTITIES) {
        this.generations = new Uint16Array(capacity);
    }

    /**
     * Allocate a new entity ID.
     */
    allocate(): number {
        let index = this.freeList.shift();

        if (index === undefined) {
            if (this.nextIndex >= this.capacity) {
                throw new Error(
                    `Entity limit exceeded (capacity=${this.capacity}). ` +
                    `Destroy entities that left the session before spawning more.`
                );
            }
            index = this.nextIndex++;
        }

        return ((this.generations[index] << INDEX_BITS) | index) >>> 0;
    }

    /**
     * Return an ID to the pool. Bumps the slot's generation.
     */
    free(eid: number): void {
        if (!this.isValid(eid)) return;
        const index = eid & INDEX_MASK;

        this.generations[index] = (this.generations[index] + 1) & MAX_GENERATION;

        const insertIdx = this.findInsertIndex(index);
        this.freeList.splice(insertIdx, 0, index);
    }

    /**
     * Check if an entity ID is still live (allocated and generation matches).
     */
    isValid(eid: number): boolean {
        const index = eid & INDEX_MASK;
        const generation = eid >>> INDEX_BITS;
        return index < this.nextIndex
            && this.generations[index] === generation
            && !this.freeList.includes(index);
    }

    getIndex(eid: number): number {
        return eid & INDEX_MASK;
    }

    getGeneration(eid: number): number {
        return eid >>> INDEX_BITS;
    }

    reset(): void {
        this.nextIndex = 0;
        this.freeList = [];
        this.generations.fill(0);
    }

    getActiveCount(): number {
        return this.nextIndex - this.freeList.length;
    }

    private findInsertIndex(index: number): number {
        let lo = 0;
        let hi = this.freeList.length;

        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (this.freeList[mid] < index) {
                lo = mid + 1;
            } else {
                hi = mid;
            }
        }

        return lo;
    }
}
