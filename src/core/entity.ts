/**
 * Entity handle.
 *
 * An entity is only an id; its components live in the EntityRegistry that
 * created it. Two handles are equal iff their ids match.
 */

import { INDEX_MASK, INDEX_BITS } from './constants';

export class Entity {
    constructor(readonly eid: number) {}

    /** Slot index (low bits of the id). */
    get index(): number {
        return this.eid & INDEX_MASK;
    }

    /** Generation of the slot when this id was handed out. */
    get generation(): number {
        return this.eid >>> INDEX_BITS;
    }

    equals(other: Entity): boolean {
        return this.eid === other.eid;
    }

    toString(): string {
        return `Entity(${this.index}:${this.generation})`;
    }
}
