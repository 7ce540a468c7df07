/**
 * Pending Update Mailbox
 *
 * kind -> id -> latest value. A post overwrites any value for the same
 * (kind, id) that has not been drained yet, so the consumer only ever sees
 * the newest state and memory stays bounded by the number of ids.
 */

export class PendingUpdateMailbox<K extends string, V> {
    private slots = new Map<K, Map<number, V>>();

    post(kind: K, id: number, value: V): void {
        let byId = this.slots.get(kind);
        if (!byId) {
            byId = new Map();
            this.slots.set(kind, byId);
        }
        byId.set(id, value);
    }

    /**
     * Take everything posted so far. Posts made after this call land in the
     * next drain.
     */
    drain(): Map<K, Map<number, V>> {
        const drained = this.slots;
        this.slots = new Map();
        return drained;
    }

    /** Number of pending (kind, id) entries. */
    get size(): number {
        let total = 0;
        for (const byId of this.slots.values()) total += byId.size;
        return total;
    }

    get isEmpty(): boolean {
        return this.size === 0;
    }
}
