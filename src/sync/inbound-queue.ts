/**
 * FIFO handoff for events that must all be applied, in arrival order.
 */
export class InboundQueue<E> {
    private items: E[] = [];

    push(item: E): void {
        this.items.push(item);
    }

    /** Take every queued event, oldest first. */
    drain(): E[] {
        const drained = this.items;
        this.items = [];
        return drained;
    }

    get length(): number {
        return this.items.length;
    }
}
