/**
 * Transport Session
 *
 * One message in, one message out. No retry and no ordering beyond what the
 * underlying channel gives; the protocol above tolerates loss and reordering.
 */

export interface Transport {
    /** True once closed locally or by the peer. */
    readonly closed: boolean;

    /**
     * Send one datagram.
     * @throws TransportClosedError if the transport is closed
     */
    send(bytes: Uint8Array): void;

    /**
     * Wait for the next datagram.
     * Rejects with TransportClosedError if the transport is or becomes closed.
     */
    recv(): Promise<Uint8Array>;

    close(): void;
}

/**
 * Pending recv() calls waiting for a datagram.
 */
export class DatagramInbox {
    private readonly queue: Uint8Array[] = [];
    private readonly waiters: Array<{ resolve: (bytes: Uint8Array) => void; reject: (err: Error) => void }> = [];
    private closeError: Error | null = null;

    get pending(): number {
        return this.queue.length;
    }

    push(bytes: Uint8Array): void {
        if (this.closeError) return;
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.resolve(bytes);
        } else {
            this.queue.push(bytes);
        }
    }

    next(): Promise<Uint8Array> {
        const queued = this.queue.shift();
        if (queued) return Promise.resolve(queued);
        if (this.closeError) return Promise.reject(this.closeError);
        return new Promise<Uint8Array>((resolve, reject) => {
            this.waiters.push({ resolve, reject });
        });
    }

    /**
     * Reject every waiter and all future next() calls once the queue is empty.
     * Datagrams already queued stay readable unless `discardQueued` is set.
     */
    close(error: Error, discardQueued: boolean = false): void {
        if (discardQueued) this.queue.length = 0;
        if (this.closeError) return;
        this.closeError = error;
        for (const waiter of this.waiters.splice(0)) {
            waiter.reject(error);
        }
    }
}
