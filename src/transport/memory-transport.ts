/**
 * In-process transport pair.
 *
 * Two linked endpoints; what one sends the other receives. Optional fault
 * injection (loss, reordering) mimics the datagram channel the client runs on.
 */

import { TransportClosedError } from '../errors';
import { DatagramInbox, Transport } from './transport';

export interface MemoryTransportOptions {
    /** Probability in [0, 1] that a sent datagram is silently lost. */
    dropRate?: number;
    /** Hold every other datagram back and deliver it after the next one. */
    reorder?: boolean;
    /** Random source for dropRate. Defaults to Math.random. */
    random?: () => number;
}

export class MemoryTransport implements Transport {
    private readonly inbox = new DatagramInbox();
    private peer: MemoryTransport | null = null;
    private held: Uint8Array | null = null;
    private isClosed: boolean = false;
    private sentCount: number = 0;

    private readonly dropRate: number;
    private readonly reorder: boolean;
    private readonly random: () => number;

    constructor(options: MemoryTransportOptions = {}) {
        this.dropRate = options.dropRate ?? 0;
        this.reorder = options.reorder ?? false;
        this.random = options.random ?? Math.random;
    }

    /**
     * Create two linked endpoints. Options apply to both directions.
     */
    static pair(options: MemoryTransportOptions = {}): [MemoryTransport, MemoryTransport] {
        const a = new MemoryTransport(options);
        const b = new MemoryTransport(options);
        a.peer = b;
        b.peer = a;
        return [a, b];
    }

    get closed(): boolean {
        return this.isClosed;
    }

    /** Datagrams sent through this endpoint, including dropped ones. */
    get sent(): number {
        return this.sentCount;
    }

    /** Datagrams waiting to be read on this endpoint. */
    get pending(): number {
        return this.inbox.pending;
    }

    send(bytes: Uint8Array): void {
        if (this.isClosed) {
            throw new TransportClosedError();
        }
        this.sentCount++;

        const peer = this.peer;
        if (!peer || peer.isClosed) return;
        if (this.dropRate > 0 && this.random() < this.dropRate) return;

        const copy = bytes.slice();
        if (!this.reorder) {
            peer.inbox.push(copy);
            return;
        }

        if (this.held === null) {
            this.held = copy;
            return;
        }
        peer.inbox.push(copy);
        peer.inbox.push(this.held);
        this.held = null;
    }

    recv(): Promise<Uint8Array> {
        return this.inbox.next();
    }

    /**
     * Close both endpoints. The peer can still read what was already delivered.
     */
    close(): void {
        if (this.isClosed) return;
        this.isClosed = true;
        this.held = null;
        this.inbox.close(new TransportClosedError('Transport closed locally'), true);

        const peer = this.peer;
        if (peer && !peer.isClosed) {
            peer.isClosed = true;
            peer.held = null;
            peer.inbox.close(new TransportClosedError('Transport closed by peer'));
        }
    }
}
