/**
 * Network Receiver
 *
 * Background loop for the lifetime of a connection: wait one poll interval,
 * receive a datagram, decode it and hand it to the tick. The receiver never
 * touches client state directly; positions go to the mailbox and everything
 * else to the inbound queue, both stamped from one arrival counter. Its only
 * writes are to the transport (heartbeat replies) and to the connection state.
 */

import { MalformedMessageError, TransportClosedError } from '../errors';
import { decodeMessage, encodeMessage } from '../protocol/codec';
import { Message, heartbeat } from '../protocol/messages';
import { Transport } from '../transport/transport';
import { InboundQueue } from '../sync/inbound-queue';
import { PositionMailbox, QueuedArrival } from '../sync/reconciler';
import { ConnectionState } from './connection';

const DEBUG_NET = false;

export type ReceiverState = 'idle' | 'running' | 'terminated';

export interface ReceiverStats {
    /** Datagrams read from the transport. */
    received: number;
    /** Datagrams that failed to decode. */
    dropped: number;
    /** Messages handed to the queue or mailbox, or answered. */
    dispatched: number;
    /** Decoded messages with no meaning at this point (e.g. a second welcome). */
    ignored: number;
}

export interface NetworkReceiverOptions {
    transport: Transport;
    connection: ConnectionState;
    queue: InboundQueue<QueuedArrival>;
    mailbox: PositionMailbox;
    /** Delay before each receive. Default 16 (about 60 Hz). */
    pollIntervalMs?: number;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export class NetworkReceiver {
    private readonly transport: Transport;
    private readonly connection: ConnectionState;
    private readonly queue: InboundQueue<QueuedArrival>;
    private readonly mailbox: PositionMailbox;
    private readonly pollIntervalMs: number;

    private stateValue: ReceiverState = 'idle';
    private arrivals: number = 0;
    private readonly counters: ReceiverStats = { received: 0, dropped: 0, dispatched: 0, ignored: 0 };

    constructor(options: NetworkReceiverOptions) {
        this.transport = options.transport;
        this.connection = options.connection;
        this.queue = options.queue;
        this.mailbox = options.mailbox;
        this.pollIntervalMs = options.pollIntervalMs ?? 16;
    }

    get state(): ReceiverState {
        return this.stateValue;
    }

    stats(): ReceiverStats {
        return { ...this.counters };
    }

    /**
     * Run until the connection terminates. Resolves on kick, transport close
     * or local disconnect. Any other error marks the connection terminated
     * and rejects.
     *
     * @throws Error if the receiver was already started
     */
    async run(): Promise<void> {
        if (this.stateValue !== 'idle') {
            throw new Error(`Receiver cannot be started from state '${this.stateValue}'`);
        }
        this.stateValue = 'running';

        try {
            while (!this.connection.terminated) {
                await sleep(this.pollIntervalMs);
                if (this.connection.terminated) break;

                const bytes = await this.transport.recv();
                this.counters.received++;
                this.handle(bytes);
            }
        } catch (err) {
            if (err instanceof TransportClosedError) {
                if (this.connection.terminate('transport-closed', err.message)) {
                    console.warn(`[net] connection lost: ${err.message}`);
                }
                return;
            }
            this.connection.terminate('error', err instanceof Error ? err.message : String(err));
            throw err;
        } finally {
            this.stateValue = 'terminated';
        }
    }

    private handle(bytes: Uint8Array): void {
        let message: Message;
        try {
            message = decodeMessage(bytes);
        } catch (err) {
            if (!(err instanceof MalformedMessageError)) throw err;
            this.counters.dropped++;
            console.warn(`[net] dropping malformed datagram (${bytes.byteLength} bytes): ${err.message}`);
            return;
        }

        if (DEBUG_NET) {
            console.log(`[net] <- ${message.type}`);
        }
        this.dispatch(message);
    }

    private dispatch(message: Message): void {
        switch (message.type) {
            case 'kick':
                this.counters.dispatched++;
                this.connection.terminate('kicked', message.reason);
                console.warn(`[net] kicked by server: ${message.reason}`);
                return;

            case 'heartbeat_ping':
                this.counters.dispatched++;
                this.transport.send(encodeMessage(heartbeat()));
                return;

            case 'player_position_update':
                this.counters.dispatched++;
                this.mailbox.post('player_position_update', message.playerId, {
                    x: message.x,
                    y: message.y,
                    seq: ++this.arrivals
                });
                return;

            case 'chunk_data':
            case 'block_changed':
            case 'batch_block_changed':
            case 'player_entered_view':
            case 'player_left_view':
            case 'inventory_update':
            case 'chat_broadcast':
            case 'player_joined':
            case 'player_left':
                this.counters.dispatched++;
                this.queue.push({ seq: ++this.arrivals, event: message });
                return;

            default:
                this.counters.ignored++;
                console.warn(`[net] ignoring unexpected '${message.type}' message`);
        }
    }
}
