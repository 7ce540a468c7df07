/**
 * WebSocket transport
 *
 * Each binary WebSocket message carries exactly one datagram.
 */

import WebSocket from 'ws';
import { TransportClosedError } from '../errors';
import { DatagramInbox, Transport } from './transport';

// Debug flag - logs every datagram size
const DEBUG_TRANSPORT = false;

export interface WebSocketTransportOptions {
    /** Give up if the socket is not open after this long. Default 5000ms. */
    openTimeoutMs?: number;
}

function toBytes(data: WebSocket.RawData): Uint8Array {
    if (Array.isArray(data)) {
        return new Uint8Array(Buffer.concat(data));
    }
    if (data instanceof ArrayBuffer) {
        return new Uint8Array(data);
    }
    // ws may hand out views into a shared buffer; copy
    return new Uint8Array(data);
}

export class WebSocketTransport implements Transport {
    private readonly inbox = new DatagramInbox();
    private isClosed: boolean = false;

    /**
     * Wrap an already-open socket (e.g. one accepted by a server).
     */
    constructor(private readonly socket: WebSocket) {
        socket.binaryType = 'nodebuffer';

        socket.on('message', (data, isBinary) => {
            if (!isBinary) {
                console.warn('[transport] Ignoring text frame; datagrams must be binary');
                return;
            }
            const bytes = toBytes(data);
            if (DEBUG_TRANSPORT) console.log(`[transport] <- ${bytes.byteLength} bytes`);
            this.inbox.push(bytes);
        });

        socket.on('close', (code, reason) => {
            this.isClosed = true;
            const text = reason.toString() || 'no reason';
            this.inbox.close(new TransportClosedError(`WebSocket closed (${code}: ${text})`));
        });

        socket.on('error', (err) => {
            console.error('[transport] WebSocket error:', err.message);
        });
    }

    /**
     * Open a connection to `url` and resolve once it is ready.
     */
    static connect(url: string, options: WebSocketTransportOptions = {}): Promise<WebSocketTransport> {
        const openTimeoutMs = options.openTimeoutMs ?? 5000;
        const socket = new WebSocket(url);

        return new Promise<WebSocketTransport>((resolve, reject) => {
            const timer = setTimeout(() => {
                socket.terminate();
                reject(new TransportClosedError(`Timed out after ${openTimeoutMs}ms connecting to ${url}`));
            }, openTimeoutMs);

            const onError = (err: Error) => {
                clearTimeout(timer);
                reject(new TransportClosedError(`Could not connect to ${url}: ${err.message}`));
            };

            socket.once('error', onError);
            socket.once('open', () => {
                clearTimeout(timer);
                socket.off('error', onError);
                resolve(new WebSocketTransport(socket));
            });
        });
    }

    get closed(): boolean {
        return this.isClosed;
    }

    send(bytes: Uint8Array): void {
        if (this.isClosed || this.socket.readyState !== WebSocket.OPEN) {
            throw new TransportClosedError();
        }
        if (DEBUG_TRANSPORT) console.log(`[transport] -> ${bytes.byteLength} bytes`);
        this.socket.send(bytes, { binary: true });
    }

    recv(): Promise<Uint8Array> {
        return this.inbox.next();
    }

    close(): void {
        if (this.isClosed) return;
        this.isClosed = true;
        this.inbox.close(new TransportClosedError('Transport closed locally'), true);
        this.socket.close(1000, 'client closed');
    }
}
