/**
 * Handshake
 *
 * Client sends hello(name); the server answers with welcome (player id,
 * world size, spawn point). Anything else that arrives first is skipped,
 * apart from heartbeat pings (answered) and kick (fatal).
 */

import { HandshakeTimeoutError, KickedError, MalformedMessageError } from '../errors';
import { decodeMessage, encodeMessage } from '../protocol/codec';
import { Message, MessageOfType, hello, heartbeat } from '../protocol/messages';
import { Transport } from '../transport/transport';

const DEBUG_HANDSHAKE = false;

export type Welcome = MessageOfType<'welcome'>;

export interface HandshakeOptions {
    /** Give up if no welcome arrives within this many milliseconds. */
    timeoutMs: number;
}

/**
 * Perform the hello/welcome exchange. On failure the transport is closed.
 *
 * @throws KickedError if the server kicks the client before welcoming it
 * @throws HandshakeTimeoutError if no welcome arrives in time
 * @throws TransportClosedError if the transport closes first
 */
export async function handshake(transport: Transport, name: string, options: HandshakeOptions): Promise<Welcome> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new HandshakeTimeoutError(options.timeoutMs)), options.timeoutMs);
    });

    try {
        transport.send(encodeMessage(hello(name)));

        for (;;) {
            const bytes = await Promise.race([transport.recv(), timeout]);

            let message: Message;
            try {
                message = decodeMessage(bytes);
            } catch (err) {
                if (!(err instanceof MalformedMessageError)) throw err;
                console.warn(`[net] dropping malformed datagram during handshake: ${err.message}`);
                continue;
            }

            switch (message.type) {
                case 'welcome':
                    console.log(`[net] welcomed as player ${message.playerId} (world ${message.worldWidth}x${message.worldHeight})`);
                    return message;
                case 'kick':
                    throw new KickedError(message.reason);
                case 'heartbeat_ping':
                    transport.send(encodeMessage(heartbeat()));
                    break;
                default:
                    if (DEBUG_HANDSHAKE) {
                        console.log(`[net] skipping '${message.type}' before welcome`);
                    }
            }
        }
    } catch (err) {
        transport.close();
        throw err;
    } finally {
        clearTimeout(timer);
    }
}
