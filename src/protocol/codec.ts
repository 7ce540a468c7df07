/**
 * Message Codec
 *
 * Frame layout: [u8 tag][fields in schema order]. Pure functions, no state.
 */

import { BinaryReader, BinaryWriter } from '../codec/binary';
import { MalformedMessageError } from '../errors';
import { MESSAGES, Message, MessageDefinition, Direction, InboundMessage, OutboundMessage } from './messages';

type AnyDefinition = MessageDefinition<string, Direction, Readonly<Record<string, unknown>>>;

const decoders = new Map<number, (reader: BinaryReader) => Message>();
const byType = new Map<string, AnyDefinition>();

for (const definition of Object.values(MESSAGES)) {
    if (decoders.has(definition.tag)) {
        throw new Error(`Duplicate message tag ${definition.tag} ('${definition.type}')`);
    }
    decoders.set(definition.tag, (reader) => definition.decode(reader));
    byType.set(definition.type, definition);
}

/**
 * Encode a message to a single datagram.
 *
 * @throws MalformedMessageError if a field value does not fit its wire type
 */
export function encodeMessage(message: Message): Uint8Array {
    const definition = byType.get(message.type);
    if (!definition) {
        throw new MalformedMessageError(`Unknown message type '${message.type}'`);
    }

    const writer = new BinaryWriter();
    writer.writeU8(definition.tag);
    definition.encodeFields(writer, message);
    return writer.finish();
}

/**
 * Decode one datagram. Bytes after the last declared field are ignored so a
 * newer peer can append fields without breaking this client.
 *
 * @throws MalformedMessageError on empty input, unknown tag or truncated fields
 */
export function decodeMessage(bytes: Uint8Array): Message {
    if (bytes.byteLength === 0) {
        throw new MalformedMessageError('Empty datagram');
    }

    const reader = new BinaryReader(bytes);
    const tag = reader.readU8();
    const decode = decoders.get(tag);
    if (!decode) {
        throw new MalformedMessageError(`Unknown message tag ${tag}`);
    }

    return decode(reader);
}

export function tagOf(type: Message['type']): number {
    const definition = byType.get(type);
    if (!definition) {
        throw new MalformedMessageError(`Unknown message type '${type}'`);
    }
    return definition.tag;
}

export function isInboundMessage(message: Message): message is InboundMessage {
    return byType.get(message.type)?.direction === 'inbound';
}

export function isOutboundMessage(message: Message): message is OutboundMessage {
    return byType.get(message.type)?.direction === 'outbound';
}
