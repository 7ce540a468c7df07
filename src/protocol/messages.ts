/**
 * Wire Messages
 *
 * One schema per tag. Field order in each schema is the order on the wire.
 * Tag numbers are part of the protocol and must never be reused.
 */

import {
    BinaryReader,
    BinaryWriter,
    StructSchema,
    InferStruct,
    struct,
    u8,
    u16,
    u32,
    f32,
    string,
    list,
    fixedList,
    optional
} from '../codec/binary';
import { CHUNK_CELLS } from '../world/constants';

export type Direction = 'inbound' | 'outbound';

/**
 * A message kind: tag, discriminator and how its fields go on the wire.
 */
export interface MessageDefinition<T extends string, D extends Direction, F> {
    readonly tag: number;
    readonly type: T;
    readonly direction: D;
    readonly fieldNames: readonly string[];
    encodeFields(writer: BinaryWriter, message: F): void;
    decode(reader: BinaryReader): Readonly<{ type: T } & F>;
}

function defineMessage<T extends string, D extends Direction, S extends StructSchema>(
    tag: number,
    type: T,
    direction: D,
    schema: S
): MessageDefinition<T, D, InferStruct<S>> {
    const codec = struct(schema);
    return {
        tag,
        type,
        direction,
        fieldNames: Object.keys(schema),
        encodeFields(writer, message) {
            codec.write(writer, message);
        },
        decode(reader) {
            return Object.freeze({ type, ...codec.read(reader) });
        }
    };
}

const blockPosition = struct({ x: u32, y: u32 });
const inventorySlot = struct({ item: u16, count: u16 });

export const MESSAGES = {
    // Handshake and session
    hello: defineMessage(1, 'hello', 'outbound', { name: string }),
    welcome: defineMessage(2, 'welcome', 'inbound', {
        playerId: u32,
        worldWidth: u32,
        worldHeight: u32,
        chunkSize: u32,
        spawnX: f32,
        spawnY: f32
    }),
    goodbye: defineMessage(10, 'goodbye', 'outbound', {}),
    kick: defineMessage(16, 'kick', 'inbound', { reason: string }),
    heartbeat_ping: defineMessage(17, 'heartbeat_ping', 'inbound', {}),
    heartbeat: defineMessage(18, 'heartbeat', 'outbound', {}),

    // Chunk streaming
    request_chunk: defineMessage(3, 'request_chunk', 'outbound', { cx: u32, cy: u32 }),
    chunk_data: defineMessage(4, 'chunk_data', 'inbound', {
        cx: u32,
        cy: u32,
        blocks: fixedList(u8, CHUNK_CELLS)
    }),
    unload_chunk: defineMessage(5, 'unload_chunk', 'outbound', { cx: u32, cy: u32 }),

    // Other players
    player_joined: defineMessage(6, 'player_joined', 'inbound', { playerId: u32, name: string }),
    player_entered_view: defineMessage(7, 'player_entered_view', 'inbound', { playerId: u32, x: f32, y: f32 }),
    player_left_view: defineMessage(8, 'player_left_view', 'inbound', { playerId: u32 }),
    player_left: defineMessage(9, 'player_left', 'inbound', { playerId: u32, name: string }),
    player_position_update: defineMessage(15, 'player_position_update', 'inbound', {
        playerId: u32,
        x: f32,
        y: f32
    }),

    // Blocks
    place_block: defineMessage(11, 'place_block', 'outbound', { x: u32, y: u32 }),
    break_block: defineMessage(19, 'break_block', 'outbound', { x: u32, y: u32 }),
    block_changed: defineMessage(12, 'block_changed', 'inbound', { x: u32, y: u32, blockId: u8 }),
    batch_block_changed: defineMessage(20, 'batch_block_changed', 'inbound', {
        positions: list(blockPosition),
        blockId: u8
    }),

    // Movement
    player_velocity_change: defineMessage(13, 'player_velocity_change', 'outbound', { vx: f32 }),
    player_jump: defineMessage(14, 'player_jump', 'outbound', {}),

    // Inventory
    inventory_update: defineMessage(21, 'inventory_update', 'inbound', { slots: list(optional(inventorySlot)) }),
    change_slot: defineMessage(22, 'change_slot', 'outbound', { slot: u8 }),

    // Chat
    send_chat_message: defineMessage(23, 'send_chat_message', 'outbound', { text: string }),
    chat_broadcast: defineMessage(24, 'chat_broadcast', 'inbound', { sender: string, text: string })
};

type Definitions = typeof MESSAGES;

export type MessageType = keyof Definitions;

type MessageOf<M> = M extends MessageDefinition<infer T, Direction, infer F> ? Readonly<{ type: T } & F> : never;

/** Every message kind, discriminated by `type`. */
export type Message = { [K in MessageType]: MessageOf<Definitions[K]> }[MessageType];

export type MessageOfType<K extends MessageType> = Extract<Message, { type: K }>;

export type InboundMessage = {
    [K in MessageType]: Definitions[K]['direction'] extends 'inbound' ? MessageOf<Definitions[K]> : never;
}[MessageType];

export type OutboundMessage = Exclude<Message, InboundMessage>;

export type BlockPosition = MessageOfType<'batch_block_changed'>['positions'][number];

export type InventorySlotPayload = MessageOfType<'inventory_update'>['slots'][number];

// ============================================
// Outbound constructors
// ============================================

export function hello(name: string): MessageOfType<'hello'> {
    return Object.freeze({ type: 'hello', name });
}

export function goodbye(): MessageOfType<'goodbye'> {
    return Object.freeze({ type: 'goodbye' });
}

export function heartbeat(): MessageOfType<'heartbeat'> {
    return Object.freeze({ type: 'heartbeat' });
}

export function requestChunk(cx: number, cy: number): MessageOfType<'request_chunk'> {
    return Object.freeze({ type: 'request_chunk', cx, cy });
}

export function unloadChunk(cx: number, cy: number): MessageOfType<'unload_chunk'> {
    return Object.freeze({ type: 'unload_chunk', cx, cy });
}

export function placeBlock(x: number, y: number): MessageOfType<'place_block'> {
    return Object.freeze({ type: 'place_block', x, y });
}

export function breakBlock(x: number, y: number): MessageOfType<'break_block'> {
    return Object.freeze({ type: 'break_block', x, y });
}

export function playerVelocityChange(vx: number): MessageOfType<'player_velocity_change'> {
    return Object.freeze({ type: 'player_velocity_change', vx });
}

export function playerJump(): MessageOfType<'player_jump'> {
    return Object.freeze({ type: 'player_jump' });
}

export function changeSlot(slot: number): MessageOfType<'change_slot'> {
    return Object.freeze({ type: 'change_slot', slot });
}

export function sendChatMessage(text: string): MessageOfType<'send_chat_message'> {
    return Object.freeze({ type: 'send_chat_message', text });
}
