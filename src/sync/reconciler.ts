/**
 * Reconciler
 *
 * Applies everything the network receiver handed over since the last tick.
 * Called once per tick by the owner of client state; it is the only code
 * that mutates the chunk store, remote players, inventory, chat log and the
 * local player's position.
 *
 * Order per drain:
 * 1. Queued events, oldest first (chunks, block changes, view enter/leave,
 *    inventory, chat, join/leave notices).
 * 2. Mailbox position updates, newest value per player id.
 *
 * The receiver stamps both channels from one arrival counter. A remote
 * position that arrived before that player's latest view change in the same
 * drain is stale and skipped, so the result matches arrival order.
 */

import { EntityRegistry } from '../core/registry';
import { Entity } from '../core/entity';
import { setFields } from '../core/component';
import { Position2D, Camera2D, Inventory, InventorySlot, emptySlot } from '../components';
import { ChunkStore } from '../world/chunk-store';
import { MessageOfType, InventorySlotPayload } from '../protocol/messages';
import { ChatLog } from '../client/chat-log';
import { PendingUpdateMailbox } from './mailbox';
import { InboundQueue } from './inbound-queue';
import { RemotePlayers } from './remote-players';

const DEBUG_RECONCILE = false;

/** Inbound messages that go through the FIFO queue. */
export type QueuedEvent = MessageOfType<
    | 'chunk_data'
    | 'block_changed'
    | 'batch_block_changed'
    | 'player_entered_view'
    | 'player_left_view'
    | 'inventory_update'
    | 'chat_broadcast'
    | 'player_joined'
    | 'player_left'
>;

export type QueuedEventType = QueuedEvent['type'];

/** A queued event and its place in arrival order. */
export interface QueuedArrival {
    readonly seq: number;
    readonly event: QueuedEvent;
}

/** Position in block units, as sent by the server. */
export interface PositionUpdate {
    readonly x: number;
    readonly y: number;
    /** Arrival order, from the same counter as QueuedArrival.seq. */
    readonly seq: number;
}

export type MailboxKind = 'player_position_update';

export type PositionMailbox = PendingUpdateMailbox<MailboxKind, PositionUpdate>;

export interface ReconcileReport {
    /** Queued events applied. */
    events: number;
    /** Block changes that hit a loaded chunk. */
    blocksChanged: number;
    /** Position updates applied to the local or a remote player. */
    positionUpdates: number;
    /** Position updates for players not in view, or older than their view change. */
    ignoredUpdates: number;
}

export interface ReconcilerOptions {
    registry: EntityRegistry;
    store: ChunkStore;
    remotePlayers: RemotePlayers;
    chat: ChatLog;
    queue: InboundQueue<QueuedArrival>;
    mailbox: PositionMailbox;
    localPlayer: Entity;
    localPlayerId: number;
    /** Pixels per block. Server positions are multiplied by this. */
    pixelScale: number;
}

export class Reconciler {
    private readonly options: ReconcilerOptions;

    constructor(options: ReconcilerOptions) {
        this.options = options;
    }

    drainAndApply(): ReconcileReport {
        const report: ReconcileReport = { events: 0, blocksChanged: 0, positionUpdates: 0, ignoredUpdates: 0 };

        // player id -> seq of its last view change in this drain
        const viewChanges = new Map<number, number>();

        for (const { seq, event } of this.options.queue.drain()) {
            this.applyEvent(event, report);
            report.events++;
            if (event.type === 'player_entered_view' || event.type === 'player_left_view' || event.type === 'player_left') {
                viewChanges.set(event.playerId, seq);
            }
        }

        const pending = this.options.mailbox.drain();
        const positions = pending.get('player_position_update');
        if (positions) {
            for (const [playerId, update] of positions) {
                const stale = playerId !== this.options.localPlayerId
                    && update.seq < (viewChanges.get(playerId) ?? -1);
                if (!stale && this.applyPosition(playerId, update)) {
                    report.positionUpdates++;
                } else {
                    report.ignoredUpdates++;
                }
            }
        }

        if (DEBUG_RECONCILE && (report.events > 0 || report.positionUpdates > 0)) {
            console.log(`[sync] applied ${report.events} event(s), ${report.positionUpdates} position update(s)`);
        }
        return report;
    }

    private applyEvent(event: QueuedEvent, report: ReconcileReport): void {
        const { store, remotePlayers, chat, pixelScale } = this.options;

        switch (event.type) {
            case 'chunk_data':
                store.ingestChunkData(event.cx, event.cy, event.blocks);
                break;
            case 'block_changed':
                if (store.applyBlockChange(event.x, event.y, event.blockId)) report.blocksChanged++;
                break;
            case 'batch_block_changed':
                report.blocksChanged += store.applyBatchBlockChange(event.positions, event.blockId);
                break;
            case 'player_entered_view':
                if (event.playerId === this.options.localPlayerId) break;
                remotePlayers.enter(event.playerId, event.x * pixelScale, event.y * pixelScale);
                break;
            case 'player_left_view':
                remotePlayers.leave(event.playerId);
                break;
            case 'inventory_update':
                this.applyInventory(event.slots);
                break;
            case 'chat_broadcast':
                chat.append(event.sender, event.text);
                break;
            case 'player_joined':
                remotePlayers.rememberName(event.playerId, event.name);
                chat.appendSystem(`${event.name} joined the game`);
                break;
            case 'player_left':
                remotePlayers.leave(event.playerId);
                remotePlayers.forgetName(event.playerId);
                chat.appendSystem(`${event.name} left the game`);
                break;
        }
    }

    /**
     * Overwrite slots positionally. A null entry empties its slot; slots past
     * the end of the payload keep their contents, and entries past the
     * inventory size are ignored.
     */
    private applyInventory(payload: readonly InventorySlotPayload[]): void {
        const { registry, localPlayer } = this.options;
        const inventory = registry.get(localPlayer, Inventory);

        const slots: InventorySlot[] = inventory.slots.map((slot) => ({ ...slot }));
        const count = Math.min(payload.length, slots.length);
        for (let i = 0; i < count; i++) {
            const entry = payload[i];
            slots[i] = entry === null ? emptySlot() : { item: entry.item, count: entry.count };
        }
        setFields(inventory, { slots });
    }

    private applyPosition(playerId: number, update: PositionUpdate): boolean {
        const { registry, remotePlayers, localPlayer, localPlayerId, pixelScale } = this.options;
        const x = update.x * pixelScale;
        const y = update.y * pixelScale;

        if (playerId !== localPlayerId) {
            return remotePlayers.move(playerId, x, y);
        }

        setFields(registry.get(localPlayer, Position2D), { x, y });
        setFields(registry.get(localPlayer, Camera2D), { x: -x, y: -y });
        return true;
    }
}
