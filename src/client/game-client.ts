/**
 * Game Client
 *
 * One connected session: owns the entity registry, chunk store, remote
 * players, chat log and the receiver task. The host calls tick() once per
 * frame and turns input into intents (placeBlock, setHorizontalDirection, ...).
 *
 * @example
 * const client = await GameClient.open({ serverUrl: 'ws://127.0.0.1:8080', playerName: 'alice' });
 * setInterval(() => client.tick(), 16);
 */

import { ClientConfig, resolveClientConfig } from '../config';
import { TransportClosedError } from '../errors';
import { EntityRegistry } from '../core/registry';
import { Entity } from '../core/entity';
import { setFields } from '../core/component';
import {
    Position2D,
    Velocity2D,
    Camera2D,
    Inventory,
    InventorySlot,
    SelectedSlot,
    spawnLocalPlayer,
    positionOf
} from '../components';
import { Vec2, vec2, vec2LengthSq, vec2Sub } from '../math/vec';
import { ChunkStore } from '../world/chunk-store';
import { CHUNK_SIZE } from '../world/constants';
import { chunkOfPixel } from '../world/coords';
import { encodeMessage } from '../protocol/codec';
import {
    OutboundMessage,
    breakBlock,
    changeSlot,
    goodbye,
    placeBlock,
    playerJump,
    playerVelocityChange,
    sendChatMessage
} from '../protocol/messages';
import { Transport } from '../transport/transport';
import { WebSocketTransport } from '../transport/ws-transport';
import { InboundQueue } from '../sync/inbound-queue';
import { PendingUpdateMailbox } from '../sync/mailbox';
import { RemotePlayers, RemotePlayerSnapshot } from '../sync/remote-players';
import {
    Reconciler,
    ReconcileReport,
    QueuedArrival,
    MailboxKind,
    PositionUpdate
} from '../sync/reconciler';
import { ConnectionState, TerminationReason } from '../net/connection';
import { handshake, Welcome } from '../net/session';
import { NetworkReceiver, ReceiverStats } from '../net/receiver';
import { ChatLog } from './chat-log';

export type HorizontalDirection = -1 | 0 | 1;

export interface GameClientCallbacks {
    /** Called once when the connection terminates, for any reason. */
    onDisconnect?(reason: TerminationReason, detail: string | null): void;
}

/** Second reach origin, one block above the feet. */
const HEAD_OFFSET = vec2(0, 1);

/**
 * True if a target at `offset` blocks from the player is within `range`,
 * measured from either the player's feet or one block above them.
 */
export function isInReach(offset: Vec2, range: number): boolean {
    const limit = range * range;
    return vec2LengthSq(offset) <= limit || vec2LengthSq(vec2Sub(offset, HEAD_OFFSET)) <= limit;
}

export class GameClient {
    readonly config: ClientConfig;
    readonly registry = new EntityRegistry();
    readonly store = new ChunkStore();
    readonly remotePlayers: RemotePlayers;
    readonly chat: ChatLog;
    readonly connection = new ConnectionState();

    /** Server-assigned id of the local player. */
    readonly playerId: number;
    readonly worldWidth: number;
    readonly worldHeight: number;
    readonly localPlayer: Entity;

    private readonly transport: Transport;
    private readonly queue = new InboundQueue<QueuedArrival>();
    private readonly mailbox = new PendingUpdateMailbox<MailboxKind, PositionUpdate>();
    private readonly reconciler: Reconciler;
    private readonly receiver: NetworkReceiver;
    private readonly receiverDone: Promise<void>;
    private receiverError: unknown = null;

    private direction: HorizontalDirection = 0;
    private jumpHeld: boolean = false;

    /**
     * Open a WebSocket to `config.serverUrl` and connect over it.
     *
     * @throws TransportClosedError if the socket cannot be opened
     */
    static async open(config: Partial<ClientConfig> = {}, callbacks: GameClientCallbacks = {}): Promise<GameClient> {
        const resolved = resolveClientConfig(config);
        const transport = await WebSocketTransport.connect(resolved.serverUrl, {
            openTimeoutMs: resolved.handshakeTimeoutMs
        });
        return GameClient.connect(transport, resolved, callbacks);
    }

    /**
     * Handshake over `transport` and start the session.
     *
     * @throws RangeError if the configuration is invalid
     * @throws KickedError, HandshakeTimeoutError or TransportClosedError if
     * the handshake fails
     */
    static async connect(
        transport: Transport,
        config: Partial<ClientConfig> = {},
        callbacks: GameClientCallbacks = {}
    ): Promise<GameClient> {
        const resolved = resolveClientConfig(config);
        const welcome = await handshake(transport, resolved.playerName, { timeoutMs: resolved.handshakeTimeoutMs });
        return new GameClient(transport, resolved, welcome, callbacks);
    }

    private constructor(
        transport: Transport,
        config: ClientConfig,
        welcome: Welcome,
        callbacks: GameClientCallbacks
    ) {
        this.transport = transport;
        this.config = config;
        this.playerId = welcome.playerId;
        this.worldWidth = welcome.worldWidth;
        this.worldHeight = welcome.worldHeight;

        if (welcome.chunkSize !== CHUNK_SIZE) {
            console.warn(`[client] server chunk size ${welcome.chunkSize} differs from ${CHUNK_SIZE}; block positions may be wrong`);
        }

        this.remotePlayers = new RemotePlayers(this.registry);
        this.chat = new ChatLog(config.chatCapacity);
        this.localPlayer = spawnLocalPlayer(this.registry, {
            playerId: welcome.playerId,
            name: config.playerName,
            x: welcome.spawnX * config.pixelScale,
            y: welcome.spawnY * config.pixelScale,
            inventorySlots: config.inventorySlots
        });

        this.reconciler = new Reconciler({
            registry: this.registry,
            store: this.store,
            remotePlayers: this.remotePlayers,
            chat: this.chat,
            queue: this.queue,
            mailbox: this.mailbox,
            localPlayer: this.localPlayer,
            localPlayerId: welcome.playerId,
            pixelScale: config.pixelScale
        });

        this.connection.onTerminate((reason, detail) => {
            console.log(`[client] disconnected (${reason}${detail ? `: ${detail}` : ''})`);
            callbacks.onDisconnect?.(reason, detail);
        });

        this.receiver = new NetworkReceiver({
            transport,
            connection: this.connection,
            queue: this.queue,
            mailbox: this.mailbox,
            pollIntervalMs: config.pollIntervalMs
        });
        this.receiverDone = this.receiver.run().catch((err: unknown) => {
            this.receiverError = err;
            console.error('[client] receiver stopped with an error:', err);
        });
    }

    get terminated(): boolean {
        return this.connection.terminated;
    }

    /** Error that stopped the receiver, if it did not stop cleanly. */
    get lastError(): unknown {
        return this.receiverError;
    }

    // ============================================
    // Tick
    // ============================================

    /**
     * Apply everything received since the last tick, then stream chunks
     * around the player. Once the connection has terminated only the
     * first step runs.
     */
    tick(): ReconcileReport {
        const report = this.reconciler.drainAndApply();
        if (this.connection.terminated) return report;

        const position = this.registry.get(this.localPlayer, Position2D);
        const center = chunkOfPixel(position.x, position.y, this.config.pixelScale);
        for (const request of this.store.reconcileViewport(center, this.config.viewportRadiusX, this.config.viewportRadiusY)) {
            if (!this.send(request)) break;
        }
        return report;
    }

    // ============================================
    // Intents
    // ============================================

    /**
     * Ask the server to place the selected item at block (x, y). `offset` is
     * the target's distance from the player in blocks. Returns whether the
     * request was sent.
     */
    placeBlock(x: number, y: number, offset: Vec2): boolean {
        if (!this.canInteract(x, y, offset)) return false;
        return this.send(placeBlock(Math.floor(x), Math.floor(y)));
    }

    breakBlock(x: number, y: number, offset: Vec2): boolean {
        if (!this.canInteract(x, y, offset)) return false;
        return this.send(breakBlock(Math.floor(x), Math.floor(y)));
    }

    /**
     * Report the horizontal input direction. Only a change of direction is
     * sent to the server.
     */
    setHorizontalDirection(direction: HorizontalDirection): boolean {
        if (direction === this.direction) return false;
        this.direction = direction;

        const vx = direction * this.config.moveSpeed;
        setFields(this.registry.get(this.localPlayer, Velocity2D), { vx: vx * this.config.pixelScale });
        return this.send(playerVelocityChange(vx));
    }

    /**
     * Jump key state. A jump is sent on the press edge only; holding the key
     * does not repeat it.
     */
    jump(pressed: boolean): boolean {
        if (!pressed) {
            this.jumpHeld = false;
            return false;
        }
        if (this.jumpHeld) return false;
        this.jumpHeld = true;
        return this.send(playerJump());
    }

    /**
     * Select a hotbar slot.
     *
     * @throws RangeError if `slot` is not a valid slot index
     */
    changeSlot(slot: number): boolean {
        if (!Number.isInteger(slot) || slot < 0 || slot >= this.config.inventorySlots) {
            throw new RangeError(`Slot must be an integer in [0, ${this.config.inventorySlots - 1}], got ${slot}`);
        }
        setFields(this.registry.get(this.localPlayer, SelectedSlot), { slot });
        return this.send(changeSlot(slot));
    }

    sendChat(text: string): boolean {
        if (text.length === 0) return false;
        return this.send(sendChatMessage(text));
    }

    /**
     * Say goodbye, close the transport and wait for the receiver to stop.
     */
    async disconnect(): Promise<void> {
        if (!this.connection.terminated) {
            this.send(goodbye());
        }
        this.connection.terminate('goodbye');
        this.transport.close();
        await this.receiverDone;
    }

    // ============================================
    // Read side
    // ============================================

    getBlock(worldX: number, worldY: number): number {
        return this.store.getBlock(worldX, worldY);
    }

    localPosition(): Vec2 {
        return positionOf(this.registry.get(this.localPlayer, Position2D));
    }

    /** Offset the renderer adds to world pixel positions. */
    worldOrigin(): Vec2 {
        const camera = this.registry.get(this.localPlayer, Camera2D);
        return { x: camera.x, y: camera.y };
    }

    remotePlayerSnapshots(): RemotePlayerSnapshot[] {
        return this.remotePlayers.snapshots();
    }

    chatLines(): readonly string[] {
        return this.chat.all();
    }

    inventorySlots(): readonly InventorySlot[] {
        return this.registry.get(this.localPlayer, Inventory).slots.map((slot) => ({ ...slot }));
    }

    selectedSlot(): number {
        return this.registry.get(this.localPlayer, SelectedSlot).slot;
    }

    receiverStats(): ReceiverStats {
        return this.receiver.stats();
    }

    // ============================================
    // Internals
    // ============================================

    private canInteract(x: number, y: number, offset: Vec2): boolean {
        if (this.connection.terminated) return false;
        if (x < 0 || y < 0) return false;
        return isInReach(offset, this.config.interactRange);
    }

    /**
     * Encode and send. A closed transport terminates the connection instead
     * of throwing; returns whether the message went out.
     */
    private send(message: OutboundMessage): boolean {
        if (this.connection.terminated) return false;
        try {
            this.transport.send(encodeMessage(message));
            return true;
        } catch (err) {
            if (!(err instanceof TransportClosedError)) throw err;
            this.connection.terminate('transport-closed', err.message);
            return false;
        }
    }
}
