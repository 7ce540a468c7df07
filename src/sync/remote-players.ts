/**
 * Remote Players
 *
 * Other players currently in view, keyed by server player id. Each one is an
 * entity in the registry with PlayerInfo, Position2D and Velocity2D.
 */

import { EntityRegistry } from '../core/registry';
import { Entity } from '../core/entity';
import { setFields } from '../core/component';
import { Position2D, Velocity2D, PlayerInfo, spawnRemotePlayer } from '../components';

export interface RemotePlayerSnapshot {
    readonly playerId: number;
    readonly name: string;
    /** Pixel position. */
    readonly x: number;
    readonly y: number;
}

export class RemotePlayers {
    private readonly byId = new Map<number, Entity>();
    /** Names from player_joined, kept for players that are not in view yet. */
    private readonly names = new Map<number, string>();

    constructor(private readonly registry: EntityRegistry) {}

    get size(): number {
        return this.byId.size;
    }

    has(playerId: number): boolean {
        return this.byId.has(playerId);
    }

    entityOf(playerId: number): Entity | undefined {
        return this.byId.get(playerId);
    }

    /**
     * A player came into view. Re-entering refreshes the position of the
     * existing entity.
     */
    enter(playerId: number, x: number, y: number): Entity {
        const existing = this.byId.get(playerId);
        if (existing) {
            setFields(this.registry.get(existing, Position2D), { x, y });
            return existing;
        }

        const entity = spawnRemotePlayer(this.registry, playerId, x, y);
        const name = this.names.get(playerId);
        if (name !== undefined) {
            setFields(this.registry.get(entity, PlayerInfo), { name });
        }
        this.byId.set(playerId, entity);
        return entity;
    }

    /** Returns false if the player was not in view. */
    leave(playerId: number): boolean {
        const entity = this.byId.get(playerId);
        if (!entity) return false;
        this.registry.destroy(entity);
        this.byId.delete(playerId);
        return true;
    }

    /**
     * Move a player that is in view. Velocity2D is set to the displacement
     * since the previous update. Returns false (and does nothing) for ids
     * that are not in view.
     */
    move(playerId: number, x: number, y: number): boolean {
        const entity = this.byId.get(playerId);
        if (!entity) return false;

        const position = this.registry.get(entity, Position2D);
        const velocity = this.registry.get(entity, Velocity2D);
        setFields(velocity, { vx: x - position.x, vy: y - position.y });
        setFields(position, { x, y });
        return true;
    }

    rememberName(playerId: number, name: string): void {
        this.names.set(playerId, name);
        const entity = this.byId.get(playerId);
        if (entity) {
            setFields(this.registry.get(entity, PlayerInfo), { name });
        }
    }

    forgetName(playerId: number): void {
        this.names.delete(playerId);
    }

    snapshots(): RemotePlayerSnapshot[] {
        const out: RemotePlayerSnapshot[] = [];
        for (const [playerId, entity] of this.byId) {
            const position = this.registry.get(entity, Position2D);
            const info = this.registry.get(entity, PlayerInfo);
            out.push({ playerId, name: info.name, x: position.x, y: position.y });
        }
        return out;
    }

    clear(): void {
        for (const entity of this.byId.values()) this.registry.destroy(entity);
        this.byId.clear();
        this.names.clear();
    }
}
