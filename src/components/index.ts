/**
 * Standard Components
 *
 * Built-in components for the player and remote players. Positions are in
 * pixels (block coordinates times the client's pixel scale).
 */

import { defineComponent, field, setFields, Component } from '../core/component';
import { EntityRegistry } from '../core/registry';
import { Entity } from '../core/entity';
import { Vec2 } from '../math/vec';

/**
 * Wrap an angle in degrees into [0, 360).
 */
export function wrapDegrees(angle: number): number {
    return ((angle % 360) + 360) % 360;
}

export const Position2D = defineComponent('Position2D', {
    x: 0,
    y: 0
});

export const Velocity2D = defineComponent('Velocity2D', {
    vx: 0,
    vy: 0
});

/**
 * Rotation2D - facing angle in degrees, always stored in [0, 360).
 */
export const Rotation2D = defineComponent('Rotation2D', {
    angle: field<number>('number', 0, wrapDegrees)
});

export const Health = defineComponent('Health', {
    current: 100,
    maximum: 100
});

export interface InventorySlot {
    /** Item id, or EMPTY_ITEM. */
    item: number;
    count: number;
}

export const EMPTY_ITEM = -1;

export function emptySlot(): InventorySlot {
    return { item: EMPTY_ITEM, count: 0 };
}

export function emptySlots(count: number): InventorySlot[] {
    return Array.from({ length: count }, emptySlot);
}

/**
 * Inventory - hotbar contents. The slot count is fixed at spawn; the server
 * overwrites slots positionally.
 */
export const Inventory = defineComponent('Inventory', {
    slots: field<InventorySlot[]>('list', [])
});

export const SelectedSlot = defineComponent('SelectedSlot', {
    slot: 0
});

/**
 * PlayerInfo - server-assigned id and display name.
 */
export const PlayerInfo = defineComponent('PlayerInfo', {
    playerId: 0,
    name: ''
});

/**
 * Camera2D - world origin offset for the renderer. It is kept at the
 * negation of the local player's position, so the player stays centered.
 */
export const Camera2D = defineComponent('Camera2D', {
    x: 0,
    y: 0
});

export type Position2DData = { x: number; y: number };
export type Velocity2DData = { vx: number; vy: number };

// ============================================
// Vector helpers
// ============================================

export function positionOf(position: Component<Position2DData>): Vec2 {
    return { x: position.x, y: position.y };
}

export function velocityOf(velocity: Component<Velocity2DData>): Vec2 {
    return { x: velocity.vx, y: velocity.vy };
}

/** Advance `position` by `velocity * dt`. */
export function translate(
    position: Component<Position2DData>,
    velocity: Component<Velocity2DData>,
    dt: number
): void {
    setFields(position, { x: position.x + velocity.vx * dt, y: position.y + velocity.vy * dt });
}

export function addVelocity(velocity: Component<Velocity2DData>, dvx: number, dvy: number): void {
    setFields(velocity, { vx: velocity.vx + dvx, vy: velocity.vy + dvy });
}

export function scaleVelocity(velocity: Component<Velocity2DData>, factor: number): void {
    setFields(velocity, { vx: velocity.vx * factor, vy: velocity.vy * factor });
}

// ============================================
// Spawning
// ============================================

export interface LocalPlayerOptions {
    playerId: number;
    name: string;
    /** Pixel position. */
    x: number;
    y: number;
    inventorySlots: number;
}

/**
 * Create the local player's entity with every component the client reads.
 */
export function spawnLocalPlayer(registry: EntityRegistry, options: LocalPlayerOptions): Entity {
    const entity = registry.create();
    registry.add(entity, Position2D.name, Position2D.create({ x: options.x, y: options.y }));
    registry.add(entity, Velocity2D.name, Velocity2D.create());
    registry.add(entity, Rotation2D.name, Rotation2D.create());
    registry.add(entity, Camera2D.name, Camera2D.create({ x: -options.x, y: -options.y }));
    registry.add(entity, Health.name, Health.create());
    registry.add(entity, Inventory.name, Inventory.create({ slots: emptySlots(options.inventorySlots) }));
    registry.add(entity, SelectedSlot.name, SelectedSlot.create());
    registry.add(entity, PlayerInfo.name, PlayerInfo.create({ playerId: options.playerId, name: options.name }));
    return entity;
}

/**
 * Create an entity for another player that came into view.
 */
export function spawnRemotePlayer(registry: EntityRegistry, playerId: number, x: number, y: number): Entity {
    const entity = registry.create();
    registry.add(entity, PlayerInfo.name, PlayerInfo.create({ playerId }));
    registry.add(entity, Position2D.name, Position2D.create({ x, y }));
    registry.add(entity, Velocity2D.name, Velocity2D.create());
    return entity;
}
