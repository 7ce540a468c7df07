/**
 * Entity Registry
 *
 * Owns entity ids and the component map of every live entity. Component
 * names are unique per entity. The registry has a single writer: whoever
 * runs the simulation tick.
 */

import { EntityIdAllocator } from './entity-id';
import { Entity } from './entity';
import {
    AnyComponent,
    Component,
    ComponentType,
    assignFields,
    isComponent,
    isComponentOf,
    readFields
} from './component';

export class EntityRegistry {
    private readonly allocator: EntityIdAllocator;
    private readonly components = new Map<number, Map<string, AnyComponent>>();

    constructor(capacity?: number) {
        this.allocator = new EntityIdAllocator(capacity);
    }

    /** Number of live entities. */
    get size(): number {
        return this.components.size;
    }

    create(): Entity {
        const eid = this.allocator.allocate();
        this.components.set(eid, new Map());
        return new Entity(eid);
    }

    /**
     * Drop the entity and all its components. Destroying a dead entity is a no-op.
     */
    destroy(entity: Entity): void {
        if (!this.components.delete(entity.eid)) return;
        this.allocator.free(entity.eid);
    }

    isAlive(entity: Entity): boolean {
        return this.components.has(entity.eid);
    }

    /**
     * Attach a component under `name`.
     *
     * @throws Error if the entity already has a component with that name
     */
    add(entity: Entity, name: string, component: AnyComponent): void {
        const map = this.mapOf(entity);
        if (map.has(name)) {
            throw new Error(`${entity} already has component '${name}'`);
        }
        map.set(name, component);
    }

    /**
     * Attach a component unless one with that name is already present.
     * Returns whether it was attached.
     */
    tryAdd(entity: Entity, name: string, component: AnyComponent): boolean {
        const map = this.mapOf(entity);
        if (map.has(name)) return false;
        map.set(name, component);
        return true;
    }

    /**
     * @throws Error if the entity has no such component, or if it has one
     * under that name of a different type
     */
    get<T extends object>(entity: Entity, type: ComponentType<T>): Component<T>;
    get(entity: Entity, name: string): AnyComponent;
    get<T extends object>(entity: Entity, key: ComponentType<T> | string): AnyComponent {
        const name = typeof key === 'string' ? key : key.name;
        const component = this.mapOf(entity).get(name);
        if (!component) {
            throw new Error(`${entity} has no component '${name}'`);
        }
        if (typeof key !== 'string' && !isComponentOf(component, key)) {
            throw new Error(`${entity} component '${name}' is not a ${key.name}`);
        }
        return component;
    }

    tryGet<T extends object>(entity: Entity, type: ComponentType<T>): Component<T> | undefined;
    tryGet(entity: Entity, name: string): AnyComponent | undefined;
    tryGet<T extends object>(entity: Entity, key: ComponentType<T> | string): AnyComponent | undefined {
        const map = this.components.get(entity.eid);
        if (!map) return undefined;
        if (typeof key === 'string') return map.get(key);
        const component = map.get(key.name);
        return isComponentOf(component, key) ? component : undefined;
    }

    has(entity: Entity, name: string): boolean {
        return this.components.get(entity.eid)?.has(name) ?? false;
    }

    remove(entity: Entity, name: string): boolean {
        return this.components.get(entity.eid)?.delete(name) ?? false;
    }

    /**
     * Copy field values into the stored component. `source` is either another
     * component or a plain record. Every source field must exist on the
     * target; if one does not, nothing is written.
     *
     * @throws Error if the entity has no component `name`
     * @throws UnknownFieldError if `source` names a field the target lacks
     */
    set(entity: Entity, name: string, source: AnyComponent | Readonly<Record<string, unknown>>): void {
        const target = this.get(entity, name);
        assignFields(target, isComponent(source) ? readFields(source) : source);
    }

    /** Live entities, in creation order. */
    entities(): Entity[] {
        return Array.from(this.components.keys(), (eid) => new Entity(eid));
    }

    /** Component names attached to an entity. */
    componentsOf(entity: Entity): string[] {
        return Array.from(this.mapOf(entity).keys());
    }

    private mapOf(entity: Entity): Map<string, AnyComponent> {
        const map = this.components.get(entity.eid);
        if (!map) {
            throw new Error(`${entity} is not alive`);
        }
        return map;
    }
}
