/**
 * Core ECS - entity ids, sealed components and the entity registry
 */

export * from './constants';
export * from './component';
export * from './entity-id';
export * from './entity';
export * from './registry';
