/**
 * tilesync - client core for chunked 2D block worlds
 *
 * Features:
 * - Schema-per-tag binary protocol
 * - Transport abstraction over WebSocket or in-process pairs
 * - Sealed, typed components and an entity registry
 * - Chunk cache streamed around the player
 * - Single-writer reconciliation of network updates once per tick
 */

// ============================================
// Errors & configuration
// ============================================
export * from './errors';
export * from './config';

// ============================================
// Math
// ============================================
export * from './math';

// ============================================
// Core ECS
// ============================================
export * from './core';
export * from './components';

// ============================================
// Wire protocol
// ============================================
export * from './codec';
export * from './protocol';

// ============================================
// Transport
// ============================================
export * from './transport';

// ============================================
// World
// ============================================
export * from './world';

// ============================================
// Sync & network
// ============================================
export * from './sync';
export * from './net';

// ============================================
// Client
// ============================================
export * from './client';
