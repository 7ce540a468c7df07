/**
 * Codec - byte-level encoding primitives shared by the wire protocol.
 */

export * from './binary';
