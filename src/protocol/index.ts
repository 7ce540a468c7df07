/**
 * Protocol - tagged wire messages and their binary codec.
 */

export * from './messages';
export * from './codec';
