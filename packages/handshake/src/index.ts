/**
 * @openassoc/handshake
 *
 * Relying party and provider sides of the associate exchange.
 */

export * from './endpoint.js';
export * from './relying-party.js';
export * from './provider.js';
export * from './setup.js';
