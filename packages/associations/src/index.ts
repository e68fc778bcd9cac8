/**
 * @openassoc/associations
 *
 * Association entity and stores, Diffie-Hellman exchange and security policy.
 */

export * from './association.js';
export * from './store.js';
export * from './diffie-hellman.js';
export * from './security-policy.js';
