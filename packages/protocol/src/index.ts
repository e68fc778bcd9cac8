/**
 * @openassoc/protocol
 *
 * Protocol versions and their vocabulary, associate message types, the wire
 * codec and the message channel contract.
 */

export * from './version.js';
export * from './vocabulary.js';
export * from './messages.js';
export * from './codec.js';
export * from './kvform.js';
export type { MessageChannel, ChannelRequestOptions } from './channel.js';
