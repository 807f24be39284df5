/**
 * Protocol exports.
 * @module protocols
 */
export * from './vbox';
