/**
 * vBox protocol exports.
 * @module vbox
 */
export * from './constants';
export * from './errors';
export * from './frame';
export * from './requests';
export * from './responses';
export * from './message-id';
export * from './pending';
export * from './dispatcher';
export * from './heartbeat';
export * from './reconnect';
export * from './connection';
