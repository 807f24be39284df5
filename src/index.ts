/**
 * vbox-link public API.
 * @module vbox-link
 */
export * from './protocols';
export * from './core/config';
export * from './core/logger';
export * from './core/VBoxClient';
