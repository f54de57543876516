/**
 * @fileoverview Main entry point for @paperkit/core
 *
 * Logging, errors and settings shared by the server-command client and the
 * Mobility Print installer.
 */

export * from './logging/index.js';
export * from './errors/index.js';
export * from './settings/index.js';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'paperkit';
