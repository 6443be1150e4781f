/**
 * CLI Library Module
 *
 * @module cli/lib
 */

export * from './config.js';
export * from './logger.js';
export * from './output.js';
