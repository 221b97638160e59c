/**
 * Logging Module
 *
 * @module logging
 */

export * from './EngineLogger.js';
