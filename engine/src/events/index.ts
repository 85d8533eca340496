/**
 * Engine events
 *
 * @module events
 */

export * from './EngineEvents.js';
export * from './EventBus.js';
