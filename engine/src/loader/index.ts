/**
 * Flow Loader Module
 *
 * @module loader
 */

export * from './FlowLoader.js';
export * from './DefaultFlows.js';
