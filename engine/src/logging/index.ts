export * from './EngineLogger.js';
export * from './LoggerManager.js';
