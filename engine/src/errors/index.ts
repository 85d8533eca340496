/**
 * Error taxonomy
 *
 * Every error the engine raises is a CapflowError with a `CFW-*` code.
 *
 * @module errors
 */

export * from './ErrorCodes.js';
export * from './ExitCodes.js';
export * from './CapflowError.js';
export * from './ConfigError.js';
export * from './RegistryErrors.js';
export * from './GraphError.js';
export * from './ExecutionErrors.js';
export * from './DefinitionError.js';
