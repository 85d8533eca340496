/**
 * Capabilities: descriptors, provider factories, executors and the registry
 *
 * @module capabilities
 */

export * from './Capability.js';
export * from './Executor.js';
export * from './ProviderFactory.js';
export * from './CapabilityRegistry.js';
