export * from './ConfigStore.js';
