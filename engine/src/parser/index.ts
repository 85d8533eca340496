export * from './FlowParser.js';
