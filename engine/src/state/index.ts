export * from './ExecutionState.js';
export * from './StateMachine.js';
