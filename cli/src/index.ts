/**
 * Programmatic access to the CLI's commands and formatters
 */

export { createProgram, CLI_VERSION } from './program.js';
export { runFlow, parsePositiveInt, parsePositiveNumber, type RunFlowDeps } from './commands/run.js';
export { validateFlow } from './commands/validate.js';
export { listCapabilities } from './commands/capabilities.js';
export * from './formatters/Formatter.js';
export * from './formatters/createFormatter.js';
export { HumanFormatter } from './formatters/HumanFormatter.js';
export { JsonFormatter } from './formatters/JsonFormatter.js';
export { NullFormatter } from './formatters/NullFormatter.js';
export * from './types/CliRunOptions.js';
export type { CliValidateOptions } from './types/CliValidateOptions.js';
export { exitCodeForError, exitCodeForStatus } from './utils/exit.js';
export { collectInputs, readInputsFile } from './utils/inputs.js';
export { LOOPBACK_CONFIG, createRuntime, type CliRuntime } from './utils/runtime.js';
