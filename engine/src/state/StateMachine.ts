/**
 * State Machine
 *
 * Enforces valid state transitions for nodes and runs. An invalid
 * transition is a scheduler bug, so it throws instead of being ignored.
 *
 * This is about RULES, not execution. It answers:
 * - Can this state transition happen?
 * - What are the valid next states?
 * - Is this state terminal?
 *
 * @module state
 */

import { NodeStatus, RunStatus, type FinalRunStatus } from './ExecutionState.js';

/**
 * State transition record for audit trail
 */
export interface StateTransition<T> {
  /** State before transition */
  readonly from: T;
  /** State after transition */
  readonly to: T;
  /** Timestamp of transition (ms since epoch) */
  readonly timestamp: number;
  /** Optional reason for transition */
  readonly reason?: string;
}

/**
 * State machine configuration
 */
export interface StateMachineConfig<T> {
  /** Initial state */
  readonly initialState: T;
  /** Valid transitions map: from → allowed to states */
  readonly transitions: ReadonlyMap<T, readonly T[]>;
  /** Terminal states (no further transitions allowed) */
  readonly terminalStates: ReadonlySet<T>;
}

/**
 * Generic state machine for enforcing valid transitions
 */
export class StateMachine<T> {
  private currentState: T;
  private readonly config: StateMachineConfig<T>;
  private readonly history: StateTransition<T>[] = [];

  constructor(config: StateMachineConfig<T>) {
    this.config = config;
    this.currentState = config.initialState;
  }

  /**
   * Get current state
   */
  getState(): T {
    return this.currentState;
  }

  /**
   * Check if transition is valid
   */
  canTransition(to: T): boolean {
    // Terminal states cannot transition
    if (this.config.terminalStates.has(this.currentState)) {
      return false;
    }

    const allowedTransitions = this.config.transitions.get(this.currentState);
    if (!allowedTransitions) {
      return false;
    }

    return allowedTransitions.includes(to);
  }

  /**
   * Perform state transition
   * 
   * @param to - Target state
   * @param reason - Optional reason for transition
   * @throws Error if transition is invalid
   */
  transition(to: T, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new Error(
        `Invalid state transition: ${String(this.currentState)} → ${String(to)}`
      );
    }

    const from = this.currentState;
    this.currentState = to;

    // Record transition
    this.history.push({
      from,
      to,
      timestamp: Date.now(),
      reason,
    });
  }

  /**
   * Check if current state is terminal
   */
  isTerminal(): boolean {
    return this.config.terminalStates.has(this.currentState);
  }

  /**
   * Get allowed transitions from current state
   */
  getAllowedTransitions(): readonly T[] {
    return this.config.transitions.get(this.currentState) ?? [];
  }

  /**
   * Get transition history
   */
  getHistory(): readonly StateTransition<T>[] {
    return [...this.history];
  }

  /**
   * Time of the most recent transition into `state`, if any
   */
  enteredAt(state: T): number | undefined {
    for (let i = this.history.length - 1; i >= 0; i--) {
      const entry = this.history[i];
      if (entry && entry.to === state) {
        return entry.timestamp;
      }
    }
    return undefined;
  }
}

/**
 * Node transitions:
 * PENDING → READY | SKIPPED | CANCELLED
 * READY → RUNNING | CANCELLED
 * RUNNING → SUCCEEDED | FAILED | CANCELLED
 */
const NODE_TRANSITIONS = new Map<NodeStatus, readonly NodeStatus[]>([
  [NodeStatus.PENDING, [NodeStatus.READY, NodeStatus.SKIPPED, NodeStatus.CANCELLED]],
  [NodeStatus.READY, [NodeStatus.RUNNING, NodeStatus.CANCELLED]],
  [NodeStatus.RUNNING, [NodeStatus.SUCCEEDED, NodeStatus.FAILED, NodeStatus.CANCELLED]],
  [NodeStatus.SUCCEEDED, []], // Terminal
  [NodeStatus.FAILED, []], // Terminal
  [NodeStatus.SKIPPED, []], // Terminal
  [NodeStatus.CANCELLED, []], // Terminal
]);

const NODE_TERMINAL_STATES = new Set<NodeStatus>([
  NodeStatus.SUCCEEDED,
  NodeStatus.FAILED,
  NodeStatus.SKIPPED,
  NodeStatus.CANCELLED,
]);

const RUN_TRANSITIONS = new Map<RunStatus, readonly RunStatus[]>([
  [RunStatus.RUNNING, [
    RunStatus.SUCCEEDED,
    RunStatus.PARTIAL,
    RunStatus.FAILED,
    RunStatus.CANCELLED,
    RunStatus.TIMED_OUT,
  ]],
  [RunStatus.SUCCEEDED, []],
  [RunStatus.PARTIAL, []],
  [RunStatus.FAILED, []],
  [RunStatus.CANCELLED, []],
  [RunStatus.TIMED_OUT, []],
]);

const RUN_TERMINAL_STATES = new Set<RunStatus>([
  RunStatus.SUCCEEDED,
  RunStatus.PARTIAL,
  RunStatus.FAILED,
  RunStatus.CANCELLED,
  RunStatus.TIMED_OUT,
]);

export function createNodeStateMachine(): StateMachine<NodeStatus> {
  return new StateMachine<NodeStatus>({
    initialState: NodeStatus.PENDING,
    transitions: NODE_TRANSITIONS,
    terminalStates: NODE_TERMINAL_STATES,
  });
}

export function createRunStateMachine(): StateMachine<RunStatus> {
  return new StateMachine<RunStatus>({
    initialState: RunStatus.RUNNING,
    transitions: RUN_TRANSITIONS,
    terminalStates: RUN_TERMINAL_STATES,
  });
}

export function isNodeTerminal(status: NodeStatus): boolean {
  return NODE_TERMINAL_STATES.has(status);
}

export function isRunFinal(status: RunStatus): status is FinalRunStatus {
  return RUN_TERMINAL_STATES.has(status);
}

export function getNodeTransitions(from: NodeStatus): readonly NodeStatus[] {
  return NODE_TRANSITIONS.get(from) ?? [];
}
