export enum WorkflowState {
  INIT = "INIT",
  ENSURING_REPO = "ENSURING_REPO",
  CREATING_WORKTREE = "CREATING_WORKTREE",
  PREPARING_SANDBOX = "PREPARING_SANDBOX",
  AUTHENTICATING = "AUTHENTICATING",
  INITIALIZING_STATE = "INITIALIZING_STATE",
  STARTING_AGENT = "STARTING_AGENT",
  AGENT_RUNNING = "AGENT_RUNNING",
  COMPLETED = "COMPLETED",
  FAILED = "FAILED",
}

/** Linear progression of non-terminal states. */
export const WORKFLOW_ORDER: readonly WorkflowState[] = [
  WorkflowState.INIT,
  WorkflowState.ENSURING_REPO,
  WorkflowState.CREATING_WORKTREE,
  WorkflowState.PREPARING_SANDBOX,
  WorkflowState.AUTHENTICATING,
  WorkflowState.INITIALIZING_STATE,
  WorkflowState.STARTING_AGENT,
  WorkflowState.AGENT_RUNNING,
];

// FAILED is reachable from every non-terminal state; nothing re-enters INIT.
const TRANSITIONS: Record<WorkflowState, readonly WorkflowState[]> = {
  INIT: [WorkflowState.ENSURING_REPO, WorkflowState.FAILED],
  ENSURING_REPO: [WorkflowState.CREATING_WORKTREE, WorkflowState.FAILED],
  CREATING_WORKTREE: [WorkflowState.PREPARING_SANDBOX, WorkflowState.FAILED],
  PREPARING_SANDBOX: [WorkflowState.AUTHENTICATING, WorkflowState.FAILED],
  AUTHENTICATING: [WorkflowState.INITIALIZING_STATE, WorkflowState.FAILED],
  INITIALIZING_STATE: [WorkflowState.STARTING_AGENT, WorkflowState.FAILED],
  STARTING_AGENT: [WorkflowState.AGENT_RUNNING, WorkflowState.FAILED],
  AGENT_RUNNING: [WorkflowState.COMPLETED, WorkflowState.FAILED],
  COMPLETED: [],
  FAILED: [],
};

/** Step action → the state entered while that action runs. */
export const ACTION_TO_STATE: Readonly<Record<string, WorkflowState>> = {
  validate_repo: WorkflowState.ENSURING_REPO,
  create_worktree: WorkflowState.CREATING_WORKTREE,
  prepare_sandbox: WorkflowState.PREPARING_SANDBOX,
  prepare_container: WorkflowState.PREPARING_SANDBOX,
  authenticate: WorkflowState.AUTHENTICATING,
  initialize_state: WorkflowState.INITIALIZING_STATE,
  start_agent: WorkflowState.STARTING_AGENT,
};

export function stateForAction(action: string): WorkflowState | undefined {
  if (!Object.prototype.hasOwnProperty.call(ACTION_TO_STATE, action)) return undefined;
  return ACTION_TO_STATE[action];
}

export function canTransition(from: WorkflowState, to: WorkflowState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function nextState(state: WorkflowState): WorkflowState | undefined {
  const idx = WORKFLOW_ORDER.indexOf(state);
  if (idx < 0) return undefined;
  return WORKFLOW_ORDER[idx + 1];
}

export function isTerminal(state: WorkflowState): boolean {
  return state === WorkflowState.COMPLETED || state === WorkflowState.FAILED;
}

export class InvalidTransitionError extends Error {
  readonly from: WorkflowState;
  readonly to: WorkflowState;

  constructor(from: WorkflowState, to: WorkflowState) {
    super(`Cannot transition from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

/**
 * Path of states visited when moving from `from` to `to`.
 *
 * A direct transition yields `[to]`. Otherwise the walk moves forward through
 * WORKFLOW_ORDER, yielding every intermediate state up to and including the
 * target (local plans skip PREPARING_SANDBOX / AUTHENTICATING steps).
 * A target at or before the current position is an InvalidTransitionError.
 */
export function transitionPath(from: WorkflowState, to: WorkflowState): WorkflowState[] {
  if (canTransition(from, to)) return [to];

  const fromIdx = WORKFLOW_ORDER.indexOf(from);
  const toIdx = WORKFLOW_ORDER.indexOf(to);
  if (fromIdx < 0 || toIdx <= fromIdx) {
    throw new InvalidTransitionError(from, to);
  }
  return WORKFLOW_ORDER.slice(fromIdx + 1, toIdx + 1);
}
