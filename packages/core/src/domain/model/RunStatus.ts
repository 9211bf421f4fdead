/**
 * Finite state machine for the lifecycle of one extraction run.
 *
 * Valid transitions:
 * - `CREATED` → `RUNNING`
 * - `RUNNING` → `COMPLETED` | `FAILED` | `ABORTED`
 * - `COMPLETED`, `FAILED`, `ABORTED` → (terminal)
 */
export const RunStatus = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  ABORTED: 'ABORTED',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

const VALID_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  [RunStatus.CREATED]: [RunStatus.RUNNING],
  [RunStatus.RUNNING]: [RunStatus.COMPLETED, RunStatus.FAILED, RunStatus.ABORTED],
  [RunStatus.COMPLETED]: [],
  [RunStatus.FAILED]: [],
  [RunStatus.ABORTED]: [],
};

/** Check whether a state transition is valid according to the run lifecycle FSM. */
export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: RunStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
