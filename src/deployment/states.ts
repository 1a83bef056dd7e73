/**
 * States of one deployment attempt and the pure transition table between them
 */

export type TerminalState = 'Succeeded' | 'RolledBack' | 'Failed';

export type ActiveState =
  | 'Validating'
  | 'BackingUp'
  | 'StoppingOld'
  | 'Provisioning'
  | 'Migrating'
  | 'Starting'
  | 'HealthChecking'
  | 'RollingBack';

export type DeploymentState = ActiveState | TerminalState;

export type StepOutcome = 'success' | 'failure';

export const INITIAL_STATE: ActiveState = 'Validating';

/**
 * Where each state goes on success and on failure. Nothing before StoppingOld
 * has changed anything, so those failures end the attempt directly.
 */
export const TRANSITIONS: Readonly<
  Record<ActiveState, Readonly<Record<StepOutcome, DeploymentState>>>
> = {
  Validating: { success: 'BackingUp', failure: 'Failed' },
  BackingUp: { success: 'StoppingOld', failure: 'Failed' },
  StoppingOld: { success: 'Provisioning', failure: 'RollingBack' },
  Provisioning: { success: 'Migrating', failure: 'RollingBack' },
  Migrating: { success: 'Starting', failure: 'RollingBack' },
  Starting: { success: 'HealthChecking', failure: 'RollingBack' },
  HealthChecking: { success: 'Succeeded', failure: 'RollingBack' },
  RollingBack: { success: 'RolledBack', failure: 'Failed' },
};

export function nextState(
  state: ActiveState,
  outcome: StepOutcome
): DeploymentState {
  return TRANSITIONS[state][outcome];
}

export function isTerminal(state: DeploymentState): state is TerminalState {
  return state === 'Succeeded' || state === 'RolledBack' || state === 'Failed';
}

/**
 * Process exit codes; automation alerts differently on the two failures
 */
export const EXIT_CODES: Readonly<Record<TerminalState, number>> = {
  Succeeded: 0,
  Failed: 1,
  RolledBack: 2,
};
