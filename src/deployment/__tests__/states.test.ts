import { describe, it, expect } from 'vitest';
import {
  EXIT_CODES,
  TRANSITIONS,
  isTerminal,
  nextState,
  type ActiveState,
  type DeploymentState,
} from '../states.js';

describe('deployment states', () => {
  it('should walk the happy path from Validating to Succeeded', () => {
    const visited: DeploymentState[] = [];
    let state: DeploymentState = 'Validating';
    while (!isTerminal(state)) {
      visited.push(state);
      state = nextState(state, 'success');
    }

    expect(visited).toEqual([
      'Validating',
      'BackingUp',
      'StoppingOld',
      'Provisioning',
      'Migrating',
      'Starting',
      'HealthChecking',
    ]);
    expect(state).toBe('Succeeded');
  });

  it('should end without rollback when nothing was changed yet', () => {
    expect(nextState('Validating', 'failure')).toBe('Failed');
    expect(nextState('BackingUp', 'failure')).toBe('Failed');
  });

  it.each<ActiveState>([
    'StoppingOld',
    'Provisioning',
    'Migrating',
    'Starting',
    'HealthChecking',
  ])('should roll back when %s fails', (state) => {
    expect(nextState(state, 'failure')).toBe('RollingBack');
  });

  it('should end RollingBack in RolledBack or Failed', () => {
    expect(nextState('RollingBack', 'success')).toBe('RolledBack');
    expect(nextState('RollingBack', 'failure')).toBe('Failed');
  });

  it('should define both outcomes for every active state', () => {
    for (const outcomes of Object.values(TRANSITIONS)) {
      expect(Object.keys(outcomes).sort()).toEqual(['failure', 'success']);
    }
  });

  it('should use distinct exit codes per terminal state', () => {
    expect(EXIT_CODES).toEqual({ Succeeded: 0, Failed: 1, RolledBack: 2 });
    expect(isTerminal('RolledBack')).toBe(true);
    expect(isTerminal('RollingBack')).toBe(false);
  });
});
