import { describe, it, expect } from 'vitest';
import { calculateObjectiveControl, scoreObjectives } from '../src/simulation/objective-scoring';
import type { Objective, Unit } from '../src/types';
import { CONFIG, makeState, makeUnit, row } from './fixtures';

const CENTRE: Objective = { id: 'centre', name: 'Centre', x: 30, y: 22 };

function holders(ocForPlayer2: number, shocked = false): Unit[] {
  return [
    makeUnit('alpha', {
      at: row(30, 22, 2),
      flags: shocked ? { battle_shocked: true } : {}
    }),
    makeUnit('bravo', { owner: 2, at: [{ x: 30, y: 24.5 }], stats: { objective_control: ocForPlayer2 } })
  ];
}

describe('Objective control', () => {
  it('should sum OC of models within range', () => {
    const state = makeState(holders(3), { objectives: [CENTRE] });
    const control = calculateObjectiveControl(state, CENTRE, CONFIG);

    expect(control.levelOfControl).toEqual({ '1': 4, '2': 3 });
    expect(control.controlledBy).toBe(1);
  });

  it('should give battle-shocked units no OC', () => {
    const state = makeState(holders(3, true), { objectives: [CENTRE] });
    const control = calculateObjectiveControl(state, CENTRE, CONFIG);

    expect(control.levelOfControl).toEqual({ '1': 0, '2': 3 });
    expect(control.controlledBy).toBe(2);
  });

  it('should leave a tie uncontrolled', () => {
    const state = makeState(holders(4), { objectives: [CENTRE] });
    expect(calculateObjectiveControl(state, CENTRE, CONFIG).controlledBy).toBeNull();
  });

  it('should ignore models out of range', () => {
    const far = makeUnit('far', { at: [{ x: 30, y: 30 }] });
    const state = makeState([far], { objectives: [CENTRE] });
    expect(calculateObjectiveControl(state, CENTRE, CONFIG).levelOfControl).toEqual({ '1': 0, '2': 0 });
  });
});

describe('Objective scoring', () => {
  it('should award VP to the scoring player for objectives it holds', () => {
    const state = makeState(holders(3), { objectives: [CENTRE] });
    const result = scoreObjectives(state, 1, CONFIG);

    expect(result.vp).toBe(5);
    expect(result.log).toEqual(['Centre: player 1 (h1, +5VP)']);
    expect(result.changes).toEqual([
      { op: 'set', path: 'board.objectives.0.controlled_by', value: 1 },
      { op: 'set', path: 'board.objectives.0.held_rounds', value: 1 },
      { op: 'set', path: 'players.1.vp', value: 5 }
    ]);
  });

  it('should award nothing to the other player', () => {
    const state = makeState(holders(3), { objectives: [CENTRE] });
    const result = scoreObjectives(state, 2, CONFIG);

    expect(result.vp).toBe(0);
    expect(result.log).toEqual(['Centre: player 1 (h1)']);
  });

  it('should extend the hold timer while control is kept', () => {
    const state = makeState(holders(3), { objectives: [{ ...CENTRE, controlled_by: 1, held_rounds: 1 }] });
    expect(scoreObjectives(state, 1, CONFIG).log).toEqual(['Centre: player 1 (h2, +5VP)']);
  });

  it('should require the configured hold time', () => {
    const state = makeState(holders(3), { objectives: [CENTRE] });
    const result = scoreObjectives(state, 1, { ...CONFIG, holdTimerRequired: 2 });
    expect(result.vp).toBe(0);
    expect(result.log).toEqual(['Centre: player 1 (h1)']);
  });

  it('should report contested objectives', () => {
    const state = makeState([], { objectives: [CENTRE] });
    const result = scoreObjectives(state, 1, CONFIG);
    expect(result.log).toEqual(['Centre: contested (0VP)']);
    expect(result.changes).toContainEqual({ op: 'set', path: 'board.objectives.0.held_rounds', value: 0 });
  });
});
