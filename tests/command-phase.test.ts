import { describe, it, expect } from 'vitest';
import { applyChanges } from '../src/simulation/state-changes';
import { act, makeManager, makeState, makeUnit } from './fixtures';

describe('Command phase', () => {
  it('should grant CP to both players and reset the active player\'s turn flags', () => {
    const manager = makeManager();
    const state = makeState([
      makeUnit('alpha', { at: [{ x: 10, y: 10 }], flags: { moved: true, battle_shocked: true, effect_cover: true } }),
      makeUnit('bravo', { owner: 2, at: [{ x: 10, y: 30 }], flags: { moved: true } })
    ], { cp: [1, 2] });

    const next = applyChanges(state, manager.getPhase('command').enter(state));

    expect(next.players['1'].cp).toBe(2);
    expect(next.players['2'].cp).toBe(3);
    expect(next.units.alpha.flags).toEqual({ effect_cover: true });
    expect(next.units.bravo.flags).toEqual({ moved: true });
  });

  it('should grant the configured CP', () => {
    const manager = makeManager(undefined, { cpPerCommandPhase: 2 });
    const state = makeState([], { cp: [0, 0] });
    const next = applyChanges(state, manager.getPhase('command').enter(state));
    expect(next.players['1'].cp).toBe(2);
  });

  it('should have nothing to do but end the phase', () => {
    const manager = makeManager();
    const state = makeState([makeUnit('alpha', { at: [{ x: 10, y: 10 }] })]);

    expect(manager.getAvailableActions(state).map(a => a.type)).toEqual(['END_COMMAND']);
    const { result } = act(manager, state, { type: 'END_COMMAND', payload: {} });
    expect(result.log).toEqual(['End of command phase']);
    expect(result.phase_complete).toBe(true);
  });
});
