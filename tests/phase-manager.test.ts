import { describe, it, expect } from 'vitest';
import { GameSession, type GameSetup } from '../src/simulation/game-session';
import { ProcessingError } from '../src/simulation/errors';
import { applyChanges } from '../src/simulation/state-changes';
import type { Action, ActionType, Point } from '../src/types';
import { makeBoard, makeManager, makeState, makeUnit } from './fixtures';

const ALPHA_AT: Point = { x: 30, y: 6 };
const BRAVO_AT: Point = { x: 30, y: 38 };

function setup(): GameSetup {
  return {
    game_id: 'walkthrough',
    seed: 11,
    board: makeBoard([], [{ id: 'home', name: 'Home', x: 30, y: 6 }]),
    units: [
      { id: 'alpha', owner: 1, meta: makeUnit('alpha', { name: 'Alpha' }).meta, models: [{ id: 'alpha-m1' }] },
      { id: 'bravo', owner: 2, meta: makeUnit('bravo', { name: 'Bravo' }).meta, models: [{ id: 'bravo-m1' }] }
    ]
  };
}

function newSession(): GameSession {
  return GameSession.create(setup(), { config: { maxBattleRounds: 2, logLevel: 'silent' } });
}

function end(type: ActionType): unknown {
  return { type, payload: {} };
}

function deploy(session: GameSession): void {
  session.submit({ type: 'DEPLOY_UNIT', actor_unit_id: 'alpha', payload: { positions: [ALPHA_AT] } });
  session.submit({ type: 'DEPLOY_UNIT', actor_unit_id: 'bravo', payload: { positions: [BRAVO_AT] } });
  session.submit(end('END_DEPLOYMENT'));
}

/**
 * A turn in which the active unit stays put; returns the scoring log
 */
function playTurn(session: GameSession, unitId: string): string[] {
  session.submit(end('END_COMMAND'));
  session.submit({ type: 'SKIP_UNIT', actor_unit_id: unitId, payload: {} });
  for (const type of ['END_MOVEMENT', 'END_SHOOTING', 'END_CHARGE', 'END_FIGHT', 'END_MORALE'] as const) {
    const result = session.submit(end(type));
    expect(result.success).toBe(true);
  }
  return session.submit(end('END_SCORING')).log ?? [];
}

describe('Deployment', () => {
  it('should start in deployment with the first player deploying', () => {
    const session = newSession();
    expect(session.state.meta).toMatchObject({
      phase: 'deployment',
      turn_number: 1,
      battle_round: 1,
      active_player: 1,
      rng: { seed: 11, index: 0 }
    });
    expect(session.availableActions().map(a => a.type)).toEqual(['DEPLOY_UNIT']);
  });

  it('should alternate between players', () => {
    const session = newSession();
    const early = session.validate({ type: 'DEPLOY_UNIT', actor_unit_id: 'bravo', payload: { positions: [BRAVO_AT] } });
    expect(early.errors).toEqual(['Player 1 is deploying']);

    const result = session.submit({ type: 'DEPLOY_UNIT', actor_unit_id: 'alpha', payload: { positions: [ALPHA_AT] } });
    expect(result.log).toEqual(['Alpha deployed']);
    expect(session.state.units.alpha.status).toBe('DEPLOYED');
    expect(session.state.units.alpha.models[0].position).toEqual(ALPHA_AT);
    expect(session.state.phase_data.deploying).toBe(2);
  });

  it('should keep units inside their deployment zone', () => {
    const session = newSession();
    const result = session.submit({ type: 'DEPLOY_UNIT', actor_unit_id: 'alpha', payload: { positions: [{ x: 30, y: 20 }] } });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['Model alpha-m1 is outside the deployment zone']);
  });

  it('should not end while units are still to be set up', () => {
    const session = newSession();
    expect(session.validate({ type: 'END_DEPLOYMENT', payload: {} }).errors)
      .toEqual(['Units still to act or be skipped: Alpha, Bravo']);
    expect(session.validate({ type: 'SKIP_UNIT', actor_unit_id: 'alpha', payload: {} }).errors)
      .toEqual(['Alpha has nothing to do in the deployment phase']);
  });

  it('should move to the first command phase and grant CP', () => {
    const session = newSession();
    deploy(session);

    expect(session.state.meta.phase).toBe('command');
    expect(session.state.meta.active_player).toBe(1);
    expect(session.state.players['1'].cp).toBe(1);
    expect(session.state.players['2'].cp).toBe(1);
    expect(session.state.phase_data).toEqual({});
  });
});

describe('Game flow', () => {
  it('should play a full game and declare the winner on VP', () => {
    const session = newSession();
    deploy(session);

    expect(playTurn(session, 'alpha')).toEqual([
      'Home: player 1 (h1, +5VP)',
      'Player 1 scores 5VP',
      'End of scoring phase'
    ]);
    expect(session.state.meta).toMatchObject({ phase: 'command', active_player: 2, turn_number: 2, battle_round: 1 });

    expect(playTurn(session, 'bravo')).toEqual([
      'Home: player 1 (h2)',
      'Player 2 scores 0VP',
      'End of scoring phase'
    ]);
    expect(session.state.meta).toMatchObject({ phase: 'command', active_player: 1, turn_number: 3, battle_round: 2 });

    playTurn(session, 'alpha');
    playTurn(session, 'bravo');

    const { meta, players, history } = session.state;
    expect(meta.game_over).toBe(true);
    expect(meta.winner).toBe(1);
    expect(players['1'].vp).toBe(10);
    expect(players['2'].vp).toBe(0);
    expect(players['1'].cp).toBe(4);
    expect(players['2'].cp).toBe(4);
    expect(history).toHaveLength(35);
    expect(history.map(h => h.seq)).toEqual(Array.from({ length: 35 }, (_, idx) => idx + 1));

    expect(session.availableActions()).toEqual([]);
    expect(session.submit(end('END_COMMAND')).errors).toEqual(['The battle is over']);
  });

  it('should record each action in the history', () => {
    const session = newSession();
    session.submit({ type: 'DEPLOY_UNIT', actor_unit_id: 'alpha', payload: { positions: [ALPHA_AT] } });

    expect(session.state.history).toEqual([{
      seq: 1,
      battle_round: 1,
      turn_number: 1,
      phase: 'deployment',
      player: 1,
      action: { type: 'DEPLOY_UNIT', actor_unit_id: 'alpha', payload: { positions: [ALPHA_AT] } },
      dice: [],
      log: ['Alpha deployed']
    }]);
  });

  it('should not record rejected actions', () => {
    const session = newSession();
    session.submit(end('END_DEPLOYMENT'));
    expect(session.state.history).toEqual([]);
  });

  it('should resume from a snapshot', () => {
    const session = newSession();
    deploy(session);
    session.submit(end('END_COMMAND'));

    const restored = GameSession.fromSnapshot(session.toSnapshot(), { config: { maxBattleRounds: 2, logLevel: 'silent' } });
    expect(restored.state).toEqual(session.state);
    expect(restored.state.meta.phase).toBe('movement');
  });
});

describe('PhaseManager.advancePhase', () => {
  it('should refuse to advance while a decision is pending', () => {
    const manager = makeManager();
    const state = makeState([makeUnit('alpha', { at: [{ x: 10, y: 10 }] })], { phase: 'shooting' });
    state.phase_data.pending_decision = { decider: 2, kind: 'defensive_reaction', options: ['go-to-ground'], context: {} };

    expect(() => manager.advancePhase(state)).toThrow(ProcessingError);
    expect(() => manager.advancePhase(state)).toThrow('Waiting for player 2 to use or decline a reaction');
  });

  it('should refuse to advance a finished game', () => {
    const manager = makeManager();
    const state = makeState([]);
    state.meta.game_over = true;
    expect(() => manager.advancePhase(state)).toThrow('The battle is over');
  });

  it('should walk through the turn phases in order', () => {
    const manager = makeManager();
    let state = makeState([makeUnit('alpha', { at: [{ x: 10, y: 10 }] })]);
    const phases: string[] = [];
    for (let idx = 0; idx < 6; idx++) {
      state = applyChanges(state, manager.advancePhase(state));
      phases.push(state.meta.phase);
    }
    expect(phases).toEqual(['movement', 'shooting', 'charge', 'fight', 'morale', 'scoring']);
  });

  it('should end the game when one side is wiped out', () => {
    const manager = makeManager();
    const state = makeState([
      makeUnit('alpha', { at: [{ x: 10, y: 10 }] }),
      makeUnit('bravo', { owner: 2, status: 'DESTROYED' })
    ], { phase: 'scoring' });

    const next = applyChanges(state, manager.advancePhase(state));
    expect(next.meta.game_over).toBe(true);
    expect(next.meta.winner).toBe(1);
    expect(next.meta.phase).toBe('scoring');
  });

  it('should hand the turn to the second player after the first', () => {
    const manager = makeManager();
    const state = makeState([
      makeUnit('alpha', { at: [{ x: 10, y: 10 }] }),
      makeUnit('bravo', { owner: 2, at: [{ x: 10, y: 40 }] })
    ], { phase: 'scoring', cp: [2, 3] });

    const next = applyChanges(state, manager.advancePhase(state));
    expect(next.meta).toMatchObject({ phase: 'command', active_player: 2, turn_number: 2, battle_round: 1 });
    expect(next.players['1'].cp).toBe(3);
    expect(next.players['2'].cp).toBe(4);
  });
});

describe('PhaseManager.processAction', () => {
  it('should route actions to the current phase', () => {
    const manager = makeManager();
    const state = makeState([]);
    const action: Action = { type: 'END_MOVEMENT', payload: {} };
    expect(manager.processAction(state, action)).toEqual({
      valid: false,
      success: false,
      errors: ['END_MOVEMENT is not a legal action in the command phase']
    });
  });
});
