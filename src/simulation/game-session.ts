/**
 * Reference host for the engine: owns one GameState, applies the diffs the
 * engine returns and advances phases when they complete.
 */

import type {
  Action,
  ActionDescriptor,
  ActionResult,
  Board,
  GameState,
  PlayerId,
  StateChange,
  UnitMeta,
  ValidationResult
} from '../types';
import { resolveEngineConfig, type EngineConfig } from './config';
import { PhaseManager, type PhaseManagerOptions } from './phase-manager';
import { deserializeSnapshot, parseAction, serializeSnapshot, validateSnapshot } from './snapshot';
import { applyChanges } from './state-changes';

export interface ModelSetup {
  id: string;
  base_mm?: number;
  /** Defaults to the unit's Wounds characteristic */
  wounds?: number;
}

export interface UnitSetup {
  id: string;
  owner: PlayerId;
  meta: UnitMeta;
  models: ModelSetup[];
}

export interface GameSetup {
  game_id: string;
  seed: number;
  board: Board;
  units: UnitSetup[];
  first_player?: PlayerId;
}

/**
 * Initial state at the start of deployment
 */
export function createGameState(setup: GameSetup, config: Partial<EngineConfig> = {}): GameState {
  const resolved = resolveEngineConfig(config);
  const firstPlayer = setup.first_player ?? 1;
  const player = () => ({ cp: resolved.startingCp, vp: 0, stratagem_usage: [] });

  const units = Object.fromEntries(setup.units.map(u => [u.id, {
    id: u.id,
    owner: u.owner,
    status: 'UNDEPLOYED',
    flags: {},
    meta: u.meta,
    models: u.models.map(m => {
      const wounds = m.wounds ?? u.meta.stats.wounds;
      return { id: m.id, wounds, current_wounds: wounds, base_mm: m.base_mm ?? 32, position: null, alive: true };
    })
  }]));

  return validateSnapshot({
    meta: {
      game_id: setup.game_id,
      phase: 'deployment',
      turn_number: 1,
      battle_round: 1,
      active_player: firstPlayer,
      first_player: firstPlayer,
      version: 1,
      rng: { seed: setup.seed, index: 0 }
    },
    units,
    board: setup.board,
    players: { '1': player(), '2': player() },
    active_effects: {},
    phase_data: {},
    history: []
  });
}

export class GameSession {
  readonly manager: PhaseManager;
  private current: GameState;

  constructor(state: GameState, options: PhaseManagerOptions = {}) {
    this.manager = new PhaseManager(options);
    this.current = validateSnapshot(state);
  }

  static create(setup: GameSetup, options: PhaseManagerOptions = {}): GameSession {
    return new GameSession(createGameState(setup, options.config), options);
  }

  static fromSnapshot(json: string, options: PhaseManagerOptions = {}): GameSession {
    return new GameSession(deserializeSnapshot(json), options);
  }

  get state(): GameState {
    return this.current;
  }

  availableActions(): ActionDescriptor[] {
    return this.manager.getAvailableActions(this.current);
  }

  validate(action: Action): ValidationResult {
    return this.manager.validateAction(this.current, action);
  }

  /**
   * Process an action, apply its changes and move on when the phase is over
   */
  submit(input: unknown): ActionResult {
    const action = parseAction(input);
    const result = this.manager.processAction(this.current, action);
    if (!result.success) {
      return result;
    }

    this.apply(result.changes ?? []);
    if (result.phase_complete) {
      this.advance();
    }
    return result;
  }

  /**
   * Leave the current phase and enter the next one
   */
  advance(): StateChange[] {
    const changes = this.manager.advancePhase(this.current);
    this.apply(changes);
    return changes;
  }

  toSnapshot(): string {
    return serializeSnapshot(this.current);
  }

  private apply(changes: readonly StateChange[]): void {
    this.current = applyChanges(this.current, changes);
  }
}
