/**
 * Builders shared by the test suites
 */

import type {
  Action,
  ActionResult,
  Board,
  FlagValue,
  GameState,
  Objective,
  PhaseName,
  PlayerId,
  Point,
  Unit,
  UnitStats,
  WeaponProfile
} from '../src/types';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../src/simulation/config';
import { createScriptedRng, Dice } from '../src/simulation/dice';
import { PhaseManager } from '../src/simulation/phase-manager';
import { applyChanges } from '../src/simulation/state-changes';
import type { TerrainFeature } from '../src/simulation/terrain';

export const CONFIG: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, logLevel: 'silent' };

/** Centre-to-centre distance at which two 32mm bases touch */
export const CONTACT = 32 / 25.4;

export function rangedWeapon(id: string, overrides: Partial<WeaponProfile> = {}): WeaponProfile {
  return {
    id,
    name: id,
    type: 'ranged',
    range: 24,
    attacks: '1',
    skill: 3,
    strength: 4,
    ap: 0,
    damage: '1',
    keywords: [],
    ...overrides
  };
}

export function meleeWeapon(id: string, overrides: Partial<WeaponProfile> = {}): WeaponProfile {
  return rangedWeapon(id, { type: 'melee', range: 0, ...overrides });
}

export interface UnitOptions {
  owner?: PlayerId;
  name?: string;
  /** One model per position; the unit is DEPLOYED unless a status is given */
  at?: Point[];
  /** Model count for units that are not on the table */
  count?: number;
  stats?: Partial<UnitStats>;
  keywords?: string[];
  weapons?: WeaponProfile[];
  abilities?: string[];
  status?: Unit['status'];
  flags?: Record<string, FlagValue>;
}

export function makeUnit(id: string, options: UnitOptions = {}): Unit {
  const stats: UnitStats = {
    move: 6,
    toughness: 4,
    save: 3,
    wounds: 1,
    leadership: 7,
    objective_control: 2,
    ...options.stats
  };
  const positions: (Point | null)[] = options.at ?? Array.from({ length: options.count ?? 1 }, () => null);

  return {
    id,
    owner: options.owner ?? 1,
    status: options.status ?? (options.at ? 'DEPLOYED' : 'UNDEPLOYED'),
    flags: { ...options.flags },
    meta: {
      name: options.name ?? id,
      keywords: options.keywords ?? ['INFANTRY'],
      stats,
      weapons: options.weapons ?? [],
      abilities: options.abilities ?? []
    },
    models: positions.map((position, idx) => ({
      id: `${id}-m${idx + 1}`,
      wounds: stats.wounds,
      current_wounds: stats.wounds,
      base_mm: 32,
      position,
      alive: true
    }))
  };
}

/**
 * Points along a horizontal line, `spacing` inches apart
 */
export function row(x: number, y: number, count: number, spacing = 1.5): Point[] {
  return Array.from({ length: count }, (_, idx) => ({ x: x + idx * spacing, y }));
}

export function makeBoard(terrain: TerrainFeature[] = [], objectives: Objective[] = []): Board {
  return {
    width: 60,
    height: 44,
    terrain,
    deployment_zones: {
      '1': { min_x: 0, min_y: 0, max_x: 60, max_y: 12 },
      '2': { min_x: 0, min_y: 32, max_x: 60, max_y: 44 }
    },
    objectives
  };
}

export interface StateOptions {
  phase?: PhaseName;
  active?: PlayerId;
  round?: number;
  turn?: number;
  cp?: [number, number];
  terrain?: TerrainFeature[];
  objectives?: Objective[];
}

export function makeState(units: Unit[], options: StateOptions = {}): GameState {
  const [cp1, cp2] = options.cp ?? [0, 0];
  return {
    meta: {
      game_id: 'test-game',
      phase: options.phase ?? 'command',
      turn_number: options.turn ?? 1,
      battle_round: options.round ?? 1,
      active_player: options.active ?? 1,
      first_player: 1,
      version: 1,
      rng: { seed: 1, index: 0 }
    },
    units: Object.fromEntries(units.map(u => [u.id, u])),
    board: makeBoard(options.terrain, options.objectives),
    players: {
      '1': { cp: cp1, vp: 0, stratagem_usage: [] },
      '2': { cp: cp2, vp: 0, stratagem_usage: [] }
    },
    active_effects: {},
    phase_data: {},
    history: []
  };
}

/**
 * Dice that replay the given faces
 */
export function scriptedDice(faces: number[] = []): Dice {
  return new Dice(createScriptedRng(faces)({ seed: 1, index: 0 }));
}

export function makeManager(faces?: number[], config: Partial<EngineConfig> = {}): PhaseManager {
  return new PhaseManager({
    config: { ...config, logLevel: 'silent' },
    rngFactory: faces ? createScriptedRng(faces) : undefined
  });
}

/**
 * Process an action and apply its changes when it succeeds
 */
export function act(manager: PhaseManager, state: GameState, action: Action): { result: ActionResult; state: GameState } {
  const result = manager.processAction(state, action);
  return { result, state: result.success ? applyChanges(state, result.changes ?? []) : state };
}
