/**
 * Type definitions for the battle rules engine.
 *
 * Everything under GameState is the persisted snapshot layout, so field names
 * follow the snake_case army/save format rather than TypeScript conventions.
 */

import type { TerrainFeature } from '../simulation/terrain';

/**
 * Types of re-roll mechanics
 */
export enum RerollType {
  NONE = "none",           // No re-roll
  ONES = "ones",           // Re-roll 1s only
  FAILED = "failed",       // Re-roll failed rolls
  ALL = "all"              // Re-roll all rolls
}

export type PlayerId = 1 | 2;
export type PlayerKey = '1' | '2';

export interface Point {
  x: number;
  y: number;
}

export type PhaseName =
  | 'deployment'
  | 'command'
  | 'movement'
  | 'shooting'
  | 'charge'
  | 'fight'
  | 'morale'
  | 'scoring';

export type UnitStatus = 'UNDEPLOYED' | 'IN_RESERVES' | 'DEPLOYED' | 'DESTROYED';

export type AttackKind = 'ranged' | 'melee';

// ============================================================================
// UNITS
// ============================================================================

/**
 * Unit statistics. Saves and skills are stored as the target number (3 = "3+").
 */
export interface UnitStats {
  move: number;
  toughness: number;
  save: number;
  wounds: number;
  leadership: number;
  objective_control: number;
  invulnerable_save?: number;
  feel_no_pain?: number;
}

/**
 * Immutable weapon profile. Attacks and damage accept dice expressions ("D6+1").
 */
export interface WeaponProfile {
  id: string;
  name: string;
  type: AttackKind;
  range: number;           // inches, 0 for melee
  attacks: string;
  skill: number;           // BS or WS target number
  strength: number;
  ap: number;              // negative or zero, e.g. -1
  damage: string;
  keywords: string[];      // e.g. ["ASSAULT", "SUSTAINED HITS 1"]
  model_ids?: string[];    // models carrying the weapon, all models when omitted
}

export interface UnitMeta {
  name: string;
  keywords: string[];
  stats: UnitStats;
  weapons: WeaponProfile[];
  abilities: string[];     // ability registry ids
  points?: number;
}

export interface Model {
  id: string;
  wounds: number;
  current_wounds: number;
  base_mm: number;
  position: Point | null;
  alive: boolean;
}

export type FlagValue = boolean | number | string;

export interface Unit {
  id: string;
  owner: PlayerId;
  status: UnitStatus;
  models: Model[];
  flags: Record<string, FlagValue>;
  meta: UnitMeta;
}

// ============================================================================
// BOARD AND PLAYERS
// ============================================================================

export interface DeploymentZone {
  min_x: number;
  min_y: number;
  max_x: number;
  max_y: number;
}

export interface Objective {
  id: string;
  name: string;
  x: number;
  y: number;
  controlled_by?: PlayerId | null;
  held_rounds?: number;
}

export interface Board {
  width: number;
  height: number;
  terrain: TerrainFeature[];
  deployment_zones: Record<PlayerKey, DeploymentZone>;
  objectives: Objective[];
}

export interface StratagemUsage {
  stratagem_id: string;
  turn_number: number;
  battle_round: number;
  phase: PhaseName;
  target_unit_id?: string;
}

export interface PlayerState {
  cp: number;
  vp: number;
  stratagem_usage: StratagemUsage[];
}

// ============================================================================
// EFFECTS
// ============================================================================

export type EligibilityPermission =
  | 'shoot_after_fall_back'
  | 'charge_after_fall_back'
  | 'shoot_after_advance'
  | 'charge_after_advance';

/**
 * Closed catalog of effect primitives shared by stratagems and abilities.
 */
export type EffectPrimitive =
  | { type: 'invulnerable_save'; value: number }
  | { type: 'cover' }
  | { type: 'hit_modifier_incoming'; value: number }
  | { type: 'hit_modifier_outgoing'; value: number }
  | { type: 'wound_modifier_incoming'; value: number }
  | { type: 'wound_modifier_outgoing'; value: number }
  | { type: 'save_modifier'; value: number }
  | { type: 'ap_reduction'; value: number }
  | { type: 'damage_reduction'; value: number }
  | { type: 'feel_no_pain'; value: number }
  | { type: 'critical_hit_threshold'; value: number }
  | { type: 'critical_wound_threshold'; value: number }
  | { type: 'grant_weapon_keyword'; keyword: string }
  | { type: 'reroll_hits'; reroll: RerollType }
  | { type: 'reroll_wounds'; reroll: RerollType }
  | { type: 'eligibility'; permission: EligibilityPermission }
  | { type: 'fights_first' }
  | { type: 'fights_next' }
  | { type: 'battle_shock_immune' }
  | { type: 'direct_damage'; dice: number | 'source_toughness'; success_on: number; max_wounds?: number }
  | { type: 'mortal_wounds'; amount: string }
  | { type: 'gain_cp'; value: number };

export type EffectType = EffectPrimitive['type'];

/**
 * An effect primitive, optionally restricted to one kind of attack
 */
export type EffectEntry = EffectPrimitive & { attack?: AttackKind };

export type EffectExpiry = 'end_of_phase' | 'end_of_turn' | 'end_of_battle';

export interface ActiveEffect {
  id: string;
  source_id: string;
  owner: PlayerId;
  target_unit_id: string;
  entries: EffectEntry[];
  expiry: EffectExpiry;
  created: { turn_number: number; phase: PhaseName };
}

// ============================================================================
// GAME STATE
// ============================================================================

export interface RngState {
  seed: number;
  index: number;
}

export interface GameMeta {
  game_id: string;
  phase: PhaseName;
  turn_number: number;
  battle_round: number;
  active_player: PlayerId;
  first_player: PlayerId;
  version: number;
  rng: RngState;
  game_over?: boolean;
  winner?: PlayerId | null;
}

export interface HistoryEntry {
  seq: number;
  battle_round: number;
  turn_number: number;
  phase: PhaseName;
  player: PlayerId;
  action: Action;
  dice: DiceRecord[];
  log: string[];
}

export type PhaseData = Record<string, unknown>;

export interface GameState {
  meta: GameMeta;
  units: Record<string, Unit>;
  board: Board;
  players: Record<PlayerKey, PlayerState>;
  active_effects: Record<string, ActiveEffect>;
  phase_data: PhaseData;
  history: HistoryEntry[];
}

// ============================================================================
// ACTIONS AND RESULTS
// ============================================================================

export interface WeaponAssignment {
  weapon_id: string;
  target_unit_id: string;
}

export type Action =
  | { type: 'DEPLOY_UNIT'; actor_unit_id: string; payload: { positions: Point[] } }
  | { type: 'PLACE_IN_RESERVES'; actor_unit_id: string; payload: Record<string, never> }
  | { type: 'NORMAL_MOVE'; actor_unit_id: string; payload: { positions: Point[] } }
  | { type: 'BEGIN_ADVANCE'; actor_unit_id: string; payload: Record<string, never> }
  | { type: 'ADVANCE'; actor_unit_id: string; payload: { positions: Point[] } }
  | { type: 'FALL_BACK'; actor_unit_id: string; payload: { positions: Point[] } }
  | { type: 'REMAIN_STATIONARY'; actor_unit_id: string; payload: Record<string, never> }
  | { type: 'ARRIVE_FROM_RESERVES'; actor_unit_id: string; payload: { positions: Point[] } }
  | { type: 'SHOOT'; actor_unit_id: string; payload: { assignments: WeaponAssignment[] } }
  | { type: 'DECLARE_CHARGE'; actor_unit_id: string; payload: { target_unit_ids: string[] } }
  | { type: 'CHARGE_MOVE'; actor_unit_id: string; payload: { positions: Point[] } }
  | {
      type: 'FIGHT';
      actor_unit_id: string;
      payload: { assignments: WeaponAssignment[]; pile_in?: Point[]; consolidate?: Point[] };
    }
  | { type: 'BATTLE_SHOCK_TEST'; actor_unit_id: string; payload: Record<string, never> }
  | { type: 'SKIP_UNIT'; actor_unit_id: string; payload: Record<string, never> }
  | {
      type: 'USE_STRATAGEM';
      actor_unit_id?: string;
      payload: { player: PlayerId; stratagem_id: string; target_unit_id: string };
    }
  | { type: 'USE_REACTION'; actor_unit_id?: string; payload: { player: PlayerId; stratagem_id: string; target_unit_id?: string } }
  | { type: 'DECLINE_REACTION'; actor_unit_id?: string; payload: { player: PlayerId } }
  | { type: 'END_DEPLOYMENT'; payload: Record<string, never> }
  | { type: 'END_COMMAND'; payload: Record<string, never> }
  | { type: 'END_MOVEMENT'; payload: Record<string, never> }
  | { type: 'END_SHOOTING'; payload: Record<string, never> }
  | { type: 'END_CHARGE'; payload: Record<string, never> }
  | { type: 'END_FIGHT'; payload: Record<string, never> }
  | { type: 'END_MORALE'; payload: Record<string, never> }
  | { type: 'END_SCORING'; payload: Record<string, never> };

export type ActionType = Action['type'];

export type ActionOf<T extends ActionType> = Extract<Action, { type: T }>;

export type StateChange =
  | { op: 'set'; path: string; value: unknown }
  | { op: 'remove'; path: string };

export interface DiceRecord {
  context: string;
  rolls_raw: number[];
  successes: number;
  modifiers_applied: string[];
}

export type DecisionKind = 'defensive_reaction' | 'overwatch' | 'command_reroll';

export interface PendingDecision {
  decider: PlayerId;
  kind: DecisionKind;
  options: string[];          // stratagem ids the decider may use
  context: Record<string, unknown>;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ActionResult {
  valid?: boolean;
  success?: boolean;
  errors?: string[];
  changes?: StateChange[];
  dice?: DiceRecord[];
  error?: string;
  log?: string[];
  phase_complete?: boolean;
  awaiting_decision?: PendingDecision;
}

/**
 * Advisory affordance for callers building controls
 */
export interface ActionDescriptor {
  type: ActionType;
  actor_unit_id?: string;
  player: PlayerId;
  description: string;
}
