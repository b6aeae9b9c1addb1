/**
 * Snapshot schemas (zod) for saving, loading and replicating game state.
 *
 * A snapshot must carry `meta`, `units` and `board`; every other field is
 * optional on input and filled with its default.
 */

import { z } from 'zod';
import type { Action, GameState } from '../types';
import { RerollType } from '../types';
import { IntegrityError } from './errors';

// ============================================================================
// SHARED PIECES
// ============================================================================

const PlayerIdSchema = z.union([z.literal(1), z.literal(2)]);

const PointSchema = z.object({ x: z.number(), y: z.number() });

const PhaseSchema = z.enum(['deployment', 'command', 'movement', 'shooting', 'charge', 'fight', 'morale', 'scoring']);

const AttackKindSchema = z.enum(['ranged', 'melee']);

const FlagValueSchema = z.union([z.boolean(), z.number(), z.string()]);

const DiceRecordSchema = z.object({
  context: z.string(),
  rolls_raw: z.array(z.number().int().min(1).max(6)),
  successes: z.number().int(),
  modifiers_applied: z.array(z.string()).default([])
});

// ============================================================================
// UNITS
// ============================================================================

const WeaponSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: AttackKindSchema,
  range: z.number().nonnegative(),
  attacks: z.union([z.string(), z.number()]).transform(String),
  skill: z.number().int().min(2).max(6),
  strength: z.number().int().positive(),
  ap: z.number().int().max(0),
  damage: z.union([z.string(), z.number()]).transform(String),
  keywords: z.array(z.string()).default([]),
  model_ids: z.array(z.string()).optional()
});

const UnitStatsSchema = z.object({
  move: z.number().nonnegative(),
  toughness: z.number().int().positive(),
  save: z.number().int().min(2).max(7),
  wounds: z.number().int().positive(),
  leadership: z.number().int().min(2).max(12),
  objective_control: z.number().int().nonnegative(),
  invulnerable_save: z.number().int().min(2).max(6).optional(),
  feel_no_pain: z.number().int().min(2).max(6).optional()
});

const ModelSchema = z.object({
  id: z.string(),
  wounds: z.number().int().positive(),
  current_wounds: z.number().int(),
  base_mm: z.number().positive().default(32),
  position: PointSchema.nullable().default(null),
  alive: z.boolean()
});

const UnitSchema = z.object({
  id: z.string(),
  owner: PlayerIdSchema,
  status: z.enum(['UNDEPLOYED', 'IN_RESERVES', 'DEPLOYED', 'DESTROYED']).default('UNDEPLOYED'),
  models: z.array(ModelSchema).min(1),
  flags: z.record(FlagValueSchema).default({}),
  meta: z.object({
    name: z.string(),
    keywords: z.array(z.string()).default([]),
    stats: UnitStatsSchema,
    weapons: z.array(WeaponSchema).default([]),
    abilities: z.array(z.string()).default([]),
    points: z.number().optional()
  })
});

// ============================================================================
// BOARD
// ============================================================================

const TerrainSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.enum(['ruins', 'woods', 'crater', 'barricade', 'building', 'container', 'hills', 'debris', 'custom']),
  x: z.number(),
  y: z.number(),
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
  elevation: z.number().nonnegative().optional(),
  shape: z.enum(['rectangle', 'circle', 'polygon']),
  vertices: z.array(PointSchema).optional(),
  radius: z.number().positive().optional(),
  traits: z.object({
    coverLight: z.boolean().optional(),
    coverHeavy: z.boolean().optional(),
    obscuring: z.boolean().optional(),
    denseCover: z.boolean().optional(),
    breachable: z.boolean().optional(),
    difficultGround: z.boolean().optional(),
    exposedPosition: z.boolean().optional()
  }).default({}),
  impassable: z.boolean().optional(),
  infantryOnly: z.boolean().optional()
});

const ZoneSchema = z.object({
  min_x: z.number(),
  min_y: z.number(),
  max_x: z.number(),
  max_y: z.number()
});

const BoardSchema = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
  terrain: z.array(TerrainSchema).default([]),
  deployment_zones: z.object({ '1': ZoneSchema, '2': ZoneSchema }),
  objectives: z.array(z.object({
    id: z.string(),
    name: z.string(),
    x: z.number(),
    y: z.number(),
    controlled_by: PlayerIdSchema.nullable().optional(),
    held_rounds: z.number().int().nonnegative().optional()
  })).default([])
});

// ============================================================================
// EFFECTS AND PLAYERS
// ============================================================================

const attackScope = { attack: AttackKindSchema.optional() };
const valued = <T extends string>(type: T) => z.object({ type: z.literal(type), value: z.number(), ...attackScope });
const flagOnly = <T extends string>(type: T) => z.object({ type: z.literal(type), ...attackScope });

export const EffectEntrySchema = z.discriminatedUnion('type', [
  valued('invulnerable_save'),
  flagOnly('cover'),
  valued('hit_modifier_incoming'),
  valued('hit_modifier_outgoing'),
  valued('wound_modifier_incoming'),
  valued('wound_modifier_outgoing'),
  valued('save_modifier'),
  valued('ap_reduction'),
  valued('damage_reduction'),
  valued('feel_no_pain'),
  valued('critical_hit_threshold'),
  valued('critical_wound_threshold'),
  z.object({ type: z.literal('grant_weapon_keyword'), keyword: z.string(), ...attackScope }),
  z.object({ type: z.literal('reroll_hits'), reroll: z.nativeEnum(RerollType), ...attackScope }),
  z.object({ type: z.literal('reroll_wounds'), reroll: z.nativeEnum(RerollType), ...attackScope }),
  z.object({
    type: z.literal('eligibility'),
    permission: z.enum(['shoot_after_fall_back', 'charge_after_fall_back', 'shoot_after_advance', 'charge_after_advance']),
    ...attackScope
  }),
  flagOnly('fights_first'),
  flagOnly('fights_next'),
  flagOnly('battle_shock_immune'),
  z.object({
    type: z.literal('direct_damage'),
    dice: z.union([z.number().int().nonnegative(), z.literal('source_toughness')]),
    success_on: z.number().int().min(2).max(6),
    max_wounds: z.number().int().positive().optional(),
    ...attackScope
  }),
  z.object({ type: z.literal('mortal_wounds'), amount: z.string(), ...attackScope }),
  z.object({ type: z.literal('gain_cp'), value: z.number().int(), ...attackScope })
]);

const ActiveEffectSchema = z.object({
  id: z.string(),
  source_id: z.string(),
  owner: PlayerIdSchema,
  target_unit_id: z.string(),
  entries: z.array(EffectEntrySchema),
  expiry: z.enum(['end_of_phase', 'end_of_turn', 'end_of_battle']),
  created: z.object({ turn_number: z.number().int(), phase: PhaseSchema })
});

const PlayerStateSchema = z.object({
  cp: z.number().int().nonnegative().default(0),
  vp: z.number().int().nonnegative().default(0),
  stratagem_usage: z.array(z.object({
    stratagem_id: z.string(),
    turn_number: z.number().int(),
    battle_round: z.number().int(),
    phase: PhaseSchema,
    target_unit_id: z.string().optional()
  })).default([])
});

const freshPlayer = () => ({ cp: 0, vp: 0, stratagem_usage: [] });

// ============================================================================
// ACTIONS
// ============================================================================

const Positions = z.object({ positions: z.array(PointSchema) });
const Empty = z.object({}).strict().default({});
const Assignments = z.array(z.object({ weapon_id: z.string(), target_unit_id: z.string() }));

const unitAction = <T extends string, P extends z.ZodTypeAny>(type: T, payload: P) =>
  z.object({ type: z.literal(type), actor_unit_id: z.string(), payload });
const endAction = <T extends string>(type: T) => z.object({ type: z.literal(type), payload: Empty });

export const ActionSchema = z.discriminatedUnion('type', [
  unitAction('DEPLOY_UNIT', Positions),
  unitAction('PLACE_IN_RESERVES', Empty),
  unitAction('NORMAL_MOVE', Positions),
  unitAction('BEGIN_ADVANCE', Empty),
  unitAction('ADVANCE', Positions),
  unitAction('FALL_BACK', Positions),
  unitAction('REMAIN_STATIONARY', Empty),
  unitAction('ARRIVE_FROM_RESERVES', Positions),
  unitAction('SHOOT', z.object({ assignments: Assignments })),
  unitAction('DECLARE_CHARGE', z.object({ target_unit_ids: z.array(z.string()) })),
  unitAction('CHARGE_MOVE', Positions),
  unitAction('FIGHT', z.object({
    assignments: Assignments,
    pile_in: z.array(PointSchema).optional(),
    consolidate: z.array(PointSchema).optional()
  })),
  unitAction('BATTLE_SHOCK_TEST', Empty),
  unitAction('SKIP_UNIT', Empty),
  z.object({
    type: z.literal('USE_STRATAGEM'),
    actor_unit_id: z.string().optional(),
    payload: z.object({ player: PlayerIdSchema, stratagem_id: z.string(), target_unit_id: z.string() })
  }),
  z.object({
    type: z.literal('USE_REACTION'),
    actor_unit_id: z.string().optional(),
    payload: z.object({ player: PlayerIdSchema, stratagem_id: z.string(), target_unit_id: z.string().optional() })
  }),
  z.object({
    type: z.literal('DECLINE_REACTION'),
    actor_unit_id: z.string().optional(),
    payload: z.object({ player: PlayerIdSchema })
  }),
  endAction('END_DEPLOYMENT'),
  endAction('END_COMMAND'),
  endAction('END_MOVEMENT'),
  endAction('END_SHOOTING'),
  endAction('END_CHARGE'),
  endAction('END_FIGHT'),
  endAction('END_MORALE'),
  endAction('END_SCORING')
]);

// ============================================================================
// SNAPSHOT
// ============================================================================

export const SnapshotSchema = z.object({
  meta: z.object({
    game_id: z.string(),
    phase: PhaseSchema,
    turn_number: z.number().int().positive(),
    battle_round: z.number().int().positive(),
    active_player: PlayerIdSchema,
    first_player: PlayerIdSchema.default(1),
    version: z.number().int().default(1),
    rng: z.object({ seed: z.number().int(), index: z.number().int().nonnegative() }).default({ seed: 0, index: 0 }),
    game_over: z.boolean().optional(),
    winner: PlayerIdSchema.nullable().optional()
  }),
  units: z.record(UnitSchema),
  board: BoardSchema,
  players: z.object({
    '1': PlayerStateSchema.default(freshPlayer),
    '2': PlayerStateSchema.default(freshPlayer)
  }).default({ '1': freshPlayer(), '2': freshPlayer() }),
  active_effects: z.record(ActiveEffectSchema).default({}),
  phase_data: z.record(z.unknown()).default({}),
  history: z.array(z.object({
    seq: z.number().int(),
    battle_round: z.number().int(),
    turn_number: z.number().int(),
    phase: PhaseSchema,
    player: PlayerIdSchema,
    action: ActionSchema,
    dice: z.array(DiceRecordSchema).default([]),
    log: z.array(z.string()).default([])
  })).default([])
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Validate a parsed snapshot object and fill optional fields with defaults
 */
export function validateSnapshot(input: unknown): GameState {
  const parsed = SnapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new IntegrityError(`Malformed snapshot: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function serializeSnapshot(state: GameState): string {
  return JSON.stringify(validateSnapshot(state));
}

export function deserializeSnapshot(json: string): GameState {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new IntegrityError(`Snapshot is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return validateSnapshot(raw);
}

/**
 * Check the shape of an action received from a caller or over the wire
 */
export function parseAction(input: unknown): Action {
  const parsed = ActionSchema.safeParse(input);
  if (!parsed.success) {
    throw new IntegrityError(`Malformed action: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
