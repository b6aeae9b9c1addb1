/**
 * Effect primitives library.
 *
 * A small closed catalog of effect operations shared by stratagems and unit
 * abilities. Each primitive is declared either persistent (it writes an
 * `effect_*` flag on the target unit until its ActiveEffect expires) or
 * instant (it changes state once, e.g. mortal wounds). Flags are derived from
 * the definitions' own entries, so clearing any effect is generic.
 */

import type {
  ActiveEffect,
  AttackKind,
  EffectEntry,
  EffectExpiry,
  EffectType,
  FlagValue,
  GameState,
  StateChange,
  Unit
} from '../types';
import { RerollType } from '../types';
import { getBestReroll } from '../calculators/rerolls';
import { getPassiveEntries } from './ability-registry';
import { removeChange, setChange } from './state-changes';

// ============================================================================
// PRIMITIVE CATALOG
// ============================================================================

type Combine = 'sum' | 'min' | 'any' | 'reroll' | 'list';

interface PrimitiveSpec {
  kind: 'persistent' | 'instant';
  combine?: Combine;
  description: string;
}

export const EFFECT_PRIMITIVES: Record<EffectType, PrimitiveSpec> = {
  invulnerable_save: { kind: 'persistent', combine: 'min', description: 'Invulnerable save' },
  cover: { kind: 'persistent', combine: 'any', description: 'Benefit of cover' },
  hit_modifier_incoming: { kind: 'persistent', combine: 'sum', description: 'Modifier to hit rolls of attacks targeting the unit' },
  hit_modifier_outgoing: { kind: 'persistent', combine: 'sum', description: 'Modifier to hit rolls of the unit\'s attacks' },
  wound_modifier_incoming: { kind: 'persistent', combine: 'sum', description: 'Modifier to wound rolls of attacks targeting the unit' },
  wound_modifier_outgoing: { kind: 'persistent', combine: 'sum', description: 'Modifier to wound rolls of the unit\'s attacks' },
  save_modifier: { kind: 'persistent', combine: 'sum', description: 'Modifier to saving throws' },
  ap_reduction: { kind: 'persistent', combine: 'sum', description: 'Worsen incoming AP' },
  damage_reduction: { kind: 'persistent', combine: 'sum', description: 'Reduce damage of each attack' },
  feel_no_pain: { kind: 'persistent', combine: 'min', description: 'Ignore wounds on a roll' },
  critical_hit_threshold: { kind: 'persistent', combine: 'min', description: 'Critical hits on this roll or better' },
  critical_wound_threshold: { kind: 'persistent', combine: 'min', description: 'Critical wounds on this roll or better' },
  grant_weapon_keyword: { kind: 'persistent', combine: 'list', description: 'Weapons gain a keyword' },
  reroll_hits: { kind: 'persistent', combine: 'reroll', description: 'Re-roll hit rolls' },
  reroll_wounds: { kind: 'persistent', combine: 'reroll', description: 'Re-roll wound rolls' },
  eligibility: { kind: 'persistent', combine: 'any', description: 'Override an eligibility restriction' },
  fights_first: { kind: 'persistent', combine: 'any', description: 'Fights in the Fights First step' },
  fights_next: { kind: 'persistent', combine: 'any', description: 'Fights next, out of the normal order' },
  battle_shock_immune: { kind: 'persistent', combine: 'any', description: 'Automatically passes Battle-shock tests' },
  direct_damage: { kind: 'instant', description: 'Roll dice; each success inflicts a mortal wound' },
  mortal_wounds: { kind: 'instant', description: 'Inflict mortal wounds' },
  gain_cp: { kind: 'instant', description: 'Gain command points' }
};

export function isPersistent(entry: EffectEntry): boolean {
  return EFFECT_PRIMITIVES[entry.type].kind === 'persistent';
}

export const EFFECT_FLAG_PREFIX = 'effect_';

/**
 * Flag written by a persistent entry, e.g. `effect_hit_modifier_incoming_ranged`
 */
export function flagKeyFor(entry: EffectEntry): string {
  const base = entry.type === 'eligibility'
    ? `${EFFECT_FLAG_PREFIX}${entry.permission}`
    : `${EFFECT_FLAG_PREFIX}${entry.type}`;
  if (entry.type === 'grant_weapon_keyword') return base;
  return entry.attack ? `${base}_${entry.attack}` : base;
}

function flagValueFor(entry: EffectEntry): FlagValue {
  switch (entry.type) {
    case 'invulnerable_save':
    case 'hit_modifier_incoming':
    case 'hit_modifier_outgoing':
    case 'wound_modifier_incoming':
    case 'wound_modifier_outgoing':
    case 'save_modifier':
    case 'ap_reduction':
    case 'damage_reduction':
    case 'feel_no_pain':
    case 'critical_hit_threshold':
    case 'critical_wound_threshold':
      return entry.value;
    case 'grant_weapon_keyword':
      return entry.attack ? `${entry.attack}:${entry.keyword}` : entry.keyword;
    case 'reroll_hits':
    case 'reroll_wounds':
      return entry.reroll;
    case 'cover':
    case 'eligibility':
    case 'fights_first':
    case 'fights_next':
    case 'battle_shock_immune':
      return true;
    case 'direct_damage':
    case 'mortal_wounds':
    case 'gain_cp':
      return false;
  }
}

const LIST_SEPARATOR = ';';

function isRerollType(value: FlagValue): value is RerollType {
  return value === RerollType.NONE || value === RerollType.ONES
    || value === RerollType.FAILED || value === RerollType.ALL;
}

function combineValues(combine: Combine, values: readonly FlagValue[]): FlagValue {
  switch (combine) {
    case 'sum':
      return values.reduce<number>((sum, v) => sum + (typeof v === 'number' ? v : 0), 0);
    case 'min':
      return Math.min(...values.filter((v): v is number => typeof v === 'number'));
    case 'any':
      return values.some(v => v === true);
    case 'reroll':
      return getBestReroll(...values.filter(isRerollType));
    case 'list': {
      const items = new Set<string>();
      for (const v of values) {
        if (typeof v !== 'string') continue;
        v.split(LIST_SEPARATOR).filter(Boolean).forEach(item => items.add(item));
      }
      return [...items].sort().join(LIST_SEPARATOR);
    }
  }
}

function combineFor(entry: EffectEntry): Combine {
  return EFFECT_PRIMITIVES[entry.type].combine ?? 'any';
}

// ============================================================================
// ACTIVE EFFECT BOOKKEEPING
// ============================================================================

export function effectsOnUnit(state: GameState, unitId: string, exclude: ReadonlySet<string> = new Set()): ActiveEffect[] {
  return Object.values(state.active_effects).filter(e => e.target_unit_id === unitId && !exclude.has(e.id));
}

/**
 * Flag values a set of entries produces once combined per flag key
 */
export function combineEntries(entries: readonly EffectEntry[]): Map<string, FlagValue> {
  const grouped = new Map<string, { combine: Combine; values: FlagValue[] }>();
  for (const entry of entries) {
    if (!isPersistent(entry)) continue;
    const key = flagKeyFor(entry);
    const group = grouped.get(key) ?? { combine: combineFor(entry), values: [] };
    group.values.push(flagValueFor(entry));
    grouped.set(key, group);
  }

  const combined = new Map<string, FlagValue>();
  for (const [key, group] of grouped) {
    combined.set(key, combineValues(group.combine, group.values));
  }
  return combined;
}

/**
 * Flag writes for adding entries to a unit, combined with the effects it
 * already carries
 */
export function effectFlagChanges(state: GameState, unitId: string, added: readonly EffectEntry[]): StateChange[] {
  const existing = effectsOnUnit(state, unitId).flatMap(e => e.entries);
  const combined = combineEntries([...existing, ...added]);
  const touched = new Set(added.filter(isPersistent).map(flagKeyFor));

  return [...touched].map(key => setChange(`units.${unitId}.flags.${key}`, combined.get(key)));
}

/**
 * Remove effects and rewrite exactly the flags their entries own. A flag that
 * another surviving effect also sets is recomputed from the survivors.
 */
export function clearEffectChanges(state: GameState, effectIds: readonly string[]): StateChange[] {
  const clearing = new Set(effectIds);
  const changes: StateChange[] = [];
  const unitsTouched = new Map<string, Set<string>>();

  for (const id of effectIds) {
    const effect = state.active_effects[id];
    if (!effect) continue;
    const keys = unitsTouched.get(effect.target_unit_id) ?? new Set<string>();
    effect.entries.filter(isPersistent).forEach(entry => keys.add(flagKeyFor(entry)));
    unitsTouched.set(effect.target_unit_id, keys);
    changes.push(removeChange(`active_effects.${id}`));
  }

  for (const [unitId, keys] of unitsTouched) {
    if (!state.units[unitId]) continue;
    const survivors = combineEntries(effectsOnUnit(state, unitId, clearing).flatMap(e => e.entries));
    for (const key of keys) {
      const value = survivors.get(key);
      changes.push(value === undefined
        ? removeChange(`units.${unitId}.flags.${key}`)
        : setChange(`units.${unitId}.flags.${key}`, value));
    }
  }

  return changes;
}

/**
 * Effects that end when the given boundary is crossed. The end of a turn also
 * ends its last phase; the end of the battle ends everything.
 */
export function effectsExpiringAt(state: GameState, boundary: EffectExpiry): string[] {
  return Object.values(state.active_effects)
    .filter(e => {
      if (boundary === 'end_of_battle') return true;
      if (boundary === 'end_of_turn') return e.expiry !== 'end_of_battle';
      return e.expiry === 'end_of_phase';
    })
    .map(e => e.id);
}

// ============================================================================
// READING EFFECTS DURING RESOLUTION
// ============================================================================

export interface UnitEffectProfile {
  invulnerableSave?: number;
  cover: boolean;
  hitModifierIncoming: number;
  hitModifierOutgoing: number;
  woundModifierIncoming: number;
  woundModifierOutgoing: number;
  saveModifier: number;
  apReduction: number;
  damageReduction: number;
  feelNoPain?: number;
  criticalHit: number;
  criticalWound: number;
  weaponKeywords: string[];
  rerollHits: RerollType;
  rerollWounds: RerollType;
  fightsFirst: boolean;
  fightsNext: boolean;
  battleShockImmune: boolean;
  permissions: Set<string>;
}

/**
 * Everything that modifies how a unit attacks or is attacked with the given
 * kind of attack: effect flags, passive abilities (including auras) and the
 * unit's own characteristics.
 */
export function getUnitEffectProfile(state: GameState, unit: Unit, attack?: AttackKind): UnitEffectProfile {
  const values = new Map<string, FlagValue[]>();
  const push = (key: string, value: FlagValue): void => {
    const list = values.get(key) ?? [];
    list.push(value);
    values.set(key, list);
  };

  for (const [key, value] of Object.entries(unit.flags)) {
    if (key.startsWith(EFFECT_FLAG_PREFIX)) push(key, value);
  }
  for (const [key, value] of combineEntries(getPassiveEntries(state, unit))) {
    push(key, value);
  }

  const read = (type: EffectType, combine: Combine): FlagValue[] => {
    const base = `${EFFECT_FLAG_PREFIX}${type}`;
    const found = [...(values.get(base) ?? [])];
    if (attack) found.push(...(values.get(`${base}_${attack}`) ?? []));
    return found.length > 0 ? [combineValues(combine, found)] : [];
  };
  const sum = (type: EffectType): number => {
    const [v] = read(type, 'sum');
    return typeof v === 'number' ? v : 0;
  };
  const min = (type: EffectType, fallback?: number): number | undefined => {
    const candidates = read(type, 'min').filter((v): v is number => typeof v === 'number');
    if (fallback !== undefined) candidates.push(fallback);
    return candidates.length > 0 ? Math.min(...candidates) : undefined;
  };
  const granted = (type: EffectType): boolean => read(type, 'any').some(v => v === true);
  const reroll = (type: EffectType): RerollType => {
    const [v] = read(type, 'reroll');
    return v !== undefined && isRerollType(v) ? v : RerollType.NONE;
  };

  const keywordList = values.get(`${EFFECT_FLAG_PREFIX}grant_weapon_keyword`) ?? [];
  const permissions = new Set<string>();
  for (const [key, list] of values) {
    if (list.some(v => v === true)) permissions.add(key.slice(EFFECT_FLAG_PREFIX.length));
  }

  return {
    invulnerableSave: min('invulnerable_save', unit.meta.stats.invulnerable_save),
    cover: granted('cover'),
    hitModifierIncoming: sum('hit_modifier_incoming'),
    hitModifierOutgoing: sum('hit_modifier_outgoing'),
    woundModifierIncoming: sum('wound_modifier_incoming'),
    woundModifierOutgoing: sum('wound_modifier_outgoing'),
    saveModifier: sum('save_modifier'),
    apReduction: sum('ap_reduction'),
    damageReduction: sum('damage_reduction'),
    feelNoPain: min('feel_no_pain', unit.meta.stats.feel_no_pain),
    criticalHit: min('critical_hit_threshold', 6) ?? 6,
    criticalWound: min('critical_wound_threshold', 6) ?? 6,
    weaponKeywords: String(combineValues('list', keywordList)).split(LIST_SEPARATOR).filter(Boolean),
    rerollHits: reroll('reroll_hits'),
    rerollWounds: reroll('reroll_wounds'),
    fightsFirst: granted('fights_first'),
    fightsNext: granted('fights_next'),
    battleShockImmune: granted('battle_shock_immune'),
    permissions
  };
}

export function hasPermission(state: GameState, unit: Unit, permission: string): boolean {
  return getUnitEffectProfile(state, unit).permissions.has(permission);
}
