/**
 * Ability Registry - passive unit abilities as data
 *
 * Abilities are built from the same effect primitives as stratagems, so the
 * resolution engine reads both through one profile. Auras apply to friendly
 * units within range of the bearer; on-destruction triggers (Deadly Demise)
 * fire from damage allocation.
 */

import type { EffectEntry, GameState, Unit } from '../types';
import { RerollType } from '../types';
import { isOnTable, unitDistance } from './distance';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Who an ability effect applies to
 */
export type EffectTarget =
    | 'self'           // Only the unit with the ability
    | 'friendly';      // Friendly units within range, the bearer included

export interface AbilityEffect {
    entry: EffectEntry;
    target: EffectTarget;
    range?: number;           // Aura range in inches
}

/**
 * Roll a D6 when the bearer is destroyed; on `rollOn`+ every unit within
 * `range` suffers `mortalWounds`
 */
export interface DestroyedTrigger {
    range: number;
    rollOn: number;
    mortalWounds: string;
}

export interface AbilityDefinition {
    id: string;
    name: string;
    description: string;
    effects: AbilityEffect[];
    onDestroyed?: DestroyedTrigger;
}

// ============================================================================
// ABILITY REGISTRY
// ============================================================================

export const ABILITY_REGISTRY: Map<string, AbilityDefinition> = new Map([
    ['stealth', {
        id: 'stealth',
        name: 'Stealth',
        description: 'Each time a ranged attack is made against this unit, subtract 1 from that attack\'s Hit roll.',
        effects: [{ entry: { type: 'hit_modifier_incoming', value: -1, attack: 'ranged' }, target: 'self' }]
    }],

    ['feel-no-pain-5', {
        id: 'feel-no-pain-5',
        name: 'Feel No Pain 5+',
        description: 'Each time this model would lose a wound, roll one D6: on a 5+, that wound is not lost.',
        effects: [{ entry: { type: 'feel_no_pain', value: 5 }, target: 'self' }]
    }],

    ['feel-no-pain-6', {
        id: 'feel-no-pain-6',
        name: 'Feel No Pain 6+',
        description: 'Each time this model would lose a wound, roll one D6: on a 6, that wound is not lost.',
        effects: [{ entry: { type: 'feel_no_pain', value: 6 }, target: 'self' }]
    }],

    ['fights-first', {
        id: 'fights-first',
        name: 'Fights First',
        description: 'This unit fights in the Fights First step of the Fight phase.',
        effects: [{ entry: { type: 'fights_first' }, target: 'self' }]
    }],

    ['damage-reduction-1', {
        id: 'damage-reduction-1',
        name: 'Damage Reduction',
        description: 'Each time an attack is allocated to this model, subtract 1 from the Damage characteristic of that attack.',
        effects: [{ entry: { type: 'damage_reduction', value: 1 }, target: 'self' }]
    }],

    ['deep-strike', {
        id: 'deep-strike',
        name: 'Deep Strike',
        description: 'This unit can be set up in Reserves and arrive more than 9" away from all enemy models.',
        effects: []
    }],

    // Captain-type auras
    ['rites-of-battle', {
        id: 'rites-of-battle',
        name: 'Rites of Battle',
        description: 'While a friendly unit is within 6" of this model, each time a model in that unit makes an attack, re-roll a hit roll of 1.',
        effects: [{ entry: { type: 'reroll_hits', reroll: RerollType.ONES }, target: 'friendly', range: 6 }]
    }],

    ['tactical-precision', {
        id: 'tactical-precision',
        name: 'Tactical Precision',
        description: 'While a friendly unit is within 6" of this model, each time a model in that unit makes an attack, re-roll a wound roll of 1.',
        effects: [{ entry: { type: 'reroll_wounds', reroll: RerollType.ONES }, target: 'friendly', range: 6 }]
    }],

    ['chapter-master', {
        id: 'chapter-master',
        name: 'Chapter Master',
        description: 'While a friendly unit is within 6" of this model, each time a model in that unit makes an attack, you can re-roll the hit roll.',
        effects: [{ entry: { type: 'reroll_hits', reroll: RerollType.FAILED }, target: 'friendly', range: 6 }]
    }],

    // Defensive auras
    ['shrouding', {
        id: 'shrouding',
        name: 'Shrouding',
        description: 'While a friendly unit is within 6" of this model, that unit has the benefit of cover.',
        effects: [{ entry: { type: 'cover', attack: 'ranged' }, target: 'friendly', range: 6 }]
    }],

    // Vehicle and monster explosions
    ['deadly-demise-d3', {
        id: 'deadly-demise-d3',
        name: 'Deadly Demise D3',
        description: 'When this model is destroyed, roll one D6. On a 6, each unit within 6" suffers D3 mortal wounds.',
        effects: [],
        onDestroyed: { range: 6, rollOn: 6, mortalWounds: 'D3' }
    }],

    ['deadly-demise-d6', {
        id: 'deadly-demise-d6',
        name: 'Deadly Demise D6',
        description: 'When this model is destroyed, roll one D6. On a 6, each unit within 6" suffers D6 mortal wounds.',
        effects: [],
        onDestroyed: { range: 6, rollOn: 6, mortalWounds: 'D6' }
    }]
]);

// ============================================================================
// LOOKUPS
// ============================================================================

/**
 * Get the ability definition from the registry by ID
 */
export function getAbilityDefinition(id: string): AbilityDefinition | undefined {
    return ABILITY_REGISTRY.get(id);
}

/**
 * Register a new ability definition
 */
export function registerAbility(ability: AbilityDefinition): void {
    ABILITY_REGISTRY.set(ability.id, ability);
}

export function unitAbilities(unit: Unit): AbilityDefinition[] {
    return unit.meta.abilities
        .map(id => ABILITY_REGISTRY.get(id))
        .filter((a): a is AbilityDefinition => a !== undefined);
}

export function hasAbility(unit: Unit, id: string): boolean {
    return unit.meta.abilities.includes(id);
}

/**
 * Passive effect entries acting on a unit: its own abilities plus auras from
 * friendly units on the table within range
 */
export function getPassiveEntries(state: GameState, unit: Unit): EffectEntry[] {
    const entries: EffectEntry[] = [];

    for (const ability of unitAbilities(unit)) {
        for (const effect of ability.effects) {
            entries.push(effect.entry);
        }
    }

    if (!isOnTable(unit)) return entries;

    for (const source of Object.values(state.units)) {
        if (source.id === unit.id || source.owner !== unit.owner || !isOnTable(source)) continue;
        for (const ability of unitAbilities(source)) {
            for (const effect of ability.effects) {
                if (effect.target !== 'friendly') continue;
                if (effect.range !== undefined && unitDistance(source, unit) > effect.range) continue;
                entries.push(effect.entry);
            }
        }
    }

    return entries;
}
