/**
 * Stratagem Registry - core stratagems and the command point manager
 *
 * Stratagems are data: a cost, a timing window, a target filter, a
 * once-per-scope restriction and a list of effect primitives. Spending CP
 * happens only after every restriction has been checked.
 */

import type {
  ActiveEffect,
  EffectEntry,
  EffectExpiry,
  GameState,
  PhaseName,
  PlayerId,
  PlayerKey,
  StratagemUsage,
  Unit
} from '../types';
import type { EngineConfig } from './config';
import type { Dice } from './dice';
import { applyDirectDamage } from './damage-allocation';
import { engagedEnemies, isOnTable, placedModels } from './distance';
import { effectFlagChanges, isPersistent } from './effects';
import { IntegrityError, ProcessingError } from './errors';
import type { StateDraft } from './state-changes';
import { inRange, isVisible } from './targeting';
import { unitHasKeyword } from '../utils/weapon';

// ============================================================================
// TYPES
// ============================================================================

export type StratagemTurn = 'own' | 'opponent' | 'either';

/**
 * Point in the sequence where a stratagem may be used. `phase` is an ordinary
 * USE_STRATAGEM action; the others are offered through a pending decision.
 */
export type StratagemTrigger =
    | 'phase'
    | 'after_targets_selected'
    | 'after_charge_declared'
    | 'reroll'
    | 'after_fight';

export type OncePer = 'phase' | 'turn' | 'battle' | 'none';

/**
 * Unit requirements, relative to the player using the stratagem
 */
export interface UnitFilter {
    side: 'friendly' | 'enemy';
    /** Unit must have at least one of these keywords */
    anyKeywords?: string[];
    requiredFlags?: string[];
    forbiddenFlags?: string[];
    /** true: must be within engagement range of an enemy; false: must not be */
    engaged?: boolean;
}

export interface SourceFilter extends UnitFilter {
    /** Target must be within this distance of the source unit; 'engagement' reads the configured Engagement Range */
    maxRange?: number | 'engagement';
    /** Target must be visible to the source unit */
    visible?: boolean;
    /** Flags set on the source unit when the stratagem resolves */
    setsFlags?: string[];
}

export interface StratagemDefinition {
    id: string;
    name: string;
    cpCost: number;
    description: string;
    timing: {
        turn: StratagemTurn;
        phases: PhaseName[];
        trigger: StratagemTrigger;
    };
    target: UnitFilter;
    source?: SourceFilter;
    oncePer: OncePer;
    effects: EffectEntry[];
    expiry: EffectExpiry;
    /** Resolution the owning phase performs besides the effects (re-roll, overwatch shot) */
    resolution?: 'reroll' | 'overwatch';
}

export interface StratagemRequest {
    player: PlayerId;
    stratagemId: string;
    trigger: StratagemTrigger;
    targetUnitId?: string;
    sourceUnitId?: string;
}

// ============================================================================
// CORE STRATAGEMS
// ============================================================================

export const CORE_STRATAGEMS: StratagemDefinition[] = [
    {
        id: 'command-reroll',
        name: 'Command Re-roll',
        cpCost: 1,
        description: 'Re-roll a Charge roll or Battle-shock test made for a unit from your army.',
        timing: { turn: 'either', phases: ['charge', 'morale'], trigger: 'reroll' },
        target: { side: 'friendly' },
        oncePer: 'phase',
        effects: [],
        expiry: 'end_of_phase',
        resolution: 'reroll'
    },
    {
        id: 'counter-offensive',
        name: 'Counter-offensive',
        cpCost: 2,
        description: 'After an enemy unit has fought, select one unit from your army that is within Engagement Range and has not fought this phase. That unit fights next.',
        timing: { turn: 'either', phases: ['fight'], trigger: 'after_fight' },
        target: { side: 'friendly', engaged: true, forbiddenFlags: ['has_fought'] },
        oncePer: 'phase',
        effects: [{ type: 'fights_next' }],
        expiry: 'end_of_phase'
    },
    {
        id: 'epic-challenge',
        name: 'Epic Challenge',
        cpCost: 1,
        description: 'Select one CHARACTER unit from your army that is within Engagement Range. Until the end of the phase, add 1 to the Wound roll of its melee attacks.',
        timing: { turn: 'either', phases: ['fight'], trigger: 'phase' },
        target: { side: 'friendly', anyKeywords: ['CHARACTER'], engaged: true, forbiddenFlags: ['has_fought'] },
        oncePer: 'phase',
        effects: [{ type: 'wound_modifier_outgoing', value: 1, attack: 'melee' }],
        expiry: 'end_of_phase'
    },
    {
        id: 'insane-bravery',
        name: 'Insane Bravery',
        cpCost: 1,
        description: 'Select one unit from your army that is about to take a Battle-shock test. That test is automatically passed.',
        timing: { turn: 'own', phases: ['morale'], trigger: 'phase' },
        target: { side: 'friendly', forbiddenFlags: ['battle_shock_tested'] },
        oncePer: 'battle',
        effects: [{ type: 'battle_shock_immune' }],
        expiry: 'end_of_phase'
    },
    {
        id: 'fire-overwatch',
        name: 'Fire Overwatch',
        cpCost: 1,
        description: 'When an enemy unit declares a charge, one of your units can shoot at it. Those attacks only hit on an unmodified 6.',
        timing: { turn: 'opponent', phases: ['charge'], trigger: 'after_charge_declared' },
        target: { side: 'friendly', engaged: false },
        oncePer: 'turn',
        effects: [],
        expiry: 'end_of_phase',
        resolution: 'overwatch'
    },
    {
        id: 'go-to-ground',
        name: 'Go to Ground',
        cpCost: 1,
        description: 'When an INFANTRY unit from your army is selected as the target of a ranged attack, it gains a 6+ invulnerable save and the benefit of cover.',
        timing: { turn: 'opponent', phases: ['shooting'], trigger: 'after_targets_selected' },
        target: { side: 'friendly', anyKeywords: ['INFANTRY'] },
        oncePer: 'phase',
        effects: [{ type: 'invulnerable_save', value: 6 }, { type: 'cover', attack: 'ranged' }],
        expiry: 'end_of_phase'
    },
    {
        id: 'smokescreen',
        name: 'Smokescreen',
        cpCost: 1,
        description: 'When a SMOKE unit from your army is selected as the target of a ranged attack, it gains the benefit of cover and Stealth.',
        timing: { turn: 'opponent', phases: ['shooting'], trigger: 'after_targets_selected' },
        target: { side: 'friendly', anyKeywords: ['SMOKE'] },
        oncePer: 'phase',
        effects: [{ type: 'cover', attack: 'ranged' }, { type: 'hit_modifier_incoming', value: -1, attack: 'ranged' }],
        expiry: 'end_of_phase'
    },
    {
        id: 'armour-of-contempt',
        name: 'Armour of Contempt',
        cpCost: 1,
        description: 'When a VEHICLE or INFANTRY unit from your army is selected as the target of a ranged attack, worsen the AP of incoming attacks by 1.',
        timing: { turn: 'opponent', phases: ['shooting'], trigger: 'after_targets_selected' },
        target: { side: 'friendly', anyKeywords: ['VEHICLE', 'INFANTRY'] },
        oncePer: 'phase',
        effects: [{ type: 'ap_reduction', value: 1 }],
        expiry: 'end_of_phase'
    },
    {
        id: 'grenade',
        name: 'Grenade',
        cpCost: 1,
        description: 'One GRENADES unit from your army that has not shot selects a visible enemy unit within 8". Roll six D6: each 4+ inflicts a mortal wound.',
        timing: { turn: 'own', phases: ['shooting'], trigger: 'phase' },
        target: { side: 'enemy', engaged: false },
        source: {
            side: 'friendly',
            anyKeywords: ['GRENADES'],
            forbiddenFlags: ['has_shot', 'advanced', 'fell_back'],
            engaged: false,
            maxRange: 8,
            visible: true,
            setsFlags: ['has_shot']
        },
        oncePer: 'phase',
        effects: [{ type: 'direct_damage', dice: 6, success_on: 4 }],
        expiry: 'end_of_phase'
    },
    {
        id: 'tank-shock',
        name: 'Tank Shock',
        cpCost: 1,
        description: 'After a VEHICLE unit from your army ends a charge move, select an enemy unit within Engagement Range and roll D6 equal to the VEHICLE\'s Toughness: each 5+ inflicts a mortal wound (max 6).',
        timing: { turn: 'own', phases: ['charge'], trigger: 'phase' },
        target: { side: 'enemy' },
        source: {
            side: 'friendly',
            anyKeywords: ['VEHICLE'],
            requiredFlags: ['charged'],
            forbiddenFlags: ['tank_shocked'],
            maxRange: 'engagement',
            setsFlags: ['tank_shocked']
        },
        oncePer: 'phase',
        effects: [{ type: 'direct_damage', dice: 'source_toughness', success_on: 5, max_wounds: 6 }],
        expiry: 'end_of_phase'
    }
];

// ============================================================================
// STRATAGEM REGISTRY
// ============================================================================

const stratagemMap = new Map<string, StratagemDefinition>();

CORE_STRATAGEMS.forEach(s => stratagemMap.set(s.id, s));

/**
 * Get a stratagem by its ID
 */
export function getStratagem(id: string): StratagemDefinition | undefined {
    return stratagemMap.get(id);
}

export function registerStratagem(definition: StratagemDefinition): void {
    stratagemMap.set(definition.id, definition);
}

/**
 * Get stratagems usable in a phase at a trigger point
 */
export function getStratagemsFor(phase: PhaseName, trigger: StratagemTrigger): StratagemDefinition[] {
    return [...stratagemMap.values()].filter(s =>
        s.timing.phases.includes(phase) && s.timing.trigger === trigger
    );
}

// ============================================================================
// CP MANAGEMENT
// ============================================================================

export function playerKey(player: PlayerId): PlayerKey {
    return player === 1 ? '1' : '2';
}

export function opponentOf(player: PlayerId): PlayerId {
    return player === 1 ? 2 : 1;
}

function unitFilterErrors(
    state: GameState,
    unit: Unit,
    filter: UnitFilter,
    player: PlayerId,
    role: string,
    config: EngineConfig
): string[] {
    const errors: string[] = [];
    const friendly = unit.owner === player;

    if (!isOnTable(unit)) {
        errors.push(`${role} ${unit.meta.name} is not on the battlefield`);
        return errors;
    }
    if (filter.side === 'friendly' && !friendly) {
        errors.push(`${role} ${unit.meta.name} must be a unit from your army`);
    }
    if (filter.side === 'enemy' && friendly) {
        errors.push(`${role} ${unit.meta.name} must be an enemy unit`);
    }
    if (filter.anyKeywords && !filter.anyKeywords.some(k => unitHasKeyword(unit, k))) {
        errors.push(`${role} ${unit.meta.name} must have one of: ${filter.anyKeywords.join(', ')}`);
    }
    for (const flag of filter.requiredFlags ?? []) {
        if (unit.flags[flag] !== true) {
            errors.push(`${role} ${unit.meta.name} requires ${flag}`);
        }
    }
    for (const flag of filter.forbiddenFlags ?? []) {
        if (unit.flags[flag] === true) {
            errors.push(`${role} ${unit.meta.name} cannot be selected after ${flag}`);
        }
    }
    if (filter.engaged !== undefined) {
        const engaged = engagedEnemies(state, unit, config.engagementRange).length > 0;
        if (filter.engaged && !engaged) {
            errors.push(`${role} ${unit.meta.name} must be within Engagement Range of an enemy unit`);
        }
        if (!filter.engaged && engaged) {
            errors.push(`${role} ${unit.meta.name} cannot be within Engagement Range of an enemy unit`);
        }
    }
    return errors;
}

function usedInScope(state: GameState, player: PlayerId, definition: StratagemDefinition): boolean {
    const usage = state.players[playerKey(player)].stratagem_usage.filter(u => u.stratagem_id === definition.id);
    switch (definition.oncePer) {
        case 'none':
            return false;
        case 'battle':
            return usage.length > 0;
        case 'turn':
            return usage.some(u => u.turn_number === state.meta.turn_number);
        case 'phase':
            return usage.some(u => u.turn_number === state.meta.turn_number && u.phase === state.meta.phase);
    }
}

/**
 * Check if a stratagem can be used, collecting every violated restriction
 */
export function canUseStratagem(
    state: GameState,
    request: StratagemRequest,
    config: EngineConfig
): { canUse: boolean; reasons: string[] } {
    const definition = getStratagem(request.stratagemId);
    if (!definition) {
        return { canUse: false, reasons: [`Unknown stratagem ${request.stratagemId}`] };
    }

    const reasons: string[] = [];
    const player = state.players[playerKey(request.player)];
    const ownTurn = state.meta.active_player === request.player;

    if (state.meta.game_over) {
        reasons.push('The battle is over');
    }
    if (player.cp < definition.cpCost) {
        reasons.push(`Not enough CP (need ${definition.cpCost}, have ${player.cp})`);
    }
    if (!definition.timing.phases.includes(state.meta.phase)) {
        reasons.push(`${definition.name} cannot be used in the ${state.meta.phase} phase`);
    }
    if (definition.timing.turn === 'own' && !ownTurn) {
        reasons.push(`${definition.name} can only be used in your own turn`);
    }
    if (definition.timing.turn === 'opponent' && ownTurn) {
        reasons.push(`${definition.name} can only be used in your opponent's turn`);
    }
    if (definition.timing.trigger !== request.trigger) {
        reasons.push(`${definition.name} cannot be used at this point (${definition.timing.trigger.replace(/_/g, ' ')})`);
    }
    if (usedInScope(state, request.player, definition)) {
        reasons.push(`${definition.name} already used this ${definition.oncePer}`);
    }

    const target = request.targetUnitId ? state.units[request.targetUnitId] : undefined;
    if (!request.targetUnitId) {
        reasons.push('A target unit is required');
    } else if (!target) {
        reasons.push(`Unknown unit ${request.targetUnitId}`);
    } else {
        reasons.push(...unitFilterErrors(state, target, definition.target, request.player, 'Target', config));
    }

    if (definition.source) {
        const source = request.sourceUnitId ? state.units[request.sourceUnitId] : undefined;
        if (!source) {
            reasons.push(`${definition.name} needs a unit from your army to use it`);
        } else {
            reasons.push(...unitFilterErrors(state, source, definition.source, request.player, 'Source', config));
            if (target && isOnTable(source) && isOnTable(target)) {
                const models = placedModels(source);
                const reach = definition.source.maxRange === 'engagement'
                    ? config.engagementRange
                    : definition.source.maxRange;
                if (reach !== undefined && !inRange(models, target, reach)) {
                    reasons.push(`${target.meta.name} is not within ${reach}" of ${source.meta.name}`);
                }
                if (definition.source.visible && !isVisible(state, models, target)) {
                    reasons.push(`${target.meta.name} is not visible to ${source.meta.name}`);
                }
            }
        }
    }

    return { canUse: reasons.length === 0, reasons };
}

/**
 * Stratagem ids a player could use at a trigger point on one of the given units
 */
export function offerableStratagems(
    state: GameState,
    player: PlayerId,
    trigger: StratagemTrigger,
    targetUnitIds: readonly string[],
    config: EngineConfig
): string[] {
    return getStratagemsFor(state.meta.phase, trigger)
        .filter(s => targetUnitIds.some(targetUnitId =>
            canUseStratagem(state, { player, stratagemId: s.id, trigger, targetUnitId }, config).canUse))
        .map(s => s.id);
}

/**
 * Spend CP, record the usage and apply the stratagem's effects. Throws a
 * ProcessingError if any restriction fails; nothing is written in that case.
 */
export function useStratagem(
    draft: StateDraft,
    dice: Dice,
    request: StratagemRequest,
    config: EngineConfig
): string[] {
    const check = canUseStratagem(draft.state, request, config);
    if (!check.canUse) {
        throw new ProcessingError(check.reasons.join('; '));
    }
    const definition = getStratagem(request.stratagemId);
    const targetUnitId = request.targetUnitId;
    if (!definition || !targetUnitId) {
        throw new IntegrityError(`Stratagem ${request.stratagemId} passed validation without a definition or target`);
    }

    const key = playerKey(request.player);
    const player = draft.state.players[key];
    const usage: StratagemUsage = {
        stratagem_id: definition.id,
        turn_number: draft.state.meta.turn_number,
        battle_round: draft.state.meta.battle_round,
        phase: draft.state.meta.phase,
        target_unit_id: targetUnitId
    };

    draft.set(`players.${key}.cp`, player.cp - definition.cpCost);
    draft.set(`players.${key}.stratagem_usage.${player.stratagem_usage.length}`, usage);

    const target = draft.state.units[targetUnitId];
    const log = [`Player ${request.player} uses ${definition.name} (${definition.cpCost} CP) on ${target.meta.name}`];

    const source = request.sourceUnitId ? draft.state.units[request.sourceUnitId] : undefined;
    for (const flag of definition.source?.setsFlags ?? []) {
        if (source) draft.setFlag(source.id, flag, true);
    }

    log.push(...applyEffectEntries(draft, dice, {
        sourceId: definition.id,
        owner: request.player,
        targetUnitId,
        sourceUnit: source,
        entries: definition.effects,
        expiry: definition.expiry
    }));

    return log;
}

// ============================================================================
// EFFECT APPLICATION
// ============================================================================

export interface EffectApplication {
    sourceId: string;
    owner: PlayerId;
    targetUnitId: string;
    sourceUnit?: Unit;
    entries: EffectEntry[];
    expiry: EffectExpiry;
}

/**
 * Persistent entries become one ActiveEffect plus its flags on the target;
 * instant entries change state right away
 */
export function applyEffectEntries(draft: StateDraft, dice: Dice, application: EffectApplication): string[] {
    const log: string[] = [];
    const persistent = application.entries.filter(isPersistent);

    if (persistent.length > 0) {
        const { turn_number, phase } = draft.state.meta;
        const prefix = `${application.sourceId}:${application.targetUnitId}:${turn_number}:${phase}`;
        const taken = Object.keys(draft.state.active_effects).filter(id => id.startsWith(prefix)).length;
        const effect: ActiveEffect = {
            id: `${prefix}:${taken}`,
            source_id: application.sourceId,
            owner: application.owner,
            target_unit_id: application.targetUnitId,
            entries: persistent,
            expiry: application.expiry,
            created: { turn_number, phase }
        };
        draft.apply(effectFlagChanges(draft.state, application.targetUnitId, persistent));
        draft.set(`active_effects.${effect.id}`, effect);
    }

    for (const entry of application.entries) {
        switch (entry.type) {
            case 'direct_damage': {
                const count = entry.dice === 'source_toughness'
                    ? application.sourceUnit?.meta.stats.toughness ?? 0
                    : entry.dice;
                const rolls = dice.roll(`${application.sourceId}: direct damage ${entry.success_on}+`, count, {
                    target: entry.success_on
                });
                const successes = rolls.filter(r => r >= entry.success_on).length;
                const wounds = entry.max_wounds !== undefined ? Math.min(entry.max_wounds, successes) : successes;
                log.push(...applyDirectDamage(draft, dice, application.targetUnitId, wounds, application.sourceId).log);
                break;
            }
            case 'mortal_wounds': {
                const amount = dice.rollExpression(entry.amount, `${application.sourceId}: mortal wounds`);
                log.push(...applyDirectDamage(draft, dice, application.targetUnitId, amount, application.sourceId).log);
                break;
            }
            case 'gain_cp': {
                const key = playerKey(application.owner);
                draft.set(`players.${key}.cp`, draft.state.players[key].cp + entry.value);
                log.push(`Player ${application.owner} gains ${entry.value} CP`);
                break;
            }
            default:
                break;
        }
    }

    return log;
}
