/**
 * Fight phase: Fights First combats, then the remaining combats, with players
 * alternating selections starting with the player whose turn it is not
 */

import type {
  Action,
  ActionDescriptor,
  ActionType,
  GameState,
  PlayerId,
  Point,
  StateChange,
  Unit,
  WeaponAssignment
} from '../types';
import { resolveAttack } from '../simulation/attack-resolution';
import type { Dice } from '../simulation/dice';
import { CONTACT_EPSILON, edgeDistance, engagedEnemies, isEngaged, isOnTable, placedModels } from '../simulation/distance';
import { getUnitEffectProfile } from '../simulation/effects';
import { moveErrors, placeUnit, type MoveRules } from '../simulation/movement';
import { removeChange, StateDraft } from '../simulation/state-changes';
import { opponentOf, type StratagemTrigger } from '../simulation/stratagem-registry';
import { findWeapon, modelsWithWeapon } from '../utils/weapon';
import { BasePhase, doneUnits, markDone, type PhaseOutcome } from './base-phase';

function readPlayer(value: unknown): PlayerId | undefined {
  return value === 1 || value === 2 ? value : undefined;
}

export class FightPhase extends BasePhase {
  readonly name = 'fight' as const;
  protected readonly actionTypes: readonly ActionType[] = ['FIGHT'];

  private get closeIn(): MoveRules {
    return { maxDistance: this.ctx.config.pileInDistance, mayEndEngaged: true, mustCloseIn: true };
  }

  /**
   * Units that may still fight: engaged and not yet fought or skipped
   */
  private eligibleUnits(state: GameState): Unit[] {
    const done = doneUnits(state);
    return Object.values(state.units).filter(u =>
      isOnTable(u)
      && u.flags.has_fought !== true
      && !done.includes(u.id)
      && isEngaged(state, u, this.ctx.config.engagementRange));
  }

  /**
   * Both players fight every turn, so has_fought is cleared per phase rather
   * than with the owner's turn flags
   */
  enter(state: GameState): StateChange[] {
    const changes = super.enter(state);
    for (const unit of Object.values(state.units)) {
      if (unit.flags.has_fought !== undefined) {
        changes.push(removeChange(`units.${unit.id}.flags.has_fought`));
      }
    }
    return changes;
  }

  private fightsFirst(state: GameState, unit: Unit): boolean {
    const charged = unit.owner === state.meta.active_player && unit.flags.charged === true;
    return charged || getUnitEffectProfile(state, unit).fightsFirst;
  }

  /**
   * Player choosing the next unit to fight
   */
  picker(state: GameState): PlayerId {
    return readPlayer(state.phase_data.next_picker) ?? opponentOf(state.meta.active_player);
  }

  /**
   * Units that may be selected to fight next
   */
  selectableUnits(state: GameState): Unit[] {
    const eligible = this.eligibleUnits(state);
    const next = eligible.filter(u => getUnitEffectProfile(state, u).fightsNext);
    if (next.length > 0) return next;

    const first = eligible.filter(u => this.fightsFirst(state, u));
    const pool = first.length > 0 ? first : eligible;
    const picker = this.picker(state);
    const own = pool.filter(u => u.owner === picker);
    return own.length > 0 ? own : pool;
  }

  protected pendingUnits(state: GameState): Unit[] {
    return this.eligibleUnits(state);
  }

  protected openTriggers(state: GameState): StratagemTrigger[] {
    return readPlayer(state.phase_data.last_fought_owner) === undefined ? ['phase'] : ['phase', 'after_fight'];
  }

  /**
   * Counter-offensive answers an enemy unit fighting
   */
  protected stratagemRestrictions(state: GameState, player: PlayerId, trigger: StratagemTrigger): string[] {
    if (trigger === 'after_fight' && readPlayer(state.phase_data.last_fought_owner) === player) {
      return ['Only the opponent of the player whose unit just fought can react to it'];
    }
    return [];
  }

  protected unitActions(state: GameState): ActionDescriptor[] {
    return this.selectableUnits(state).map(unit => ({
      type: 'FIGHT',
      actor_unit_id: unit.id,
      player: unit.owner,
      description: `Fight with ${unit.meta.name}`
    }));
  }

  // ==========================================================================
  // VALIDATION
  // ==========================================================================

  protected validatePhaseAction(state: GameState, action: Action): string[] {
    if (action.type !== 'FIGHT') {
      return super.validatePhaseAction(state, action);
    }
    const unit = state.units[action.actor_unit_id];
    if (!unit) return [`Unknown unit ${action.actor_unit_id}`];

    if (!this.eligibleUnits(state).some(u => u.id === unit.id)) {
      return [`${unit.meta.name} is not eligible to fight`];
    }
    const selectionError = this.selectionError(state, unit);
    if (selectionError) return [selectionError];

    const errors: string[] = [];
    let afterPileIn = state;
    const alive = unit.models.filter(m => m.alive).length;
    if (action.payload.pile_in) {
      errors.push(...moveErrors(state, unit, action.payload.pile_in, this.closeIn, this.ctx.config));
      if (action.payload.pile_in.length === alive) {
        afterPileIn = this.movedState(state, unit, action.payload.pile_in);
      }
    }
    errors.push(...this.assignmentErrors(afterPileIn, afterPileIn.units[unit.id], action.payload.assignments));

    if (action.payload.consolidate && action.payload.consolidate.length !== alive) {
      errors.push(`Expected ${alive} consolidation positions, got ${action.payload.consolidate.length}`);
    }
    return errors;
  }

  private selectionError(state: GameState, unit: Unit): string | null {
    if (this.selectableUnits(state).some(u => u.id === unit.id)) return null;

    const eligible = this.eligibleUnits(state);
    const next = eligible.filter(u => getUnitEffectProfile(state, u).fightsNext);
    if (next.length > 0) {
      return `${next.map(u => u.meta.name).join(', ')} must fight next`;
    }
    if (!this.fightsFirst(state, unit) && eligible.some(u => this.fightsFirst(state, u))) {
      return 'Units that charged or have Fights First must fight first';
    }
    return `Player ${this.picker(state)} selects the next unit to fight`;
  }

  private movedState(state: GameState, unit: Unit, positions: readonly Point[]): GameState {
    const draft = new StateDraft(state);
    placeUnit(draft, unit, positions);
    return draft.state;
  }

  private assignmentErrors(state: GameState, unit: Unit, assignments: readonly WeaponAssignment[]): string[] {
    if (assignments.length === 0) {
      return ['Assign at least one melee weapon to a target'];
    }
    const errors: string[] = [];
    const engaged = engagedEnemies(state, unit, this.ctx.config.engagementRange).map(e => e.id);
    const seen = new Set<string>();

    for (const assignment of assignments) {
      if (seen.has(assignment.weapon_id)) {
        errors.push(`${assignment.weapon_id} is assigned more than once`);
        continue;
      }
      seen.add(assignment.weapon_id);

      const weapon = findWeapon(unit, assignment.weapon_id);
      if (!weapon) {
        errors.push(`${unit.meta.name} has no weapon ${assignment.weapon_id}`);
        continue;
      }
      if (weapon.type !== 'melee') {
        errors.push(`${weapon.name} is not a melee weapon`);
      }
      const target = state.units[assignment.target_unit_id];
      if (!target) {
        errors.push(`Unknown unit ${assignment.target_unit_id}`);
      } else if (!engaged.includes(target.id)) {
        errors.push(`${target.meta.name} is not within Engagement Range of ${unit.meta.name}`);
      }
    }
    return errors;
  }

  // ==========================================================================
  // RESOLUTION
  // ==========================================================================

  protected resolvePhaseAction(draft: StateDraft, dice: Dice, action: Action): PhaseOutcome {
    if (action.type !== 'FIGHT') {
      return super.resolvePhaseAction(draft, dice, action);
    }
    const unitId = action.actor_unit_id;
    const name = draft.state.units[unitId].meta.name;
    const log: string[] = [];

    if (action.payload.pile_in) {
      placeUnit(draft, draft.state.units[unitId], action.payload.pile_in);
      log.push(`${name} piles in`);
    }

    for (const assignment of action.payload.assignments) {
      const unit = draft.state.units[unitId];
      const target = draft.state.units[assignment.target_unit_id];
      if (!isOnTable(unit)) break;
      if (!isOnTable(target)) {
        log.push(`${target.meta.name} has already been destroyed`);
        continue;
      }
      const summary = resolveAttack(draft, dice, {
        attackerId: unitId,
        targetId: target.id,
        weaponId: assignment.weapon_id,
        modelIds: this.fightingModels(unit, assignment.weapon_id, target)
      });
      log.push(...summary.log);
    }

    draft.setFlag(unitId, 'has_fought', true);
    markDone(draft, unitId);
    const owner = draft.state.units[unitId].owner;
    draft.set('phase_data.last_fought_owner', owner);
    draft.set('phase_data.next_picker', opponentOf(owner));

    const consolidate = action.payload.consolidate;
    if (consolidate && isOnTable(draft.state.units[unitId])) {
      const unit = draft.state.units[unitId];
      const errors = moveErrors(draft.state, unit, consolidate, this.closeIn, this.ctx.config);
      if (errors.length > 0) {
        log.push(`${name} cannot consolidate: ${errors.join('; ')}`);
      } else {
        placeUnit(draft, unit, consolidate);
        log.push(`${name} consolidates`);
      }
    }
    return { log };
  }

  /**
   * Carriers of the weapon within Engagement Range of the target
   */
  private fightingModels(unit: Unit, weaponId: string, target: Unit): string[] {
    const weapon = findWeapon(unit, weaponId);
    if (!weapon) return [];
    const carriers = new Set(modelsWithWeapon(unit, weapon).map(m => m.id));
    const targets = placedModels(target);
    const range = this.ctx.config.engagementRange;
    return placedModels(unit)
      .filter(m => carriers.has(m.id) && targets.some(t => edgeDistance(m, t) <= range + CONTACT_EPSILON))
      .map(m => m.id);
  }
}
