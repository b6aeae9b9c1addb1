/**
 * Shooting phase. Targets are confirmed first; the defender may then react
 * before any dice are rolled.
 */

import { z } from 'zod';
import type {
  Action,
  ActionDescriptor,
  ActionType,
  GameState,
  PendingDecision,
  Unit,
  WeaponAssignment
} from '../types';
import { resolveAttack } from '../simulation/attack-resolution';
import type { Dice } from '../simulation/dice';
import { isOnTable } from '../simulation/distance';
import { IntegrityError } from '../simulation/errors';
import { assignmentErrors, canShoot, modelsInRange, shooterErrors } from '../simulation/shooting';
import type { StateDraft } from '../simulation/state-changes';
import { offerableStratagems, opponentOf } from '../simulation/stratagem-registry';
import { findWeapon } from '../utils/weapon';
import { BasePhase, doneUnits, markDone, unitsOf, type PhaseOutcome, type ReactionChoice } from './base-phase';

const ShootingContextSchema = z.object({
  unit_id: z.string(),
  assignments: z.array(z.object({ weapon_id: z.string(), target_unit_id: z.string() }))
});

export class ShootingPhase extends BasePhase {
  readonly name = 'shooting' as const;
  protected readonly actionTypes: readonly ActionType[] = ['SHOOT'];

  protected pendingUnits(state: GameState): Unit[] {
    const done = doneUnits(state);
    return unitsOf(state, state.meta.active_player)
      .filter(u => !done.includes(u.id) && canShoot(state, u, this.ctx.config));
  }

  protected unitActions(state: GameState): ActionDescriptor[] {
    return this.pendingUnits(state).map(unit => ({
      type: 'SHOOT',
      actor_unit_id: unit.id,
      player: unit.owner,
      description: `Shoot with ${unit.meta.name}`
    }));
  }

  protected validatePhaseAction(state: GameState, action: Action): string[] {
    if (action.type !== 'SHOOT') {
      return super.validatePhaseAction(state, action);
    }
    const unit = state.units[action.actor_unit_id];
    if (!unit) return [`Unknown unit ${action.actor_unit_id}`];

    const errors: string[] = [];
    if (unit.owner !== state.meta.active_player) {
      errors.push(`${unit.meta.name} belongs to player ${unit.owner}, not the active player`);
    }
    if (doneUnits(state).includes(unit.id)) {
      errors.push(`${unit.meta.name} has already been selected to shoot this phase`);
    }
    const eligibility = shooterErrors(state, unit);
    if (eligibility.length > 0) {
      return [...errors, ...eligibility];
    }
    return [...errors, ...assignmentErrors(state, unit, action.payload.assignments, this.ctx.config)];
  }

  protected resolvePhaseAction(draft: StateDraft, dice: Dice, action: Action): PhaseOutcome {
    if (action.type !== 'SHOOT') {
      return super.resolvePhaseAction(draft, dice, action);
    }
    const unit = draft.state.units[action.actor_unit_id];
    const { assignments } = action.payload;
    const targetIds = [...new Set(assignments.map(a => a.target_unit_id))];

    draft.setFlag(unit.id, 'has_shot', true);
    markDone(draft, unit.id);

    const targetNames = targetIds.map(id => draft.state.units[id].meta.name);
    const log = [`${unit.meta.name} targets ${targetNames.join(', ')}`];

    const defender = opponentOf(unit.owner);
    const options = offerableStratagems(draft.state, defender, 'after_targets_selected', targetIds, this.ctx.config);
    if (options.length > 0) {
      return this.suspend(draft, {
        decider: defender,
        kind: 'defensive_reaction',
        options,
        context: { unit_id: unit.id, assignments, allowed_targets: targetIds }
      }, log);
    }

    return { log: [...log, ...this.fire(draft, dice, unit.id, assignments)] };
  }

  protected resumeDecision(
    draft: StateDraft,
    dice: Dice,
    decision: PendingDecision,
    choice: ReactionChoice | null
  ): PhaseOutcome {
    if (decision.kind !== 'defensive_reaction') {
      return super.resumeDecision(draft, dice, decision, choice);
    }
    const parsed = ShootingContextSchema.safeParse(decision.context);
    if (!parsed.success) {
      throw new IntegrityError(`Malformed shooting decision: ${parsed.error.message}`);
    }
    return { log: this.fire(draft, dice, parsed.data.unit_id, parsed.data.assignments) };
  }

  /**
   * Resolve each weapon assignment in order with the models in range
   */
  private fire(draft: StateDraft, dice: Dice, unitId: string, assignments: readonly WeaponAssignment[]): string[] {
    const log: string[] = [];

    for (const assignment of assignments) {
      const unit = draft.state.units[unitId];
      const target = draft.state.units[assignment.target_unit_id];
      const weapon = findWeapon(unit, assignment.weapon_id);
      if (!weapon) {
        throw new IntegrityError(`${unit.meta.name} has no weapon ${assignment.weapon_id}`);
      }
      if (!isOnTable(unit)) {
        log.push(`${unit.meta.name} has been destroyed`);
        break;
      }
      if (!isOnTable(target)) {
        log.push(`${weapon.name}: ${target.meta.name} has already been destroyed`);
        continue;
      }

      const summary = resolveAttack(draft, dice, {
        attackerId: unit.id,
        targetId: target.id,
        weaponId: weapon.id,
        modelIds: modelsInRange(unit, weapon, target).map(m => m.id)
      });
      log.push(...summary.log);
    }
    return log;
  }
}
