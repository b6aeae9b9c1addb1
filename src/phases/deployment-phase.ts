/**
 * Deployment: players alternate setting up units in their zones, or placing
 * DEEP STRIKE units in reserves, until nothing is left to deploy
 */

import type { Action, ActionDescriptor, ActionType, GameState, PlayerId, Unit } from '../types';
import { hasAbility } from '../simulation/ability-registry';
import type { Dice } from '../simulation/dice';
import { deploymentErrors, placeUnit } from '../simulation/movement';
import type { StateDraft } from '../simulation/state-changes';
import { opponentOf } from '../simulation/stratagem-registry';
import { unitHasKeyword } from '../utils/weapon';
import { BasePhase, unitsOf, type PhaseOutcome } from './base-phase';

export function canDeepStrike(unit: Unit): boolean {
  return unitHasKeyword(unit, 'DEEP STRIKE') || hasAbility(unit, 'deep-strike');
}

/**
 * Player whose turn it is to set up a unit
 */
export function deployingPlayer(state: GameState): PlayerId {
  const raw = state.phase_data.deploying;
  return raw === 1 || raw === 2 ? raw : state.meta.first_player;
}

function undeployed(state: GameState, player: PlayerId): Unit[] {
  return unitsOf(state, player).filter(u => u.status === 'UNDEPLOYED');
}

export class DeploymentPhase extends BasePhase {
  readonly name = 'deployment' as const;
  protected readonly actionTypes: readonly ActionType[] = ['DEPLOY_UNIT', 'PLACE_IN_RESERVES'];
  protected readonly allowsSkip: boolean = false;

  protected pendingUnits(state: GameState): Unit[] {
    return Object.values(state.units).filter(u => u.status === 'UNDEPLOYED');
  }

  protected unitActions(state: GameState): ActionDescriptor[] {
    const player = deployingPlayer(state);
    return undeployed(state, player).flatMap(unit => {
      const actions: ActionDescriptor[] = [
        { type: 'DEPLOY_UNIT', actor_unit_id: unit.id, player, description: `Deploy ${unit.meta.name}` }
      ];
      if (canDeepStrike(unit)) {
        actions.push({
          type: 'PLACE_IN_RESERVES',
          actor_unit_id: unit.id,
          player,
          description: `Place ${unit.meta.name} in reserves`
        });
      }
      return actions;
    });
  }

  protected validatePhaseAction(state: GameState, action: Action): string[] {
    if (action.type !== 'DEPLOY_UNIT' && action.type !== 'PLACE_IN_RESERVES') {
      return super.validatePhaseAction(state, action);
    }

    const unit = state.units[action.actor_unit_id];
    if (!unit) return [`Unknown unit ${action.actor_unit_id}`];

    const errors: string[] = [];
    if (unit.status !== 'UNDEPLOYED') {
      errors.push(`${unit.meta.name} has already been set up`);
    }
    const player = deployingPlayer(state);
    if (unit.owner !== player) {
      errors.push(`Player ${player} is deploying`);
    }

    if (action.type === 'PLACE_IN_RESERVES') {
      if (!canDeepStrike(unit)) {
        errors.push(`${unit.meta.name} cannot be placed in reserves`);
      }
      return errors;
    }
    return [...errors, ...deploymentErrors(state, unit, action.payload.positions, this.ctx.config)];
  }

  protected resolvePhaseAction(draft: StateDraft, dice: Dice, action: Action): PhaseOutcome {
    if (action.type !== 'DEPLOY_UNIT' && action.type !== 'PLACE_IN_RESERVES') {
      return super.resolvePhaseAction(draft, dice, action);
    }

    const unit = draft.state.units[action.actor_unit_id];
    let line: string;
    if (action.type === 'DEPLOY_UNIT') {
      placeUnit(draft, unit, action.payload.positions);
      draft.set(`units.${unit.id}.status`, 'DEPLOYED');
      line = `${unit.meta.name} deployed`;
    } else {
      draft.set(`units.${unit.id}.status`, 'IN_RESERVES');
      line = `${unit.meta.name} placed in reserves`;
    }

    const opponent = opponentOf(unit.owner);
    const next = undeployed(draft.state, opponent).length > 0 ? opponent : unit.owner;
    draft.set('phase_data.deploying', next);
    return { log: [line] };
  }
}
