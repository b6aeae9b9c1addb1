import type { ActionType, GameState, StateChange } from '../types';
import { EFFECT_FLAG_PREFIX } from '../simulation/effects';
import { removeChange, setChange } from '../simulation/state-changes';
import { BasePhase, unitsOf } from './base-phase';

/**
 * Command phase: both players gain CP and the active player's units start
 * their turn with fresh flags
 */
export class CommandPhase extends BasePhase {
  readonly name = 'command' as const;
  protected readonly actionTypes: readonly ActionType[] = [];

  enter(state: GameState): StateChange[] {
    const changes = super.enter(state);
    const gain = this.ctx.config.cpPerCommandPhase;

    for (const key of ['1', '2'] as const) {
      changes.push(setChange(`players.${key}.cp`, state.players[key].cp + gain));
    }

    // Turn flags and battle-shock; effect flags belong to their effects
    for (const unit of unitsOf(state, state.meta.active_player)) {
      for (const flag of Object.keys(unit.flags)) {
        if (!flag.startsWith(EFFECT_FLAG_PREFIX)) {
          changes.push(removeChange(`units.${unit.id}.flags.${flag}`));
        }
      }
    }
    return changes;
  }
}
