import type { ActionType, GameState, StateChange } from '../types';
import type { Dice } from '../simulation/dice';
import { clearEffectChanges, effectsExpiringAt } from '../simulation/effects';
import { scoreObjectives } from '../simulation/objective-scoring';
import { setChange, type StateDraft } from '../simulation/state-changes';
import { BasePhase } from './base-phase';

/**
 * End of turn: the active player scores the objectives it controls
 */
export class ScoringPhase extends BasePhase {
  readonly name = 'scoring' as const;
  protected readonly actionTypes: readonly ActionType[] = [];

  protected onEnd(draft: StateDraft, _dice: Dice): string[] {
    const player = draft.state.meta.active_player;
    const result = scoreObjectives(draft.state, player, this.ctx.config);
    draft.apply(result.changes);
    return [...result.log, `Player ${player} scores ${result.vp}VP`];
  }

  /**
   * Turn-long effects end here as well as phase-long ones
   */
  exit(state: GameState): StateChange[] {
    return [
      ...clearEffectChanges(state, effectsExpiringAt(state, 'end_of_turn')),
      setChange('phase_data', {})
    ];
  }
}
