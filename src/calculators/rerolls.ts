/**
 * Re-roll mechanics.
 *
 * "You can never re-roll a dice more than once, regardless of the source of
 * the re-roll", so only the best available re-roll is applied.
 */

import { RerollType } from '../types';

/**
 * Determine the best available re-roll from multiple sources
 * Priority: ALL > FAILED > ONES > NONE
 */
export function getBestReroll(...rerolls: (RerollType | undefined)[]): RerollType {
  const validRerolls = rerolls.filter((r): r is RerollType => r !== undefined);

  if (validRerolls.includes(RerollType.ALL)) return RerollType.ALL;
  if (validRerolls.includes(RerollType.FAILED)) return RerollType.FAILED;
  if (validRerolls.includes(RerollType.ONES)) return RerollType.ONES;
  return RerollType.NONE;
}

/**
 * Whether a die showing `roll` should be re-rolled. Re-rolling always happens
 * against the unmodified result, and a player only re-rolls failures.
 */
export function shouldReroll(roll: number, succeeded: boolean, reroll: RerollType): boolean {
  switch (reroll) {
    case RerollType.NONE:
      return false;
    case RerollType.ONES:
      return roll === 1;
    case RerollType.FAILED:
    case RerollType.ALL:
      return !succeeded;
  }
}
