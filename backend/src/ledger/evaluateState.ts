import type { CampaignState } from './types';

export type StateInputs = {
  state: CampaignState;
  now: number;
  deadline: number;
  heldBalance: bigint;
  goal: bigint;
};

/**
 * Derive the state a campaign is in at `now`. Terminal states never change; an
 * active campaign succeeds as soon as the goal is held, even before the deadline.
 */
export function evaluateState({ state, now, deadline, heldBalance, goal }: StateInputs): CampaignState {
  if (state !== 'active') return state;
  if (heldBalance >= goal) return 'successful';
  if (now >= deadline) return 'failed';
  return 'active';
}
