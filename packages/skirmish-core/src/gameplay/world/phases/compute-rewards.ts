import type { WorldState } from "../world-state.ts";
import type { HitEvent } from "../../../types.ts";

export function computeRewards(state: WorldState, hits: ReadonlyArray<HitEvent>): Record<string, number> {
  const weights = state.config.rewards;
  const rewards: Record<string, number> = {};
  for (const drone of state.drones.all()) {
    rewards[drone.id] = drone.alive ? weights.survivalReward : 0;
  }
  for (const hit of hits) {
    const lethal = hit.kind === "kill";
    const attackerReward = rewards[hit.attackerId];
    if (attackerReward !== undefined) {
      rewards[hit.attackerId] = attackerReward + hit.damage * weights.damageReward + (lethal ? weights.killReward : 0);
    }
    const targetReward = rewards[hit.targetId];
    if (targetReward !== undefined) {
      rewards[hit.targetId] = targetReward - hit.damage * weights.damagePenalty - (lethal ? weights.deathPenalty : 0);
    }
  }
  return rewards;
}
