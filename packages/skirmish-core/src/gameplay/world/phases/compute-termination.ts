import type { WorldState } from "../world-state.ts";
import type { EpisodeInfo, Team } from "../../../types.ts";

export interface TerminationResult {
  terminated: Record<string, boolean>;
  truncated: Record<string, boolean>;
  done: boolean;
}

export function computeTermination(state: WorldState): TerminationResult {
  const eliminated =
    state.drones.livingOnTeam("red").length === 0 || state.drones.livingOnTeam("blue").length === 0;
  const horizonReached = state.step >= state.config.maxSteps;
  const terminated: Record<string, boolean> = {};
  const truncated: Record<string, boolean> = {};
  for (const id of state.drones.ids()) {
    terminated[id] = eliminated;
    truncated[id] = horizonReached;
  }
  return { terminated, truncated, done: eliminated || horizonReached };
}

export function buildEpisodeInfo(state: WorldState): EpisodeInfo {
  const redAlive = state.drones.livingOnTeam("red").length;
  const blueAlive = state.drones.livingOnTeam("blue").length;
  let winner: Team | null = null;
  if (blueAlive === 0 && redAlive > 0) {
    winner = "red";
  } else if (redAlive === 0 && blueAlive > 0) {
    winner = "blue";
  }
  return { step: state.step, redAlive, blueAlive, winner };
}
