import { updateFlare } from "../../../simulation/combat/countermeasures.ts";
import type { WorldState } from "../world-state.ts";

export function advanceFlares(state: WorldState): void {
  state.flares = state.flares.filter((flare) => updateFlare(flare, state.config.tickSeconds));
}
