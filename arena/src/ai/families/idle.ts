import { DISCRETE_ACTION } from "../../../../packages/skirmish-core/src/types.ts";
import type { DroneAction } from "../../../../packages/skirmish-core/src/types.ts";
import type { PilotContext, PilotFamily, Params, TeamView } from "../ai-schema.ts";

export const idleFamily: PilotFamily = {
  id: "idle",
  schema: {},
  make: (_params: Params, context: PilotContext) => (view: TeamView) => {
    const actions: Record<string, DroneAction> = {};
    for (const drone of view.snapshot.drones) {
      if (drone.isAlive && drone.team === context.team) {
        actions[drone.id] = { discrete: DISCRETE_ACTION.idle, continuous: [0, 0, 0, 0] };
      }
    }
    return actions;
  },
};
