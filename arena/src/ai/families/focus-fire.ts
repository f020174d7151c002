import { createPursuitController, nearestEnemy } from "../pursuit-controller.ts";
import { PURSUIT_SCHEMA, readPursuitTuning } from "./pursuit.ts";
import type { DroneSnapshot } from "../../../../packages/skirmish-core/src/types.ts";
import type { PilotContext, PilotFamily, Params } from "../ai-schema.ts";

/** Whole team goes after the weakest enemy; nearest breaks ties. */
function weakestEnemy(self: DroneSnapshot, enemies: DroneSnapshot[]): DroneSnapshot {
  const lowest = Math.min(...enemies.map((enemy) => enemy.hp + enemy.shield));
  return nearestEnemy(self, enemies.filter((enemy) => enemy.hp + enemy.shield === lowest));
}

export const focusFireFamily: PilotFamily = {
  id: "focus-fire",
  schema: PURSUIT_SCHEMA,
  make: (params: Params, context: PilotContext) => createPursuitController(context, readPursuitTuning(params), weakestEnemy),
};
