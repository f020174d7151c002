import { numberParam, resolveParams } from "../ai-schema.ts";
import { createPursuitController } from "../pursuit-controller.ts";
import { PURSUIT_SCHEMA } from "./pursuit.ts";
import { SquadPlanner } from "../squad-planner.ts";
import type { PilotContext, PilotFamily, ParamSchema, Params } from "../ai-schema.ts";
import type { SquadStance } from "../squad-planner.ts";

// Aggression is set per stance, so the shared pursuit `aggression` is left out.
export const SQUAD_SCHEMA: ParamSchema = {
  leaderAggression: { kind: "number", min: 0.3, max: 1, def: 0.9 },
  attackerAggression: { kind: "number", min: 0.3, max: 1, def: 0.85 },
  supportAggression: { kind: "number", min: 0.3, max: 1, def: 0.75 },
  rescueAggression: { kind: "number", min: 0.3, max: 1, def: 0.7 },
  gunRange: PURSUIT_SCHEMA.gunRange,
  missileChance: PURSUIT_SCHEMA.missileChance,
  flareRange: PURSUIT_SCHEMA.flareRange,
  jitter: PURSUIT_SCHEMA.jitter,
};

export const squadFamily: PilotFamily = {
  id: "squad",
  schema: SQUAD_SCHEMA,
  make: (params: Params, context: PilotContext) => {
    const resolved = resolveParams(SQUAD_SCHEMA, params);
    const aggression: Record<SquadStance, number> = {
      leader: numberParam(resolved, "leaderAggression"),
      attacker: numberParam(resolved, "attackerAggression"),
      support: numberParam(resolved, "supportAggression"),
      rescue: numberParam(resolved, "rescueAggression"),
    };
    const planner = new SquadPlanner(context.team);
    const tuning = {
      aggression: aggression.attacker,
      gunRange: numberParam(resolved, "gunRange"),
      missileChance: numberParam(resolved, "missileChance"),
      flareRange: numberParam(resolved, "flareRange"),
      jitter: numberParam(resolved, "jitter"),
    };
    return createPursuitController(context, tuning, (self, enemies, allies) => planner.pickTarget(self, enemies, allies), {
      observe: (view) => planner.observe(view),
      tuningFor: (self, base) => ({ ...base, aggression: aggression[planner.stanceOf(self.id)] }),
    });
  },
};
