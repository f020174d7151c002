import { numberParam, resolveParams } from "../ai-schema.ts";
import { createPursuitController, nearestEnemy } from "../pursuit-controller.ts";
import type { PilotContext, PilotFamily, ParamSchema, Params } from "../ai-schema.ts";
import type { PursuitTuning } from "../pursuit-controller.ts";

export const PURSUIT_SCHEMA: ParamSchema = {
  aggression: { kind: "number", min: 0.3, max: 1, def: 0.85 },
  gunRange: { kind: "number", min: 50, max: 400, def: 200 },
  missileChance: { kind: "number", min: 0, max: 0.5, def: 0.03 },
  flareRange: { kind: "number", min: 0, max: 300, def: 120 },
  jitter: { kind: "number", min: 0, max: 0.3, def: 0.05 },
};

export function readPursuitTuning(params: Params): PursuitTuning {
  const resolved = resolveParams(PURSUIT_SCHEMA, params);
  return {
    aggression: numberParam(resolved, "aggression"),
    gunRange: numberParam(resolved, "gunRange"),
    missileChance: numberParam(resolved, "missileChance"),
    flareRange: numberParam(resolved, "flareRange"),
    jitter: numberParam(resolved, "jitter"),
  };
}

export const pursuitFamily: PilotFamily = {
  id: "pursuit",
  schema: PURSUIT_SCHEMA,
  make: (params: Params, context: PilotContext) => createPursuitController(context, readPursuitTuning(params), nearestEnemy),
};
