import type { DroneAction, RenderSnapshot, Team } from "../../../packages/skirmish-core/src/types.ts";

export type ParamKind = "number" | "int" | "boolean";

export type ParamDef =
  | { kind: "number"; min: number; max: number; def: number }
  | { kind: "int"; min: number; max: number; def: number }
  | { kind: "boolean"; def: boolean };

export type ParamSchema = Record<string, ParamDef>;
export type Params = Record<string, number | boolean>;

export type TeamView = {
  step: number;
  snapshot: RenderSnapshot;
};

/** Maps what a team can see to one action per living drone of that team. */
export type TeamController = (view: TeamView) => Record<string, DroneAction>;

export type PilotContext = {
  team: Team;
  seed: number;
};

export interface PilotFamily {
  id: string;
  schema: ParamSchema;
  make: (params: Params, context: PilotContext) => TeamController;
}

/** Fills missing params with defaults and clamps the rest into range. */
export function resolveParams(schema: ParamSchema, params: Params): Params {
  const out: Params = {};
  for (const [key, def] of Object.entries(schema)) {
    const raw = params[key];
    if (def.kind === "boolean") {
      out[key] = typeof raw === "boolean" ? raw : def.def;
      continue;
    }
    const value = typeof raw === "number" && Number.isFinite(raw) ? raw : def.def;
    const clamped = Math.max(def.min, Math.min(def.max, value));
    out[key] = def.kind === "int" ? Math.round(clamped) : clamped;
  }
  return out;
}

export function numberParam(params: Params, key: string): number {
  const value = params[key];
  if (typeof value !== "number") {
    throw new Error(`param ${key} is not a number`);
  }
  return value;
}
