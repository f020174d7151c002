import { readCombatConfigInput, isRecord } from "../config/combat-config-input.ts";
import type { Params } from "../ai/ai-schema.ts";
import type { MatchSpec, PilotSpec } from "./match-types.ts";

function readParams(value: unknown, where: string): Params {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new Error(`${where}.params must be an object`);
  }
  const params: Params = {};
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw !== "number" && typeof raw !== "boolean") {
      throw new Error(`${where}.params.${key} must be a number or boolean`);
    }
    params[key] = raw;
  }
  return params;
}

export function readPilotSpec(value: unknown, where: string): PilotSpec {
  if (!isRecord(value) || typeof value.familyId !== "string") {
    throw new Error(`${where} must be { familyId, params }`);
  }
  return { familyId: value.familyId, params: readParams(value.params, where) };
}

export function readMatchSpec(value: unknown): MatchSpec {
  if (!isRecord(value)) {
    throw new Error("match spec must be an object");
  }
  if (typeof value.seed !== "number" || !Number.isInteger(value.seed)) {
    throw new Error("match spec seed must be an integer");
  }
  const { input, unknownKeys } = readCombatConfigInput(value.config);
  if (unknownKeys.length > 0) {
    throw new Error(`unknown config keys in match spec: ${unknownKeys.join(", ")}`);
  }
  return {
    seed: value.seed,
    config: input,
    red: readPilotSpec(value.red, "red"),
    blue: readPilotSpec(value.blue, "blue"),
  };
}
