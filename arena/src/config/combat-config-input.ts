import type { CombatConfigInput, RewardWeights } from "../../../packages/skirmish-core/src/types.ts";

const NUMBER_KEYS = ["teamSize", "tickSeconds", "maxSteps", "bulletHitRadius", "missileHitRadius", "seed"] as const;
const RANGE_KEYS = ["mapBounds", "mapHeight"] as const;
const REWARD_KEYS: ReadonlyArray<keyof RewardWeights> = [
  "damageReward",
  "killReward",
  "damagePenalty",
  "deathPenalty",
  "survivalReward",
];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Present but malformed values become NaN so config validation names them.
function readNumber(value: unknown): number {
  return typeof value === "number" ? value : Number.NaN;
}

function readRange(value: unknown): [number, number] {
  if (Array.isArray(value) && value.length === 2) {
    return [readNumber(value[0]), readNumber(value[1])];
  }
  return [Number.NaN, Number.NaN];
}

/**
 * Reads combat config overrides from parsed JSON. Keys the engine does not
 * know are returned in `unknownKeys` and otherwise ignored.
 */
export function readCombatConfigInput(value: unknown): { input: CombatConfigInput; unknownKeys: string[] } {
  const input: CombatConfigInput = {};
  const unknownKeys: string[] = [];
  if (!isRecord(value)) {
    return { input, unknownKeys };
  }
  const known = new Set<string>([...NUMBER_KEYS, ...RANGE_KEYS, "rewards"]);
  for (const key of Object.keys(value)) {
    if (!known.has(key)) {
      unknownKeys.push(key);
    }
  }
  for (const key of NUMBER_KEYS) {
    if (value[key] !== undefined) {
      input[key] = readNumber(value[key]);
    }
  }
  for (const key of RANGE_KEYS) {
    if (value[key] !== undefined) {
      input[key] = readRange(value[key]);
    }
  }
  const rewards = value.rewards;
  if (isRecord(rewards)) {
    const weights: Partial<RewardWeights> = {};
    for (const key of REWARD_KEYS) {
      if (rewards[key] !== undefined) {
        weights[key] = readNumber(rewards[key]);
      }
    }
    input.rewards = weights;
  }
  return { input, unknownKeys };
}
