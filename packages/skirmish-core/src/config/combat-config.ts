import { OBS_ALLY_SIZE, OBS_ENEMY_SIZE, OBS_ENV_SIZE, OBS_SELF_SIZE } from "./balance/battlefield.ts";
import type { CombatConfig, CombatConfigInput, RewardWeights } from "../types.ts";

export type CombatConfigValidationResult = {
  errors: string[];
  warnings: string[];
};

export class CombatConfigError extends Error {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid combat config: ${errors.join("; ")}`);
    this.name = "CombatConfigError";
    this.errors = errors;
  }
}

export const DEFAULT_REWARD_WEIGHTS: RewardWeights = {
  damageReward: 0.5,
  killReward: 50.0,
  damagePenalty: 0.3,
  deathPenalty: 30.0,
  survivalReward: 0.1,
};

export const DEFAULT_COMBAT_CONFIG: CombatConfig = {
  teamSize: 3,
  mapBounds: [-500, 500],
  mapHeight: [0, 300],
  tickSeconds: 0.1,
  maxSteps: 3000,
  rewards: DEFAULT_REWARD_WEIGHTS,
  bulletHitRadius: 12.0,
  missileHitRadius: 15.0,
  seed: 0,
};

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function checkRange(name: string, range: readonly [number, number], errors: string[]): void {
  if (!Array.isArray(range) || range.length !== 2 || !isFiniteNumber(range[0]) || !isFiniteNumber(range[1])) {
    errors.push(`${name} must be a pair of finite numbers`);
    return;
  }
  if (range[0] >= range[1]) {
    errors.push(`${name} must have min < max (got ${range[0]}, ${range[1]})`);
  }
}

export function validateCombatConfig(config: CombatConfig): CombatConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.teamSize) || config.teamSize <= 0) {
    errors.push(`teamSize must be a positive integer (got ${config.teamSize})`);
  }
  checkRange("mapBounds", config.mapBounds, errors);
  checkRange("mapHeight", config.mapHeight, errors);
  if (!isFiniteNumber(config.tickSeconds) || config.tickSeconds <= 0) {
    errors.push(`tickSeconds must be a positive finite number (got ${config.tickSeconds})`);
  }
  if (!Number.isInteger(config.maxSteps) || config.maxSteps <= 0) {
    errors.push(`maxSteps must be a positive integer (got ${config.maxSteps})`);
  }
  for (const [key, value] of Object.entries(config.rewards)) {
    if (!isFiniteNumber(value) || value < 0) {
      errors.push(`rewards.${key} must be a non-negative finite number (got ${value})`);
    }
  }
  if (!isFiniteNumber(config.bulletHitRadius) || config.bulletHitRadius <= 0) {
    errors.push(`bulletHitRadius must be a positive finite number (got ${config.bulletHitRadius})`);
  }
  if (!isFiniteNumber(config.missileHitRadius) || config.missileHitRadius <= 0) {
    errors.push(`missileHitRadius must be a positive finite number (got ${config.missileHitRadius})`);
  }
  if (!Number.isInteger(config.seed)) {
    errors.push(`seed must be an integer (got ${config.seed})`);
  }

  if (errors.length === 0) {
    if (config.missileHitRadius < config.bulletHitRadius) {
      warnings.push("missileHitRadius is smaller than bulletHitRadius");
    }
    if (config.tickSeconds > 0.5) {
      warnings.push(`tickSeconds ${config.tickSeconds} lets bullets skip past targets`);
    }
  }
  return { errors, warnings };
}

function copyRange(range: readonly [number, number]): [number, number] {
  return [range[0], range[1]];
}

function mergeRewards(input: Partial<RewardWeights> = {}): RewardWeights {
  return {
    damageReward: input.damageReward ?? DEFAULT_REWARD_WEIGHTS.damageReward,
    killReward: input.killReward ?? DEFAULT_REWARD_WEIGHTS.killReward,
    damagePenalty: input.damagePenalty ?? DEFAULT_REWARD_WEIGHTS.damagePenalty,
    deathPenalty: input.deathPenalty ?? DEFAULT_REWARD_WEIGHTS.deathPenalty,
    survivalReward: input.survivalReward ?? DEFAULT_REWARD_WEIGHTS.survivalReward,
  };
}

/**
 * Fills every key the input leaves out (or sets to `undefined`) from the
 * defaults, then validates. Warnings go to `onWarning`; errors throw.
 */
export function createCombatConfig(input: CombatConfigInput = {}, onWarning?: (message: string) => void): CombatConfig {
  const defaults = DEFAULT_COMBAT_CONFIG;
  const config: CombatConfig = {
    teamSize: input.teamSize ?? defaults.teamSize,
    mapBounds: copyRange(input.mapBounds ?? defaults.mapBounds),
    mapHeight: copyRange(input.mapHeight ?? defaults.mapHeight),
    tickSeconds: input.tickSeconds ?? defaults.tickSeconds,
    maxSteps: input.maxSteps ?? defaults.maxSteps,
    rewards: mergeRewards(input.rewards),
    bulletHitRadius: input.bulletHitRadius ?? defaults.bulletHitRadius,
    missileHitRadius: input.missileHitRadius ?? defaults.missileHitRadius,
    seed: input.seed ?? defaults.seed,
  };
  const validation = validateCombatConfig(config);
  if (validation.errors.length > 0) {
    throw new CombatConfigError(validation.errors);
  }
  for (const warning of validation.warnings) {
    onWarning?.(warning);
  }
  return config;
}

export function observationSize(teamSize: number): number {
  return OBS_SELF_SIZE + teamSize * OBS_ENEMY_SIZE + (teamSize - 1) * OBS_ALLY_SIZE + OBS_ENV_SIZE;
}
