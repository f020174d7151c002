import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { isRecord } from "./combat-config-input.ts";

export type ArenaDefaults = {
  teamSize?: number;
  maxSteps?: number;
  tickSeconds?: number;
  seeds?: number;
  parallel?: number;
  port?: number;
};

function readJsonFile(path: string): unknown {
  const raw = readFileSync(path, "utf8");
  return JSON.parse(raw);
}

function asNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export function loadArenaDefaults(cwd = process.cwd(), env: NodeJS.ProcessEnv = process.env): ArenaDefaults {
  const configPath = resolve(cwd, "arena.config.json");
  const parsed = existsSync(configPath) ? readJsonFile(configPath) : {};
  const cfg = isRecord(parsed) ? parsed : {};

  const pick = (key: keyof ArenaDefaults, envName: string): number | undefined => {
    return asNumber(env[envName]) ?? asNumber(cfg[key]);
  };

  return {
    teamSize: pick("teamSize", "SKIRMISH_TEAM_SIZE"),
    maxSteps: pick("maxSteps", "SKIRMISH_MAX_STEPS"),
    tickSeconds: pick("tickSeconds", "SKIRMISH_TICK_SECONDS"),
    seeds: pick("seeds", "SKIRMISH_SEEDS"),
    parallel: pick("parallel", "SKIRMISH_PARALLEL"),
    port: pick("port", "SKIRMISH_PORT"),
  };
}
