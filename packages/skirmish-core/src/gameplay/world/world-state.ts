import { DroneArena } from "./drone-arena.ts";
import type { RandomSource } from "../../simulation/random/seeded-rng.ts";
import type { CombatConfig, FlareState, ProjectileState, Vec3 } from "../../types.ts";

export interface WorldState {
  readonly config: CombatConfig;
  readonly drones: DroneArena;
  projectiles: ProjectileState[];
  flares: FlareState[];
  wind: Vec3;
  step: number;
  /** Per-episode counter behind projectile and flare ids. */
  serial: number;
  rng: RandomSource;
}

export function createWorldState(config: CombatConfig, rng: RandomSource): WorldState {
  return {
    config,
    drones: new DroneArena(config.teamSize * 2),
    projectiles: [],
    flares: [],
    wind: [0, 0, 0],
    step: 0,
    serial: 0,
    rng,
  };
}

export function nextEntityId(state: WorldState, prefix: "bullet" | "missile" | "flare"): string {
  const id = `${prefix}_${state.serial}`;
  state.serial += 1;
  return id;
}
