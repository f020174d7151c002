import {
  OBS_ALLY_SIZE,
  OBS_DISTANCE_SCALE,
  OBS_ENEMY_SIZE,
  OBS_POSITION_SCALE,
  OBS_VELOCITY_SCALE,
  OBS_WIND_SCALE,
} from "../../../config/balance/battlefield.ts";
import {
  DRONE_MAX_AMMO,
  DRONE_MAX_ENERGY,
  DRONE_MAX_HP,
  DRONE_MAX_SHIELD,
} from "../../../config/balance/drone.ts";
import { observationSize } from "../../../config/combat-config.ts";
import { angleTo, distanceBetween } from "../../../simulation/drones/drone-model.ts";
import type { WorldState } from "../world-state.ts";
import type { DroneState, ObservationMap } from "../../../types.ts";

function byDistanceFrom(self: DroneState, others: DroneState[]): DroneState[] {
  return others
    .map((drone) => ({ drone, distance: distanceBetween(self, drone) }))
    .sort((a, b) => a.distance - b.distance)
    .map((entry) => entry.drone);
}

function normalizeInto(value: number, min: number, max: number): number {
  return (value - min) / (max - min);
}

/**
 * Layout: self (13) | enemies, nearest first (teamSize x 10) |
 * allies, nearest first ((teamSize - 1) x 8) | environment (6).
 * Empty slots stay zero.
 */
export function encodeObservation(state: WorldState, self: DroneState): Float32Array {
  const teamSize = state.config.teamSize;
  const out = new Float32Array(observationSize(teamSize));
  let cursor = 0;
  const write = (...values: number[]): void => {
    for (const value of values) {
      out[cursor] = value;
      cursor += 1;
    }
  };

  write(
    self.position[0] / OBS_POSITION_SCALE,
    self.position[1] / OBS_POSITION_SCALE,
    self.position[2] / OBS_POSITION_SCALE,
    self.velocity[0] / OBS_VELOCITY_SCALE,
    self.velocity[1] / OBS_VELOCITY_SCALE,
    self.velocity[2] / OBS_VELOCITY_SCALE,
    self.orientation[0] / Math.PI,
    self.orientation[1] / Math.PI,
    self.orientation[2] / Math.PI,
    self.hp / DRONE_MAX_HP,
    self.shield / DRONE_MAX_SHIELD,
    self.energy / DRONE_MAX_ENERGY,
    self.ammo / DRONE_MAX_AMMO,
  );

  const enemies = byDistanceFrom(self, state.drones.livingEnemiesOf(self.team)).slice(0, teamSize);
  for (const enemy of enemies) {
    write(
      (enemy.position[0] - self.position[0]) / OBS_POSITION_SCALE,
      (enemy.position[1] - self.position[1]) / OBS_POSITION_SCALE,
      (enemy.position[2] - self.position[2]) / OBS_POSITION_SCALE,
      (enemy.velocity[0] - self.velocity[0]) / OBS_VELOCITY_SCALE,
      (enemy.velocity[1] - self.velocity[1]) / OBS_VELOCITY_SCALE,
      (enemy.velocity[2] - self.velocity[2]) / OBS_VELOCITY_SCALE,
      distanceBetween(self, enemy) / OBS_DISTANCE_SCALE,
      angleTo(self, enemy) / Math.PI,
      enemy.hp / DRONE_MAX_HP,
      0,
    );
  }
  cursor += (teamSize - enemies.length) * OBS_ENEMY_SIZE;

  const allies = byDistanceFrom(
    self,
    state.drones.livingOnTeam(self.team).filter((drone) => drone.id !== self.id),
  ).slice(0, teamSize - 1);
  for (const ally of allies) {
    write(
      (ally.position[0] - self.position[0]) / OBS_POSITION_SCALE,
      (ally.position[1] - self.position[1]) / OBS_POSITION_SCALE,
      (ally.position[2] - self.position[2]) / OBS_POSITION_SCALE,
      (ally.velocity[0] - self.velocity[0]) / OBS_VELOCITY_SCALE,
      (ally.velocity[1] - self.velocity[1]) / OBS_VELOCITY_SCALE,
      (ally.velocity[2] - self.velocity[2]) / OBS_VELOCITY_SCALE,
      ally.hp / DRONE_MAX_HP,
      1,
    );
  }
  cursor += (teamSize - 1 - allies.length) * OBS_ALLY_SIZE;

  const [minXY, maxXY] = state.config.mapBounds;
  const [minZ, maxZ] = state.config.mapHeight;
  write(
    state.wind[0] / OBS_WIND_SCALE,
    state.wind[1] / OBS_WIND_SCALE,
    state.wind[2] / OBS_WIND_SCALE,
    normalizeInto(self.position[0], minXY, maxXY),
    normalizeInto(self.position[1], minXY, maxXY),
    normalizeInto(self.position[2], minZ, maxZ),
  );
  return out;
}

export function encodeObservations(state: WorldState): ObservationMap {
  const observations: ObservationMap = {};
  for (const drone of state.drones.all()) {
    observations[drone.id] = encodeObservation(state, drone);
  }
  return observations;
}
