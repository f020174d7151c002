import { applyDroneAction, distanceBetween } from "../../../simulation/drones/drone-model.ts";
import { spawnBullet, spawnMissile } from "../../../simulation/combat/projectiles.ts";
import { spawnFlare } from "../../../simulation/combat/countermeasures.ts";
import { nextEntityId } from "../world-state.ts";
import type { WorldState } from "../world-state.ts";
import type { ActionMap, DroneEvent, DroneState } from "../../../types.ts";

/**
 * Runs the drone model for every living drone that has an entry in `actions`.
 * Drones are visited in arena order, so the key order of the map never
 * changes the outcome. Drones without an entry are not advanced at all.
 */
export function applyActions(state: WorldState, actions: ActionMap): DroneEvent[] {
  const events: DroneEvent[] = [];
  for (const drone of state.drones.all()) {
    if (!drone.alive || !Object.hasOwn(actions, drone.id)) {
      continue;
    }
    const action = actions[drone.id];
    if (!action) {
      continue;
    }
    events.push(...applyDroneAction(drone, action, state.config.tickSeconds));
  }
  return events;
}

export function findNearestLivingEnemy(state: WorldState, drone: DroneState): DroneState | null {
  let best: DroneState | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const enemy of state.drones.livingEnemiesOf(drone.team)) {
    const distance = distanceBetween(drone, enemy);
    if (distance < bestDistance) {
      best = enemy;
      bestDistance = distance;
    }
  }
  return best;
}

export function spawnFromEvents(state: WorldState, events: ReadonlyArray<DroneEvent>): void {
  for (const event of events) {
    const drone = state.drones.byId(event.droneId);
    if (!drone) {
      continue;
    }
    switch (event.kind) {
      case "fire-gun":
        state.projectiles.push(spawnBullet(nextEntityId(state, "bullet"), drone, state.rng));
        break;
      case "fire-missile":
        state.projectiles.push(spawnMissile(nextEntityId(state, "missile"), drone, findNearestLivingEnemy(state, drone)));
        break;
      case "deploy-flare":
        state.flares.push(spawnFlare(nextEntityId(state, "flare"), drone));
        break;
    }
  }
}
