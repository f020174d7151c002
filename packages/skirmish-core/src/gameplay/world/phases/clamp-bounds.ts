import { BOUNDARY_BOUNCE_DAMPING, FLOOR_IMPACT_DAMAGE } from "../../../config/balance/battlefield.ts";
import { applyDroneDamage } from "../../../simulation/drones/drone-model.ts";
import type { WorldState } from "../world-state.ts";
import type { DroneState } from "../../../types.ts";

function reflectAxis(drone: DroneState, axis: 0 | 1 | 2, min: number, max: number): "floor" | "ceiling" | null {
  const value = drone.position[axis];
  if (value < min) {
    drone.position[axis] = min;
    drone.velocity[axis] = Math.abs(drone.velocity[axis]) * BOUNDARY_BOUNCE_DAMPING;
    return "floor";
  }
  if (value > max) {
    drone.position[axis] = max;
    drone.velocity[axis] = -Math.abs(drone.velocity[axis]) * BOUNDARY_BOUNCE_DAMPING;
    return "ceiling";
  }
  return null;
}

/**
 * Keeps living drones inside the box. Returns the ids of drones that hit the
 * floor this tick; the floor strike is plain damage with no attacker.
 */
export function clampBounds(state: WorldState): { floorStrikes: string[]; floorKills: string[] } {
  const [minXY, maxXY] = state.config.mapBounds;
  const [minZ, maxZ] = state.config.mapHeight;
  const floorStrikes: string[] = [];
  const floorKills: string[] = [];
  for (const drone of state.drones.living()) {
    reflectAxis(drone, 0, minXY, maxXY);
    reflectAxis(drone, 1, minXY, maxXY);
    if (reflectAxis(drone, 2, minZ, maxZ) === "floor") {
      floorStrikes.push(drone.id);
      if (applyDroneDamage(drone, FLOOR_IMPACT_DAMAGE)) {
        floorKills.push(drone.id);
      }
    }
  }
  return { floorStrikes, floorKills };
}
