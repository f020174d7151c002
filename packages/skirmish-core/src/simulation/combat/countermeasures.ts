import { FLARE_DESCENT_RATE, FLARE_LIFETIME, FLARE_RADIUS } from "../../config/balance/weapons.ts";
import { copy3, distance3 } from "../math/vec3.ts";
import type { DroneState, FlareState, Vec3 } from "../../types.ts";

export function spawnFlare(id: string, owner: DroneState): FlareState {
  return {
    id,
    ownerId: owner.id,
    position: copy3(owner.position),
    lifetime: FLARE_LIFETIME,
    radius: FLARE_RADIUS,
  };
}

export function updateFlare(flare: FlareState, dt: number): boolean {
  flare.lifetime -= dt;
  flare.position = [flare.position[0], flare.position[1], flare.position[2] - FLARE_DESCENT_RATE * dt];
  return flare.lifetime > 0;
}

export function flareContains(flare: FlareState, point: Readonly<Vec3>): boolean {
  return distance3(point, flare.position) < flare.radius;
}
