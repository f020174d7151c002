import {
  BULLET_DAMAGE,
  BULLET_LIFETIME,
  BULLET_SPEED,
  BULLET_SPREAD,
  MISSILE_DAMAGE,
  MISSILE_LIFETIME,
  MISSILE_SPEED,
  MISSILE_TRACKING,
  MUZZLE_OFFSET,
} from "../../config/balance/weapons.ts";
import { droneForward } from "../drones/drone-model.ts";
import { add3, length3, normalize3, scale3, sub3 } from "../math/vec3.ts";
import { uniform } from "../random/seeded-rng.ts";
import type { RandomSource } from "../random/seeded-rng.ts";
import type { DroneState, ProjectileState, Vec3 } from "../../types.ts";

export function spawnBullet(id: string, firer: DroneState, rng: RandomSource): ProjectileState {
  const forward = droneForward(firer);
  const jittered: Vec3 = [
    forward[0] + uniform(rng, -BULLET_SPREAD, BULLET_SPREAD),
    forward[1] + uniform(rng, -BULLET_SPREAD, BULLET_SPREAD),
    forward[2] + uniform(rng, -BULLET_SPREAD, BULLET_SPREAD),
  ];
  const direction = normalize3(jittered) ?? forward;
  return {
    id,
    kind: "bullet",
    ownerId: firer.id,
    ownerTeam: firer.team,
    position: add3(firer.position, scale3(direction, MUZZLE_OFFSET)),
    velocity: add3(scale3(direction, BULLET_SPEED), firer.velocity),
    damage: BULLET_DAMAGE,
    lifetime: BULLET_LIFETIME,
    targetId: null,
    tracking: 0,
  };
}

export function spawnMissile(id: string, firer: DroneState, target: DroneState | null): ProjectileState {
  const direction = droneForward(firer);
  return {
    id,
    kind: "missile",
    ownerId: firer.id,
    ownerTeam: firer.team,
    position: add3(firer.position, scale3(direction, MUZZLE_OFFSET)),
    velocity: scale3(direction, MISSILE_SPEED),
    damage: MISSILE_DAMAGE,
    lifetime: MISSILE_LIFETIME,
    targetId: target ? target.id : null,
    tracking: MISSILE_TRACKING,
  };
}

/**
 * Blends the missile heading toward the target by `tracking * dt`, keeping
 * its speed. Degenerate geometry leaves the velocity untouched.
 */
export function steerMissile(missile: ProjectileState, targetPosition: Readonly<Vec3>, dt: number): void {
  const desired = normalize3(sub3(targetPosition, missile.position));
  if (!desired) {
    return;
  }
  const speed = length3(missile.velocity);
  if (speed < 1e-6) {
    return;
  }
  const current = scale3(missile.velocity, 1 / speed);
  const blend = missile.tracking * dt;
  const heading = normalize3(add3(scale3(current, 1 - blend), scale3(desired, blend)));
  if (!heading) {
    return;
  }
  missile.velocity = scale3(heading, speed);
}

export function updateProjectile(projectile: ProjectileState, dt: number): boolean {
  projectile.position = [
    projectile.position[0] + projectile.velocity[0] * dt,
    projectile.position[1] + projectile.velocity[1] * dt,
    projectile.position[2] + projectile.velocity[2] * dt,
  ];
  projectile.lifetime -= dt;
  return projectile.lifetime > 0;
}
