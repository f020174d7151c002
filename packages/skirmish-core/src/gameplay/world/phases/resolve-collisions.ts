import { applyDroneDamage } from "../../../simulation/drones/drone-model.ts";
import { distance3 } from "../../../simulation/math/vec3.ts";
import type { WorldState } from "../world-state.ts";
import type { HitEvent, ProjectileState } from "../../../types.ts";

export function resolveCollisions(state: WorldState): HitEvent[] {
  const events: HitEvent[] = [];
  const remaining: ProjectileState[] = [];

  for (const projectile of state.projectiles) {
    const hitRadius = projectile.kind === "missile" ? state.config.missileHitRadius : state.config.bulletHitRadius;
    const target = state.drones
      .all()
      .find((drone) => drone.alive && drone.team !== projectile.ownerTeam && distance3(projectile.position, drone.position) < hitRadius);
    if (!target) {
      remaining.push(projectile);
      continue;
    }
    const killed = applyDroneDamage(target, projectile.damage);
    const attacker = state.drones.byId(projectile.ownerId);
    if (attacker) {
      attacker.damageDealt += projectile.damage;
      if (killed) {
        attacker.kills += 1;
      }
    }
    events.push({
      kind: killed ? "kill" : "hit",
      attackerId: projectile.ownerId,
      targetId: target.id,
      damage: projectile.damage,
      projectileKind: projectile.kind,
    });
  }

  state.projectiles = remaining;
  return events;
}
