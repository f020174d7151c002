import { flareContains } from "../../../simulation/combat/countermeasures.ts";
import { steerMissile, updateProjectile } from "../../../simulation/combat/projectiles.ts";
import type { WorldState } from "../world-state.ts";
import type { ProjectileState } from "../../../types.ts";

function guideMissile(state: WorldState, missile: ProjectileState): void {
  if (missile.targetId === null) {
    return;
  }
  if (state.flares.some((flare) => flareContains(flare, missile.position))) {
    missile.targetId = null;
    return;
  }
  const target = state.drones.byId(missile.targetId);
  if (target && target.alive) {
    steerMissile(missile, target.position, state.config.tickSeconds);
  }
}

export function advanceProjectiles(state: WorldState): void {
  const active: ProjectileState[] = [];
  for (const projectile of state.projectiles) {
    if (projectile.kind === "missile") {
      guideMissile(state, projectile);
    }
    if (updateProjectile(projectile, state.config.tickSeconds)) {
      active.push(projectile);
    }
  }
  state.projectiles = active;
}
