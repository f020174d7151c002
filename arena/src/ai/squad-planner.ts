import { distance3 } from "../../../packages/skirmish-core/src/simulation/math/vec3.ts";
import { nearestEnemy } from "./pursuit-controller.ts";
import type { DroneSnapshot, Team } from "../../../packages/skirmish-core/src/types.ts";
import type { TeamView } from "./ai-schema.ts";

export type SquadRole = "leader" | "attacker" | "support";

/** What a drone is doing this tick; `rescue` is a support pilot covering a swarmed ally. */
export type SquadStance = SquadRole | "rescue";

export const SQUAD_REPLAN_INTERVAL = 50;
const ATTACKER_SHARE = 0.6;
const SWARM_RADIUS = 150;
const SWARM_COUNT = 2;

function lowestHp(drones: DroneSnapshot[]): DroneSnapshot | null {
  let best: DroneSnapshot | null = null;
  for (const drone of drones) {
    if (!best || drone.hp < best.hp) {
      best = drone;
    }
  }
  return best;
}

/**
 * Team-level plan for the squad pilot. Every `SQUAD_REPLAN_INTERVAL` steps
 * the most forward drone becomes leader, the front 60% attack and the rest
 * support; half the squad is sent after the lowest-hp enemy and the others
 * are spread over the remaining enemies.
 */
export class SquadPlanner {
  private readonly team: Team;
  private readonly roles = new Map<string, SquadRole>();
  private readonly targets = new Map<string, string>();
  private readonly stances = new Map<string, SquadStance>();

  constructor(team: Team) {
    this.team = team;
  }

  public observe(view: TeamView): void {
    if (view.step % SQUAD_REPLAN_INTERVAL !== 0) {
      return;
    }
    const living = view.snapshot.drones.filter((drone) => drone.isAlive);
    const own = living.filter((drone) => drone.team === this.team);
    const enemies = living.filter((drone) => drone.team !== this.team);
    this.assignRoles(own);
    this.assignTargets(own, enemies);
  }

  public roleOf(id: string): SquadRole {
    return this.roles.get(id) ?? "attacker";
  }

  public assignedTarget(id: string): string | null {
    return this.targets.get(id) ?? null;
  }

  /** Stance chosen by the last `pickTarget` call for this drone. */
  public stanceOf(id: string): SquadStance {
    return this.stances.get(id) ?? this.roleOf(id);
  }

  public pickTarget(self: DroneSnapshot, enemies: DroneSnapshot[], allies: DroneSnapshot[]): DroneSnapshot {
    const role = this.roleOf(self.id);
    if (role === "leader") {
      this.stances.set(self.id, "leader");
      return nearestEnemy(self, enemies);
    }
    if (role === "attacker") {
      this.stances.set(self.id, "attacker");
      const assigned = enemies.find((enemy) => enemy.id === this.assignedTarget(self.id));
      return assigned ?? nearestEnemy(self, enemies);
    }

    const swarmed = allies.filter(
      (ally) =>
        ally.id !== self.id &&
        enemies.filter((enemy) => distance3(enemy.position, ally.position) < SWARM_RADIUS).length >= SWARM_COUNT,
    );
    const ward = lowestHp(swarmed);
    if (ward) {
      this.stances.set(self.id, "rescue");
      return nearestEnemy(ward, enemies);
    }
    this.stances.set(self.id, "support");
    return lowestHp(enemies) ?? nearestEnemy(self, enemies);
  }

  private assignRoles(own: DroneSnapshot[]): void {
    const forward = this.team === "red" ? -1 : 1;
    const ordered = [...own].sort((a, b) => forward * (a.position[0] - b.position[0]));
    this.roles.clear();
    ordered.forEach((drone, index) => {
      const role: SquadRole = index === 0 ? "leader" : index < ordered.length * ATTACKER_SHARE ? "attacker" : "support";
      this.roles.set(drone.id, role);
    });
  }

  private assignTargets(own: DroneSnapshot[], enemies: DroneSnapshot[]): void {
    if (enemies.length === 0) {
      return;
    }
    const byHp = [...enemies].sort((a, b) => a.hp - b.hp);
    const focused = Math.floor(own.length / 2);
    own.forEach((drone, index) => {
      const target = index < focused ? byHp[0] : byHp[index % byHp.length];
      if (target) {
        this.targets.set(drone.id, target.id);
      }
    });
  }
}
