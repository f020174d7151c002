import { DISCRETE_ACTION } from "../../../packages/skirmish-core/src/types.ts";
import { clamp, wrapAngle } from "../../../packages/skirmish-core/src/simulation/physics/kinematics.ts";
import { distance3, normalize3, sub3 } from "../../../packages/skirmish-core/src/simulation/math/vec3.ts";
import { mulberry32, uniform } from "../../../packages/skirmish-core/src/simulation/random/seeded-rng.ts";
import type { RandomSource } from "../../../packages/skirmish-core/src/simulation/random/seeded-rng.ts";
import type { DroneAction, DroneSnapshot, RenderSnapshot, Vec3 } from "../../../packages/skirmish-core/src/types.ts";
import type { PilotContext, TeamController, TeamView } from "./ai-schema.ts";

export type PursuitTuning = {
  aggression: number;
  gunRange: number;
  missileChance: number;
  flareRange: number;
  jitter: number;
};

/** `allies` holds the living drones of the picker's own team, `self` included. */
export type TargetPicker = (self: DroneSnapshot, enemies: DroneSnapshot[], allies: DroneSnapshot[]) => DroneSnapshot;

export type PursuitHooks = {
  /** Runs once per tick before any drone is steered. */
  observe?: (view: TeamView) => void;
  tuningFor?: (self: DroneSnapshot, base: PursuitTuning) => PursuitTuning;
};

const ASSUMED_ROUND_SPEED = 500;
const YAW_GAIN = 1.5;
const PITCH_GAIN = 1.2;
const MISSILE_RANGE = 350;
const CLOSE_GUN_RANGE = 120;

const TEAM_SALT = { red: 0x2f7a1d, blue: 0x51c3e9 } as const;

export function pilotRng(context: PilotContext): RandomSource {
  return mulberry32((context.seed ^ TEAM_SALT[context.team]) >>> 0);
}

export function nearestEnemy(self: DroneSnapshot, enemies: DroneSnapshot[]): DroneSnapshot {
  let best = enemies[0];
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const enemy of enemies) {
    const d = distance3(self.position, enemy.position);
    if (d < bestDistance) {
      best = enemy;
      bestDistance = d;
    }
  }
  if (!best) {
    throw new Error("nearestEnemy called without enemies");
  }
  return best;
}

export function pursueTarget(self: DroneSnapshot, target: DroneSnapshot, tuning: PursuitTuning, rng: RandomSource): DroneAction {
  const range = distance3(self.position, target.position);
  const leadSeconds = (range / ASSUMED_ROUND_SPEED) * 0.5;
  const predicted: Vec3 = [
    target.position[0] + target.velocity[0] * leadSeconds,
    target.position[1] + target.velocity[1] * leadSeconds,
    target.position[2] + target.velocity[2] * leadSeconds,
  ];
  const offset = sub3(predicted, self.position);
  const dist = distance3(predicted, self.position);
  const direction: Vec3 = normalize3(offset, 1) ?? [1, 0, 0];

  const yawError = wrapAngle(Math.atan2(direction[1], direction[0]) - self.orientation[2]);
  const pitchError = Math.asin(clamp(direction[2], -1, 1)) - self.orientation[1];
  const angleError = Math.abs(yawError) + Math.abs(pitchError);

  let throttle = dist > 200 ? 1 : dist > 100 ? 0.7 : 0.5;
  let yawRate = clamp(yawError * YAW_GAIN, -1, 1);
  const pitchRate = clamp(pitchError * PITCH_GAIN, -1, 1);

  let discrete: number = DISCRETE_ACTION.idle;
  if (dist < tuning.gunRange && angleError < 0.4) {
    discrete = DISCRETE_ACTION.fireGun;
  } else if (dist < MISSILE_RANGE && angleError < 0.25 && rng() < tuning.missileChance) {
    discrete = DISCRETE_ACTION.fireMissile;
  } else if (dist < CLOSE_GUN_RANGE && angleError < 0.6) {
    discrete = DISCRETE_ACTION.fireGun;
  }

  if (tuning.jitter > 0) {
    throttle += uniform(rng, -tuning.jitter, tuning.jitter);
    yawRate += uniform(rng, -tuning.jitter, tuning.jitter);
  }

  return {
    discrete,
    continuous: [clamp(throttle * tuning.aggression, 0, 1), pitchRate, clamp(yawRate, -1, 1), 0],
  };
}

function patrol(step: number): DroneAction {
  return {
    discrete: DISCRETE_ACTION.idle,
    continuous: [0.3, Math.sin(step * 0.03) * 0.2, Math.cos(step * 0.02) * 0.3, 0],
  };
}

/**
 * Remembers how far each missile was from each of our drones on the previous
 * tick. A missile inside `flareRange` that got closer counts as incoming.
 */
export class MissileWatch {
  private readonly lastDistance = new Map<string, number>();
  private readonly flareRange: number;

  constructor(flareRange: number) {
    this.flareRange = flareRange;
  }

  public incoming(self: DroneSnapshot, snapshot: RenderSnapshot): boolean {
    this.forgetExpired(snapshot);
    let threatened = false;
    for (const projectile of snapshot.projectiles) {
      if (!projectile.id.startsWith("missile_")) {
        continue;
      }
      const key = `${self.id}:${projectile.id}`;
      const d = distance3(self.position, projectile.position);
      const previous = this.lastDistance.get(key);
      if (previous !== undefined && d < previous && d < this.flareRange) {
        threatened = true;
      }
      this.lastDistance.set(key, d);
    }
    return threatened;
  }

  public trackedCount(): number {
    return this.lastDistance.size;
  }

  private forgetExpired(snapshot: RenderSnapshot): void {
    const live = new Set(snapshot.projectiles.map((projectile) => projectile.id));
    for (const key of this.lastDistance.keys()) {
      const missileId = key.slice(key.indexOf(":") + 1);
      if (!live.has(missileId)) {
        this.lastDistance.delete(key);
      }
    }
  }
}

export function createPursuitController(
  context: PilotContext,
  tuning: PursuitTuning,
  pickTarget: TargetPicker,
  hooks: PursuitHooks = {},
): TeamController {
  const rng = pilotRng(context);
  const watch = new MissileWatch(tuning.flareRange);
  return (view: TeamView) => {
    hooks.observe?.(view);
    const actions: Record<string, DroneAction> = {};
    const living = view.snapshot.drones.filter((drone) => drone.isAlive);
    const enemies = living.filter((drone) => drone.team !== context.team);
    const allies = living.filter((drone) => drone.team === context.team);
    for (const self of allies) {
      if (enemies.length === 0) {
        actions[self.id] = patrol(view.step);
        continue;
      }
      const target = pickTarget(self, enemies, allies);
      const droneTuning = hooks.tuningFor ? hooks.tuningFor(self, tuning) : tuning;
      const action = pursueTarget(self, target, droneTuning, rng);
      actions[self.id] = watch.incoming(self, view.snapshot)
        ? { discrete: DISCRETE_ACTION.deployFlare, continuous: action.continuous }
        : action;
    }
    return actions;
  };
}
