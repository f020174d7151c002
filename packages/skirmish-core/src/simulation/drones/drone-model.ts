import {
  BOOST_COST_PER_SECOND,
  BOOST_MULTIPLIER,
  DEFAULT_FIELD_OF_VIEW,
  DRONE_DRAG,
  DRONE_MAX_ACCELERATION,
  DRONE_MAX_AMMO,
  DRONE_MAX_ENERGY,
  DRONE_MAX_HP,
  DRONE_MAX_MISSILES,
  DRONE_MAX_SHIELD,
  DRONE_MAX_SPEED,
  DRONE_MAX_TURN_RATE,
  ENERGY_REGEN,
  ENERGY_REGEN_SLOW_BONUS,
  ENERGY_REGEN_SLOW_SPEED,
  FLARE_COOLDOWN,
  FLARE_ENERGY_COST,
  MISSILE_COOLDOWN,
  MISSILE_ENERGY_COST,
  SHIELD_REGEN,
} from "../../config/balance/drone.ts";
import { clamp, clampSpeed, forwardFromOrientation, wrapAngle } from "../physics/kinematics.ts";
import { copy3, distance3, dot3, length3, sub3 } from "../math/vec3.ts";
import { DISCRETE_ACTION } from "../../types.ts";
import type { DroneAction, DroneEvent, DroneState, Team, Vec3 } from "../../types.ts";

export function createDrone(id: string, handle: number, team: Team, position: Readonly<Vec3>, orientation: Readonly<Vec3>): DroneState {
  return {
    id,
    handle,
    team,
    position: copy3(position),
    velocity: [0, 0, 0],
    orientation: copy3(orientation),
    hp: DRONE_MAX_HP,
    shield: DRONE_MAX_SHIELD,
    energy: DRONE_MAX_ENERGY,
    ammo: DRONE_MAX_AMMO,
    missiles: DRONE_MAX_MISSILES,
    alive: true,
    boosting: false,
    missileCooldown: 0,
    flareCooldown: 0,
    damageDealt: 0,
    damageTaken: 0,
    kills: 0,
  };
}

function readControl(continuous: ReadonlyArray<number>, index: number): number {
  const value = continuous[index];
  return typeof value === "number" && Number.isFinite(value) ? clamp(value, -1, 1) : 0;
}

function applyDiscreteAction(drone: DroneState, code: number, dt: number): DroneEvent | null {
  if (code === DISCRETE_ACTION.fireGun && drone.ammo > 0) {
    drone.ammo -= 1;
    drone.boosting = false;
    return { kind: "fire-gun", droneId: drone.id };
  }
  if (
    code === DISCRETE_ACTION.fireMissile &&
    drone.missiles > 0 &&
    drone.missileCooldown <= 0 &&
    drone.energy >= MISSILE_ENERGY_COST
  ) {
    drone.missiles -= 1;
    drone.energy -= MISSILE_ENERGY_COST;
    drone.missileCooldown = MISSILE_COOLDOWN;
    drone.boosting = false;
    return { kind: "fire-missile", droneId: drone.id };
  }
  if (code === DISCRETE_ACTION.deployFlare && drone.flareCooldown <= 0 && drone.energy >= FLARE_ENERGY_COST) {
    drone.energy -= FLARE_ENERGY_COST;
    drone.flareCooldown = FLARE_COOLDOWN;
    drone.boosting = false;
    return { kind: "deploy-flare", droneId: drone.id };
  }
  if (code === DISCRETE_ACTION.boost && drone.energy >= BOOST_COST_PER_SECOND * dt) {
    drone.energy -= BOOST_COST_PER_SECOND * dt;
    drone.boosting = true;
    return null;
  }
  drone.boosting = false;
  return null;
}

/**
 * Advances one drone by `dt` seconds. Mutates the drone and returns the
 * weapon/countermeasure events the world has to turn into entities.
 */
export function applyDroneAction(drone: DroneState, action: DroneAction, dt: number): DroneEvent[] {
  if (!drone.alive) {
    return [];
  }
  drone.missileCooldown = Math.max(0, drone.missileCooldown - dt);
  drone.flareCooldown = Math.max(0, drone.flareCooldown - dt);

  const events: DroneEvent[] = [];
  const discreteEvent = applyDiscreteAction(drone, action.discrete, dt);
  if (discreteEvent) {
    events.push(discreteEvent);
  }

  const throttle = readControl(action.continuous, 0);
  const pitchRate = readControl(action.continuous, 1) * DRONE_MAX_TURN_RATE;
  const yawRate = readControl(action.continuous, 2) * DRONE_MAX_TURN_RATE;
  const rollRate = readControl(action.continuous, 3) * DRONE_MAX_TURN_RATE;
  drone.orientation = [
    wrapAngle(drone.orientation[0] + rollRate * dt),
    wrapAngle(drone.orientation[1] + pitchRate * dt),
    wrapAngle(drone.orientation[2] + yawRate * dt),
  ];

  const forward = forwardFromOrientation(drone.orientation);
  const accelMag = throttle * DRONE_MAX_ACCELERATION * (drone.boosting ? BOOST_MULTIPLIER : 1);
  const speedBefore = length3(drone.velocity);
  const drag = DRONE_DRAG * speedBefore;
  const accel: Vec3 = [
    forward[0] * accelMag - drag * drone.velocity[0],
    forward[1] * accelMag - drag * drone.velocity[1],
    forward[2] * accelMag - drag * drone.velocity[2],
  ];
  drone.velocity = clampSpeed(
    [drone.velocity[0] + accel[0] * dt, drone.velocity[1] + accel[1] * dt, drone.velocity[2] + accel[2] * dt],
    DRONE_MAX_SPEED,
  );
  drone.position = [
    drone.position[0] + drone.velocity[0] * dt,
    drone.position[1] + drone.velocity[1] * dt,
    drone.position[2] + drone.velocity[2] * dt,
  ];

  const speed = length3(drone.velocity);
  drone.shield = Math.min(DRONE_MAX_SHIELD, drone.shield + SHIELD_REGEN * dt);
  const energyRegen = ENERGY_REGEN * (speed < ENERGY_REGEN_SLOW_SPEED ? ENERGY_REGEN_SLOW_BONUS : 1);
  drone.energy = Math.min(DRONE_MAX_ENERGY, drone.energy + energyRegen * dt);

  return events;
}

/** Shield soaks damage before hp. Returns true only on the killing blow. */
export function applyDroneDamage(drone: DroneState, amount: number): boolean {
  if (!drone.alive) {
    return false;
  }
  drone.damageTaken += amount;
  const absorbed = Math.min(drone.shield, amount);
  drone.shield -= absorbed;
  const remaining = amount - absorbed;
  if (remaining > 0) {
    drone.hp -= remaining;
  }
  if (drone.hp <= 0) {
    drone.hp = 0;
    drone.alive = false;
    return true;
  }
  return false;
}

export function droneForward(drone: DroneState): Vec3 {
  return forwardFromOrientation(drone.orientation);
}

export function distanceBetween(a: DroneState, b: DroneState): number {
  return distance3(a.position, b.position);
}

export function angleTo(from: DroneState, to: DroneState): number {
  const offset = sub3(to.position, from.position);
  const dist = length3(offset);
  if (dist < 1e-6) {
    return 0;
  }
  const forward = droneForward(from);
  const cos = clamp(dot3(forward, [offset[0] / dist, offset[1] / dist, offset[2] / dist]), -1, 1);
  return Math.acos(cos);
}

export function canSee(from: DroneState, to: DroneState, fieldOfView = DEFAULT_FIELD_OF_VIEW): boolean {
  return angleTo(from, to) <= fieldOfView / 2;
}
