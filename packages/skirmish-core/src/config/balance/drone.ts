export const DRONE_MAX_SPEED = 200;
export const DRONE_MAX_ACCELERATION = 50;
export const DRONE_MAX_TURN_RATE = 2.0;
export const DRONE_DRAG = 0.02;

export const DRONE_MAX_HP = 100;
export const DRONE_MAX_SHIELD = 50;
export const DRONE_MAX_ENERGY = 100;
export const DRONE_MAX_AMMO = 500;
export const DRONE_MAX_MISSILES = 4;

// Regeneration is per second
export const SHIELD_REGEN = 2.0;
export const ENERGY_REGEN = 5.0;
export const ENERGY_REGEN_SLOW_BONUS = 1.5;
export const ENERGY_REGEN_SLOW_SPEED = 60;

export const BOOST_COST_PER_SECOND = 20.0;
export const BOOST_MULTIPLIER = 1.5;
export const MISSILE_ENERGY_COST = 15.0;
export const MISSILE_COOLDOWN = 5.0;
export const FLARE_ENERGY_COST = 10.0;
export const FLARE_COOLDOWN = 8.0;

export const DEFAULT_FIELD_OF_VIEW = Math.PI / 3;

// Spawn layout
export const SPAWN_OFFSET_X = 120;
export const SPAWN_LATERAL_SPACING = 50;
export const SPAWN_HEIGHT = 100;
