export const BOUNDARY_BOUNCE_DAMPING = 0.5;
export const FLOOR_IMPACT_DAMAGE = 5.0;

export const WIND_MAX = 5;

// Observation normalisation
export const OBS_POSITION_SCALE = 500;
export const OBS_VELOCITY_SCALE = 200;
export const OBS_DISTANCE_SCALE = 1000;
export const OBS_WIND_SCALE = 10;

export const OBS_SELF_SIZE = 13;
export const OBS_ENEMY_SIZE = 10;
export const OBS_ALLY_SIZE = 8;
export const OBS_ENV_SIZE = 6;
