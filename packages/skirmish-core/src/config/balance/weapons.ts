export const MUZZLE_OFFSET = 5;

export const BULLET_SPEED = 600;
export const BULLET_DAMAGE = 8;
export const BULLET_LIFETIME = 1.2;
export const BULLET_SPREAD = 0.08;

export const MISSILE_SPEED = 150;
export const MISSILE_DAMAGE = 40;
export const MISSILE_LIFETIME = 3.5;
export const MISSILE_TRACKING = 0.8;

export const FLARE_LIFETIME = 3.0;
export const FLARE_RADIUS = 50;
export const FLARE_DESCENT_RATE = 5.0;
