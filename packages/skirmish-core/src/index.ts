export * from "./types.ts";

export * from "./config/balance/battlefield.ts";
export * from "./config/balance/drone.ts";
export * from "./config/balance/weapons.ts";
export * from "./config/combat-config.ts";

export * from "./simulation/math/vec3.ts";
export * from "./simulation/physics/kinematics.ts";
export * from "./simulation/random/seeded-rng.ts";
export * from "./simulation/drones/drone-model.ts";
export * from "./simulation/combat/projectiles.ts";
export * from "./simulation/combat/countermeasures.ts";

export * from "./gameplay/world/drone-arena.ts";
export * from "./gameplay/world/world-state.ts";
export * from "./gameplay/world/phases/apply-actions.ts";
export * from "./gameplay/world/phases/advance-projectiles.ts";
export * from "./gameplay/world/phases/resolve-collisions.ts";
export * from "./gameplay/world/phases/advance-flares.ts";
export * from "./gameplay/world/phases/clamp-bounds.ts";
export * from "./gameplay/world/phases/compute-rewards.ts";
export * from "./gameplay/world/phases/compute-termination.ts";
export * from "./gameplay/world/phases/encode-observations.ts";
export * from "./gameplay/world/combat-world.ts";
