import { describe, expect, it } from "vitest";
import { createDrone } from "../src/simulation/drones/drone-model.ts";
import { spawnBullet, spawnMissile, steerMissile, updateProjectile } from "../src/simulation/combat/projectiles.ts";
import { flareContains, spawnFlare, updateFlare } from "../src/simulation/combat/countermeasures.ts";
import type { ProjectileState } from "../src/types.ts";

const centredRng = () => 0.5;

const missileAt = (overrides: Partial<ProjectileState> = {}): ProjectileState => ({
  id: "missile_0",
  kind: "missile",
  ownerId: "red_0",
  ownerTeam: "red",
  position: [0, 0, 0],
  velocity: [150, 0, 0],
  damage: 40,
  lifetime: 3.5,
  targetId: "blue_0",
  tracking: 0.8,
  ...overrides,
});

describe("bullets", () => {
  it("leaves the muzzle along the nose and inherits the firer's velocity", () => {
    const firer = createDrone("red_0", 0, "red", [0, 0, 100], [0, 0, 0]);
    firer.velocity = [10, 0, 0];
    const bullet = spawnBullet("bullet_3", firer, centredRng);
    expect(bullet.id).toBe("bullet_3");
    expect(bullet.kind).toBe("bullet");
    expect(bullet.ownerTeam).toBe("red");
    expect(bullet.position).toEqual([5, 0, 100]);
    expect(bullet.velocity).toEqual([610, 0, 0]);
    expect(bullet.damage).toBe(8);
    expect(bullet.lifetime).toBe(1.2);
    expect(bullet.targetId).toBeNull();
  });

  it("draws three spread values per shot", () => {
    let draws = 0;
    const counting = () => {
      draws += 1;
      return 0.25;
    };
    const firer = createDrone("red_0", 0, "red", [0, 0, 100], [0, 0, 0]);
    const bullet = spawnBullet("bullet_0", firer, counting);
    expect(draws).toBe(3);
    expect(Math.hypot(...bullet.velocity)).toBeCloseTo(600, 8);
  });
});

describe("missiles", () => {
  it("locks the given target and flies along the nose", () => {
    const firer = createDrone("red_0", 0, "red", [0, 0, 100], [0, 0, 0]);
    const target = createDrone("blue_0", 1, "blue", [120, 0, 100], [0, 0, Math.PI]);
    const missile = spawnMissile("missile_1", firer, target);
    expect(missile.targetId).toBe("blue_0");
    expect(missile.velocity).toEqual([150, 0, 0]);
    expect(missile.tracking).toBe(0.8);
    expect(spawnMissile("missile_2", firer, null).targetId).toBeNull();
  });

  it("turns toward the target without changing speed", () => {
    const missile = missileAt();
    steerMissile(missile, [0, 100, 0], 0.1);
    const norm = Math.hypot(0.92, 0.08);
    expect(missile.velocity[0]).toBeCloseTo((0.92 / norm) * 150, 10);
    expect(missile.velocity[1]).toBeCloseTo((0.08 / norm) * 150, 10);
    expect(Math.hypot(...missile.velocity)).toBeCloseTo(150, 10);
  });

  it("keeps its heading when the target sits on top of it", () => {
    const missile = missileAt();
    steerMissile(missile, [0, 0, 0], 0.1);
    expect(missile.velocity).toEqual([150, 0, 0]);
  });

  it("expires once lifetime runs out", () => {
    const missile = missileAt({ lifetime: 0.15 });
    expect(updateProjectile(missile, 0.1)).toBe(true);
    expect(missile.position[0]).toBeCloseTo(15, 10);
    expect(updateProjectile(missile, 0.1)).toBe(false);
  });
});

describe("flares", () => {
  it("drop at a fixed rate and burn out", () => {
    const owner = createDrone("blue_0", 0, "blue", [10, 20, 100], [0, 0, 0]);
    const flare = spawnFlare("flare_0", owner);
    expect(flare.position).toEqual([10, 20, 100]);
    expect(updateFlare(flare, 0.1)).toBe(true);
    expect(flare.position[2]).toBeCloseTo(99.5, 10);
    expect(flare.lifetime).toBeCloseTo(2.9, 10);
    flare.lifetime = 0.05;
    expect(updateFlare(flare, 0.1)).toBe(false);
  });

  it("contains points strictly inside the radius", () => {
    const owner = createDrone("blue_0", 0, "blue", [0, 0, 0], [0, 0, 0]);
    const flare = spawnFlare("flare_0", owner);
    expect(flareContains(flare, [49.9, 0, 0])).toBe(true);
    expect(flareContains(flare, [50, 0, 0])).toBe(false);
  });
});
