import { describe, expect, it } from "vitest";
import { CombatWorld } from "../src/gameplay/world/combat-world.ts";
import { DISCRETE_ACTION } from "../src/types.ts";
import type { ActionMap, DroneAction, LogTone } from "../src/types.ts";

const idle: DroneAction = { discrete: DISCRETE_ACTION.idle, continuous: [0, 0, 0, 0] };

function allIdle(world: CombatWorld): ActionMap {
  const actions: Record<string, DroneAction> = {};
  for (const id of world.agentIds()) {
    actions[id] = idle;
  }
  return actions;
}

function scriptedActions(world: CombatWorld, tick: number): ActionMap {
  const actions: Record<string, DroneAction> = {};
  world.agentIds().forEach((id, index) => {
    actions[id] = {
      discrete: (tick + index) % 5,
      continuous: [1, Math.sin(tick * 0.1 + index) * 0.5, Math.cos(tick * 0.07) * 0.8, 0.2],
    };
  });
  return actions;
}

describe("combat world lifecycle", () => {
  it("refuses to step before the first reset", () => {
    const world = new CombatWorld();
    expect(world.getPhase()).toBe("uninitialized");
    expect(() => world.step({})).toThrow("CombatWorld.step called before reset");
  });

  it("spawns both teams facing each other", () => {
    const world = new CombatWorld({ teamSize: 3 });
    const { info } = world.reset(1);
    expect(world.getPhase()).toBe("ready");
    expect(world.agentIds()).toEqual(["red_0", "red_1", "red_2", "blue_0", "blue_1", "blue_2"]);
    expect(info).toEqual({ step: 0, redAlive: 3, blueAlive: 3, winner: null });

    const snapshot = world.renderSnapshot();
    expect(snapshot.step).toBe(0);
    expect(snapshot.projectiles).toEqual([]);
    expect(snapshot.drones[0]).toEqual({
      id: "red_0",
      team: "red",
      position: [-120, -75, 100],
      velocity: [0, 0, 0],
      orientation: [0, 0, 0],
      hp: 100,
      shield: 50,
      isAlive: true,
    });
    expect(snapshot.drones[5]?.position).toEqual([120, 25, 100]);
    expect(snapshot.drones[5]?.orientation).toEqual([0, 0, Math.PI]);
  });

  it("gives every agent exactly the survival reward on an idle tick", () => {
    const world = new CombatWorld({ teamSize: 3 });
    world.reset(42);
    const result = world.step(allIdle(world));
    expect(result.info.step).toBe(1);
    expect(result.info.redAlive).toBe(3);
    expect(result.info.blueAlive).toBe(3);
    expect(Object.keys(result.rewards)).toHaveLength(6);
    for (const id of world.agentIds()) {
      expect(result.rewards[id]).toBe(0.1);
      expect(result.terminated[id]).toBe(false);
      expect(result.truncated[id]).toBe(false);
    }
    expect(world.getPhase()).toBe("running");
  });

  it("encodes observations of the documented length", () => {
    for (const [teamSize, length] of [
      [2, 47],
      [3, 65],
      [5, 101],
    ]) {
      const world = new CombatWorld({ teamSize });
      const { observations } = world.reset(3);
      expect(world.observationSize()).toBe(length);
      for (const id of world.agentIds()) {
        expect(observations[id]).toBeInstanceOf(Float32Array);
        expect(observations[id]?.length).toBe(length);
      }
    }
  });

  it("lays out self, enemy and environment blocks", () => {
    const world = new CombatWorld({ teamSize: 1 });
    const { observations } = world.reset(11);
    const obs = observations.red_0;
    expect(obs).toBeDefined();
    if (!obs) {
      return;
    }
    expect(obs).toHaveLength(29);
    expect(obs[0]).toBeCloseTo(-0.24, 6);
    expect(obs[1]).toBeCloseTo(-0.05, 6);
    expect(obs[2]).toBeCloseTo(0.2, 6);
    expect(obs[9]).toBe(1);
    expect(obs[10]).toBe(1);
    expect(obs[11]).toBe(1);
    expect(obs[12]).toBe(1);
    expect(obs[13]).toBeCloseTo(0.48, 6);
    expect(obs[14]).toBe(0);
    expect(obs[19]).toBeCloseTo(0.24, 6);
    expect(obs[20]).toBe(0);
    expect(obs[21]).toBe(1);
    expect(obs[22]).toBe(0);
    for (const windIndex of [23, 24, 25]) {
      expect(Math.abs(obs[windIndex] ?? Number.NaN)).toBeLessThanOrEqual(0.5);
    }
    expect(obs[26]).toBeCloseTo(0.38, 6);
    expect(obs[27]).toBeCloseTo(0.475, 6);
    expect(obs[28]).toBeCloseTo(1 / 3, 6);
  });
});

describe("combat world stepping", () => {
  it("reproduces a trajectory bit for bit from the same seed", () => {
    const run = () => {
      const world = new CombatWorld({ teamSize: 2 });
      world.reset(5);
      const trace: number[][] = [];
      for (let tick = 0; tick < 80; tick += 1) {
        const result = world.step(scriptedActions(world, tick));
        const snapshot = world.renderSnapshot();
        trace.push([
          ...snapshot.drones.flatMap((drone) => drone.position),
          ...snapshot.projectiles.flatMap((projectile) => projectile.position),
          ...world.agentIds().map((id) => result.rewards[id] ?? Number.NaN),
        ]);
      }
      return trace;
    };
    expect(run()).toEqual(run());
  });

  it("continues the random stream when reset without a seed", () => {
    const world = new CombatWorld({ teamSize: 1, seed: 0 });
    const first = world.reset().observations.red_0;
    const second = world.reset().observations.red_0;
    expect(Array.from(first?.slice(23, 26) ?? [])).not.toEqual(Array.from(second?.slice(23, 26) ?? []));

    const third = world.reset(9).observations.red_0;
    const fourth = world.reset(9).observations.red_0;
    expect(Array.from(third ?? [])).toEqual(Array.from(fourth ?? []));
  });

  it("does not advance drones missing from the action map", () => {
    const world = new CombatWorld({ teamSize: 1 });
    world.reset(2);
    world.step({ red_0: idle, blue_0: { discrete: DISCRETE_ACTION.fireMissile, continuous: [0, 0, 0, 0] } });
    expect(world.inspectDrone("blue_0")?.energy).toBeCloseTo(85.75, 10);
    expect(world.inspectDrone("blue_0")?.missiles).toBe(3);

    world.step({ red_0: idle, nobody: idle });
    expect(world.inspectDrone("blue_0")?.energy).toBeCloseTo(85.75, 10);

    world.step({ red_0: idle, blue_0: idle });
    expect(world.inspectDrone("blue_0")?.energy).toBeCloseTo(86.5, 10);
    expect(world.inspectDrone("nobody")).toBeNull();
  });

  it("keeps every living drone inside the arena", () => {
    const world = new CombatWorld({ teamSize: 2, mapBounds: [-200, 200], mapHeight: [0, 150] });
    world.reset(8);
    for (let tick = 0; tick < 300; tick += 1) {
      const actions: Record<string, DroneAction> = {};
      for (const id of world.agentIds()) {
        actions[id] = { discrete: DISCRETE_ACTION.boost, continuous: [1, -0.6, tick % 40 < 20 ? 0.3 : -0.3, 0] };
      }
      const result = world.step(actions);
      for (const drone of world.renderSnapshot().drones.filter((d) => d.isAlive)) {
        expect(drone.position[0]).toBeGreaterThanOrEqual(-200);
        expect(drone.position[0]).toBeLessThanOrEqual(200);
        expect(drone.position[1]).toBeGreaterThanOrEqual(-200);
        expect(drone.position[1]).toBeLessThanOrEqual(200);
        expect(drone.position[2]).toBeGreaterThanOrEqual(0);
        expect(drone.position[2]).toBeLessThanOrEqual(150);
        expect(drone.hp).toBeGreaterThan(0);
        expect(drone.shield).toBeGreaterThanOrEqual(0);
        expect(drone.shield).toBeLessThanOrEqual(50);
      }
      if (result.info.redAlive === 0 || result.info.blueAlive === 0) {
        break;
      }
    }
  });

  it("truncates at the horizon and then ignores further steps", () => {
    const world = new CombatWorld({ teamSize: 1, maxSteps: 3 });
    world.reset(4);
    expect(world.step(allIdle(world)).truncated.red_0).toBe(false);
    expect(world.step(allIdle(world)).truncated.red_0).toBe(false);
    const last = world.step(allIdle(world));
    expect(last.truncated).toEqual({ red_0: true, blue_0: true });
    expect(last.terminated).toEqual({ red_0: false, blue_0: false });
    expect(world.getPhase()).toBe("finished");

    const after = world.step({ red_0: { discrete: DISCRETE_ACTION.fireGun, continuous: [1, 0, 0, 0] } });
    expect(after.info.step).toBe(3);
    expect(after.rewards).toEqual({ red_0: 0, blue_0: 0 });
    expect(after.truncated).toEqual({ red_0: true, blue_0: true });
    expect(after.observations).toBe(last.observations);
    expect(world.inspectDrone("red_0")?.ammo).toBe(500);

    world.reset(4);
    expect(world.getPhase()).toBe("ready");
  });

  it("ends the duel when a gunner wears down an idle target", () => {
    const logs: Array<{ text: string; tone: LogTone | undefined }> = [];
    const world = new CombatWorld({ teamSize: 1 }, { addLog: (text, tone) => logs.push({ text, tone }) });
    world.reset(21);
    const fire: ActionMap = {
      red_0: { discrete: DISCRETE_ACTION.fireGun, continuous: [0, 0, 0, 0] },
      blue_0: idle,
    };

    let killTick = -1;
    for (let tick = 1; tick <= 400; tick += 1) {
      const result = world.step(fire);
      if (!result.terminated.red_0) {
        expect(result.terminated.blue_0).toBe(false);
        continue;
      }
      killTick = tick;
      expect(result.terminated).toEqual({ red_0: true, blue_0: true });
      expect(result.info).toEqual({ step: tick, redAlive: 1, blueAlive: 0, winner: "red" });
      // One 8-point bullet lands the kill: survival + damage share + kill bonus, and the mirror penalty.
      expect(result.rewards.red_0).toBeCloseTo(0.1 + 8 * 0.5 + 50, 10);
      expect(result.rewards.blue_0).toBeCloseTo(-8 * 0.3 - 30, 10);
      break;
    }

    expect(killTick).toBeGreaterThan(0);
    expect(world.inspectDrone("blue_0")).toMatchObject({ hp: 0, isAlive: false });
    expect(world.inspectDrone("red_0")?.kills).toBe(1);
    expect(world.getPhase()).toBe("finished");
    expect(logs).toEqual([
      { text: "red_0 destroyed blue_0 with a bullet", tone: "good" },
      { text: `Episode over at step ${killTick}: red wins`, tone: "good" },
    ]);
  });

  it("reports config warnings through the log hook", () => {
    const logs: Array<{ text: string; tone: LogTone | undefined }> = [];
    const world = new CombatWorld({ tickSeconds: 0.6 }, { addLog: (text, tone) => logs.push({ text, tone }) });
    expect(world.getConfig().tickSeconds).toBe(0.6);
    expect(logs).toEqual([{ text: "Config warning: tickSeconds 0.6 lets bullets skip past targets", tone: "warn" }]);
  });

  it("falls back to defaults for keys explicitly set to undefined", () => {
    const world = new CombatWorld({ seed: undefined, teamSize: undefined });
    expect(world.getConfig().seed).toBe(0);
    expect(world.agentIds()).toEqual([]);
    world.reset();
    expect(world.agentIds()).toHaveLength(6);
  });
});
