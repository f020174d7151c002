import { describe, expect, it } from "vitest";
import { EpisodeSessionManager } from "../src/grpc/session-manager.ts";
import { CombatConfigError } from "../../packages/skirmish-core/src/config/combat-config.ts";

describe("episode session manager", () => {
  it("creates an episode and reports the initial observations", () => {
    const manager = new EpisodeSessionManager();
    const response = manager.createEpisode(JSON.stringify({ teamSize: 2, seed: 7 }));
    expect(response.step).toBe(0);
    expect(response.terminal).toBe(false);
    expect(response.errors).toEqual([]);
    expect(response.agents.map((agent) => agent.agent_id)).toEqual(["red_0", "red_1", "blue_0", "blue_1"]);
    expect(response.agents[0]?.observation).toHaveLength(47);
    expect(response.agents[0]?.reward).toBe(0);
    expect(JSON.parse(response.info_json)).toEqual({ step: 0, redAlive: 2, blueAlive: 2, winner: null });
    expect(manager.episodeCount()).toBe(1);
  });

  it("reports unknown config keys without failing", () => {
    const manager = new EpisodeSessionManager();
    const response = manager.createEpisode(JSON.stringify({ teamSize: 1, wingspan: 3 }));
    expect(response.errors).toEqual(["unknown config key ignored: wingspan"]);
  });

  it("rejects invalid configs", () => {
    const manager = new EpisodeSessionManager();
    expect(() => manager.createEpisode(JSON.stringify({ teamSize: 0 }))).toThrow(CombatConfigError);
    expect(() => manager.createEpisode(JSON.stringify({ teamSize: "three" }))).toThrow(
      "Invalid combat config: teamSize must be a positive integer (got NaN)",
    );
    expect(() => manager.createEpisode("{not json")).toThrow("Invalid combat config: config_json is not valid JSON");
    expect(manager.episodeCount()).toBe(0);
  });

  it("decodes actions and lists what it could not use", () => {
    const manager = new EpisodeSessionManager();
    const created = manager.createEpisode(JSON.stringify({ teamSize: 2, seed: 3 }));
    const response = manager.stepEpisode(created.episode_id, [
      { agent_id: "red_0", discrete: 1, continuous: [0, 0, 0, 0] },
      { agent_id: "ghost" },
      { agent_id: "red_0", discrete: 0 },
      { discrete: 1 },
      { agent_id: "blue_1", discrete: 9, continuous: [1, 0, 0, 0, 0] },
    ]);
    expect(response.errors).toEqual([
      "unknown agent: ghost",
      "duplicate action for red_0 ignored",
      "action missing agent_id",
      "blue_1: discrete action 9 treated as idle",
      "blue_1: 5 control values, only 4 used",
    ]);
    expect(response.step).toBe(1);
    for (const agent of response.agents) {
      expect(agent.reward).toBe(0.1);
      expect(agent.terminated).toBe(false);
    }

    const snapshot = JSON.parse(manager.getSnapshot(created.episode_id).snapshot_json);
    expect(snapshot.phase).toBe("running");
    expect(snapshot.step).toBe(1);
    expect(snapshot.projectiles.map((p: { id: string }) => p.id)).toEqual(["bullet_0"]);
  });

  it("resets to an identical start for the same seed", () => {
    const manager = new EpisodeSessionManager();
    const created = manager.createEpisode(JSON.stringify({ teamSize: 1 }));
    manager.stepEpisode(created.episode_id, [{ agent_id: "red_0", discrete: 4, continuous: [1, 0, 0, 0] }]);
    const first = manager.resetEpisode(created.episode_id, 7);
    const second = manager.resetEpisode(created.episode_id, 7);
    expect(first.step).toBe(0);
    expect(second.agents).toEqual(first.agents);
  });

  it("forwards engine logs once", () => {
    const manager = new EpisodeSessionManager();
    const created = manager.createEpisode(JSON.stringify({ teamSize: 1, seed: 21 }));
    let last = created;
    for (let i = 0; i < 400 && !last.terminal; i += 1) {
      last = manager.stepEpisode(created.episode_id, [
        { agent_id: "red_0", discrete: 1, continuous: [0, 0, 0, 0] },
        { agent_id: "blue_0", discrete: 0, continuous: [0, 0, 0, 0] },
      ]);
    }
    expect(last.terminal).toBe(true);
    expect(last.logs).toEqual([
      "[good] red_0 destroyed blue_0 with a bullet",
      `[good] Episode over at step ${last.step}: red wins`,
    ]);
    expect(JSON.parse(last.info_json).winner).toBe("red");

    const after = manager.stepEpisode(created.episode_id, []);
    expect(after.logs).toEqual([]);
    expect(after.step).toBe(last.step);
  });

  it("passes config warnings back as logs", () => {
    const manager = new EpisodeSessionManager();
    const response = manager.createEpisode(JSON.stringify({ teamSize: 1, bulletHitRadius: 20 }));
    expect(response.logs).toEqual(["[warn] Config warning: missileHitRadius is smaller than bulletHitRadius"]);
    expect(response.errors).toEqual([]);
  });

  it("fails on unknown episodes and closes known ones", () => {
    const manager = new EpisodeSessionManager();
    expect(() => manager.stepEpisode("ep_missing", [])).toThrow("episode not found: ep_missing");
    expect(() => manager.getSnapshot("ep_missing")).toThrow("episode not found: ep_missing");
    const created = manager.createEpisode("");
    expect(manager.closeEpisode(created.episode_id)).toBe(true);
    expect(manager.closeEpisode(created.episode_id)).toBe(false);
  });
});
