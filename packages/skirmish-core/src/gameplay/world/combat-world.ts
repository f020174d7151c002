import { SPAWN_HEIGHT, SPAWN_LATERAL_SPACING, SPAWN_OFFSET_X } from "../../config/balance/drone.ts";
import { WIND_MAX } from "../../config/balance/battlefield.ts";
import { CombatConfigError, createCombatConfig, observationSize } from "../../config/combat-config.ts";
import { copy3 } from "../../simulation/math/vec3.ts";
import { createDrone } from "../../simulation/drones/drone-model.ts";
import { mulberry32, uniform } from "../../simulation/random/seeded-rng.ts";
import { applyActions, spawnFromEvents } from "./phases/apply-actions.ts";
import { advanceProjectiles } from "./phases/advance-projectiles.ts";
import { resolveCollisions } from "./phases/resolve-collisions.ts";
import { advanceFlares } from "./phases/advance-flares.ts";
import { clampBounds } from "./phases/clamp-bounds.ts";
import { computeRewards } from "./phases/compute-rewards.ts";
import { buildEpisodeInfo, computeTermination } from "./phases/compute-termination.ts";
import { encodeObservations } from "./phases/encode-observations.ts";
import { createWorldState } from "./world-state.ts";
import type { RandomSource } from "../../simulation/random/seeded-rng.ts";
import type { WorldState } from "./world-state.ts";
import type {
  ActionMap,
  CombatConfig,
  CombatConfigInput,
  DroneStats,
  HitEvent,
  LogTone,
  ObservationMap,
  RenderSnapshot,
  ResetResult,
  StepResult,
  Team,
  WorldPhase,
} from "../../types.ts";

export interface CombatWorldHooks {
  addLog: (text: string, tone?: LogTone) => void;
}

const SILENT_HOOKS: CombatWorldHooks = {
  addLog: () => {},
};

const TEAMS: ReadonlyArray<Team> = ["red", "blue"];

export class CombatWorld {
  private readonly config: CombatConfig;
  private readonly hooks: CombatWorldHooks;
  private rng: RandomSource;
  private state: WorldState;
  private phase: WorldPhase;
  private lastObservations: ObservationMap;
  private lastTerminated: Record<string, boolean>;
  private lastTruncated: Record<string, boolean>;

  constructor(config: CombatConfigInput = {}, hooks: CombatWorldHooks = SILENT_HOOKS) {
    this.hooks = hooks;
    this.config = createCombatConfig(config, (warning) => this.hooks.addLog(`Config warning: ${warning}`, "warn"));
    this.rng = mulberry32(this.config.seed);
    this.state = createWorldState(this.config, this.rng);
    this.phase = "uninitialized";
    this.lastObservations = {};
    this.lastTerminated = {};
    this.lastTruncated = {};
  }

  public getConfig(): CombatConfig {
    return this.config;
  }

  public getPhase(): WorldPhase {
    return this.phase;
  }

  public observationSize(): number {
    return observationSize(this.config.teamSize);
  }

  public agentIds(): string[] {
    return this.state.drones.ids();
  }

  /** Without a seed the random stream carries on from where the last episode left it. */
  public reset(seed?: number): ResetResult {
    if (seed !== undefined) {
      if (!Number.isInteger(seed)) {
        throw new CombatConfigError([`reset seed must be an integer (got ${seed})`]);
      }
      this.rng = mulberry32(seed);
    }
    this.state = createWorldState(this.config, this.rng);
    this.spawnTeams();
    this.state.wind = [
      uniform(this.rng, -WIND_MAX, WIND_MAX),
      uniform(this.rng, -WIND_MAX, WIND_MAX),
      uniform(this.rng, -WIND_MAX, WIND_MAX),
    ];
    this.phase = "ready";
    this.lastObservations = encodeObservations(this.state);
    const termination = computeTermination(this.state);
    this.lastTerminated = termination.terminated;
    this.lastTruncated = termination.truncated;
    return { observations: this.lastObservations, info: buildEpisodeInfo(this.state) };
  }

  public step(actions: ActionMap): StepResult {
    if (this.phase === "uninitialized") {
      throw new Error("CombatWorld.step called before reset");
    }
    if (this.phase === "finished") {
      return this.finishedStep();
    }
    this.phase = "running";
    const state = this.state;
    state.step += 1;

    const droneEvents = applyActions(state, actions);
    spawnFromEvents(state, droneEvents);
    advanceProjectiles(state);
    const hits = resolveCollisions(state);
    advanceFlares(state);
    const { floorKills } = clampBounds(state);
    const rewards = computeRewards(state, hits);
    const termination = computeTermination(state);
    const observations = encodeObservations(state);
    const info = buildEpisodeInfo(state);

    this.logHits(hits);
    for (const id of floorKills) {
      this.hooks.addLog(`${id} crashed into the floor`, "warn");
    }
    if (termination.done) {
      this.phase = "finished";
      const reason = info.winner ? `${info.winner} wins` : "no winner";
      this.hooks.addLog(`Episode over at step ${state.step}: ${reason}`, info.winner ? "good" : "warn");
    }

    this.lastObservations = observations;
    this.lastTerminated = termination.terminated;
    this.lastTruncated = termination.truncated;
    return { observations, rewards, terminated: termination.terminated, truncated: termination.truncated, info };
  }

  public renderSnapshot(): RenderSnapshot {
    return {
      step: this.state.step,
      drones: this.state.drones.all().map((drone) => ({
        id: drone.id,
        team: drone.team,
        position: copy3(drone.position),
        velocity: copy3(drone.velocity),
        orientation: copy3(drone.orientation),
        hp: drone.hp,
        shield: drone.shield,
        isAlive: drone.alive,
      })),
      projectiles: this.state.projectiles.map((projectile) => ({
        id: projectile.id,
        position: copy3(projectile.position),
      })),
    };
  }

  public inspectDrone(id: string): DroneStats | null {
    const drone = this.state.drones.byId(id);
    if (!drone) {
      return null;
    }
    return {
      id: drone.id,
      team: drone.team,
      hp: drone.hp,
      shield: drone.shield,
      energy: drone.energy,
      ammo: drone.ammo,
      missiles: drone.missiles,
      isAlive: drone.alive,
      damageDealt: drone.damageDealt,
      damageTaken: drone.damageTaken,
      kills: drone.kills,
    };
  }

  private spawnTeams(): void {
    const teamSize = this.config.teamSize;
    for (const team of TEAMS) {
      const x = team === "red" ? -SPAWN_OFFSET_X : SPAWN_OFFSET_X;
      const yaw = team === "red" ? 0 : Math.PI;
      for (let i = 0; i < teamSize; i += 1) {
        const drones = this.state.drones;
        drones.insert(
          createDrone(`${team}_${i}`, drones.nextHandle(), team, [x, (i - teamSize / 2) * SPAWN_LATERAL_SPACING, SPAWN_HEIGHT], [0, 0, yaw]),
        );
      }
    }
  }

  private finishedStep(): StepResult {
    const rewards: Record<string, number> = {};
    for (const id of this.state.drones.ids()) {
      rewards[id] = 0;
    }
    return {
      observations: this.lastObservations,
      rewards,
      terminated: { ...this.lastTerminated },
      truncated: { ...this.lastTruncated },
      info: buildEpisodeInfo(this.state),
    };
  }

  private logHits(hits: ReadonlyArray<HitEvent>): void {
    for (const hit of hits) {
      if (hit.kind === "kill") {
        const tone = hit.attackerId.startsWith("red") ? "good" : "bad";
        this.hooks.addLog(`${hit.attackerId} destroyed ${hit.targetId} with a ${hit.projectileKind}`, tone);
      }
    }
  }
}
