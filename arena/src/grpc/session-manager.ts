import { CombatWorld } from "../../../packages/skirmish-core/src/gameplay/world/combat-world.ts";
import { CombatConfigError } from "../../../packages/skirmish-core/src/config/combat-config.ts";
import { readCombatConfigInput, isRecord } from "../config/combat-config-input.ts";
import type { DroneAction, EpisodeInfo, LogTone, ObservationMap } from "../../../packages/skirmish-core/src/types.ts";

const MAX_BUFFERED_LOGS = 200;
const CONTROL_CHANNELS = 4;

export type AgentActionMessage = {
  agent_id?: unknown;
  discrete?: unknown;
  continuous?: unknown;
};

export type AgentResultMessage = {
  agent_id: string;
  observation: number[];
  reward: number;
  terminated: boolean;
  truncated: boolean;
};

export type EpisodeResponse = {
  episode_id: string;
  step: number;
  agents: AgentResultMessage[];
  terminal: boolean;
  info_json: string;
  errors: string[];
  logs: string[];
};

export type SnapshotResponse = {
  episode_id: string;
  snapshot_json: string;
};

type Session = {
  id: string;
  seed: number;
  createdAtMs: number;
  updatedAtMs: number;
  world: CombatWorld;
  logs: string[];
};

type StepOutcome = {
  observations: ObservationMap;
  rewards: Record<string, number>;
  terminated: Record<string, boolean>;
  truncated: Record<string, boolean>;
  info: EpisodeInfo;
};

function parseConfigJson(raw: string): unknown {
  if (raw.trim().length === 0) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new CombatConfigError(["config_json is not valid JSON"]);
  }
}

export class EpisodeSessionManager {
  private readonly sessions = new Map<string, Session>();
  private nextSerial = 0;

  public createEpisode(configJson: string): EpisodeResponse {
    const parsed = parseConfigJson(configJson);
    if (!isRecord(parsed)) {
      throw new CombatConfigError(["config_json must be a JSON object"]);
    }
    const { input, unknownKeys } = readCombatConfigInput(parsed);
    const errors = unknownKeys.map((key) => `unknown config key ignored: ${key}`);

    const id = `ep_${Date.now().toString(36)}_${this.nextSerial.toString(36)}`;
    this.nextSerial += 1;
    const logs: string[] = [];
    const world = new CombatWorld(input, {
      addLog: (text: string, tone?: LogTone) => {
        logs.push(tone ? `[${tone}] ${text}` : text);
        if (logs.length > MAX_BUFFERED_LOGS) {
          logs.splice(0, logs.length - MAX_BUFFERED_LOGS);
        }
      },
    });
    const seed = world.getConfig().seed;
    const reset = world.reset(seed);
    const session: Session = {
      id,
      seed,
      createdAtMs: Date.now(),
      updatedAtMs: Date.now(),
      world,
      logs,
    };
    this.sessions.set(id, session);
    return this.buildResponse(session, this.resetOutcome(session, reset.observations, reset.info), errors);
  }

  /** `seed` undefined keeps the episode's random stream going. */
  public resetEpisode(episodeId: string, seed?: number): EpisodeResponse {
    const session = this.requireSession(episodeId);
    const reset = session.world.reset(seed);
    if (seed !== undefined) {
      session.seed = seed;
    }
    session.updatedAtMs = Date.now();
    return this.buildResponse(session, this.resetOutcome(session, reset.observations, reset.info), []);
  }

  public stepEpisode(episodeId: string, actions: ReadonlyArray<AgentActionMessage>): EpisodeResponse {
    const session = this.requireSession(episodeId);
    const errors: string[] = [];
    const decoded = this.decodeActions(session, actions, errors);
    const result = session.world.step(decoded);
    session.updatedAtMs = Date.now();
    return this.buildResponse(session, result, errors);
  }

  public getSnapshot(episodeId: string): SnapshotResponse {
    const session = this.requireSession(episodeId);
    session.updatedAtMs = Date.now();
    const snapshot = {
      schema_version: "skirmish.v1",
      episode_id: session.id,
      seed: session.seed,
      phase: session.world.getPhase(),
      ...session.world.renderSnapshot(),
    };
    return { episode_id: session.id, snapshot_json: JSON.stringify(snapshot) };
  }

  public closeEpisode(episodeId: string): boolean {
    return this.sessions.delete(episodeId);
  }

  public episodeCount(): number {
    return this.sessions.size;
  }

  private requireSession(episodeId: string): Session {
    const session = this.sessions.get(episodeId);
    if (!session) {
      throw new Error(`episode not found: ${episodeId}`);
    }
    return session;
  }

  private resetOutcome(session: Session, observations: ObservationMap, info: EpisodeInfo): StepOutcome {
    const rewards: Record<string, number> = {};
    const flags: Record<string, boolean> = {};
    for (const id of session.world.agentIds()) {
      rewards[id] = 0;
      flags[id] = false;
    }
    return { observations, rewards, terminated: flags, truncated: { ...flags }, info };
  }

  private decodeActions(session: Session, actions: ReadonlyArray<AgentActionMessage>, errors: string[]): Record<string, DroneAction> {
    const known = new Set(session.world.agentIds());
    const out: Record<string, DroneAction> = {};
    for (const entry of actions) {
      const agentId = typeof entry.agent_id === "string" ? entry.agent_id.trim() : "";
      if (!agentId) {
        errors.push("action missing agent_id");
        continue;
      }
      if (!known.has(agentId)) {
        errors.push(`unknown agent: ${agentId}`);
        continue;
      }
      if (Object.hasOwn(out, agentId)) {
        errors.push(`duplicate action for ${agentId} ignored`);
        continue;
      }
      const discrete = Number(entry.discrete ?? 0);
      if (!Number.isInteger(discrete) || discrete < 0 || discrete > 4) {
        errors.push(`${agentId}: discrete action ${String(entry.discrete)} treated as idle`);
      }
      const continuous = Array.isArray(entry.continuous) ? entry.continuous.map((value) => Number(value)) : [];
      if (continuous.length > CONTROL_CHANNELS) {
        errors.push(`${agentId}: ${continuous.length} control values, only ${CONTROL_CHANNELS} used`);
      }
      out[agentId] = {
        discrete: Number.isInteger(discrete) ? discrete : 0,
        continuous: continuous.slice(0, CONTROL_CHANNELS),
      };
    }
    return out;
  }

  private buildResponse(session: Session, outcome: StepOutcome, errors: string[]): EpisodeResponse {
    const agents = session.world.agentIds().map((id): AgentResultMessage => {
      const observation = outcome.observations[id];
      return {
        agent_id: id,
        observation: observation ? Array.from(observation) : [],
        reward: outcome.rewards[id] ?? 0,
        terminated: outcome.terminated[id] ?? false,
        truncated: outcome.truncated[id] ?? false,
      };
    });
    const logs = session.logs.splice(0);
    return {
      episode_id: session.id,
      step: outcome.info.step,
      agents,
      terminal: session.world.getPhase() === "finished",
      info_json: JSON.stringify(outcome.info),
      errors,
      logs,
    };
  }
}
