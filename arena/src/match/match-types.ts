import type { Params } from "../ai/ai-schema.ts";
import type { CombatConfigInput, DroneStats, Team } from "../../../packages/skirmish-core/src/types.ts";

export type PilotSpec = {
  familyId: string;
  params: Params;
};

export type MatchSpec = {
  seed: number;
  config: CombatConfigInput;
  red: PilotSpec;
  blue: PilotSpec;
};

export type EndReason = "elimination" | "horizon";

export type TeamOutcome = {
  win: boolean;
  tie: boolean;
  totalReward: number;
  damageDealt: number;
  kills: number;
  survivors: number;
};

export type MatchResult = {
  spec: MatchSpec;
  steps: number;
  outcome: {
    winner: Team | null;
    reason: EndReason;
  };
  teams: Record<Team, TeamOutcome>;
  drones: DroneStats[];
  /** sha256 over every tick's drone positions and rewards. */
  digest: string;
  logs: string[];
};
