import { createHash } from "node:crypto";
import { CombatWorld } from "../../../packages/skirmish-core/src/gameplay/world/combat-world.ts";
import { getFamily } from "../ai/families.ts";
import type { DroneStats, LogTone, Team } from "../../../packages/skirmish-core/src/types.ts";
import type { TeamController } from "../ai/ai-schema.ts";
import type { EndReason, MatchResult, MatchSpec, PilotSpec, TeamOutcome } from "./match-types.ts";

export type RunMatchOptions = {
  verbose?: boolean;
};

function makeController(pilot: PilotSpec, team: Team, seed: number): TeamController {
  return getFamily(pilot.familyId).make(pilot.params, { team, seed });
}

function summarizeTeam(team: Team, drones: DroneStats[], totalReward: number, winner: Team | null): TeamOutcome {
  const members = drones.filter((drone) => drone.team === team);
  return {
    win: winner === team,
    tie: winner === null,
    totalReward,
    damageDealt: members.reduce((sum, drone) => sum + drone.damageDealt, 0),
    kills: members.reduce((sum, drone) => sum + drone.kills, 0),
    survivors: members.filter((drone) => drone.isAlive).length,
  };
}

export function runMatch(spec: MatchSpec, options: RunMatchOptions = {}): MatchResult {
  const logs: string[] = [];
  const world = new CombatWorld(spec.config, {
    addLog: (text: string, tone?: LogTone) => {
      logs.push(text);
      if (options.verbose) {
        // eslint-disable-next-line no-console
        console.log(`[arena]${tone ? ` (${tone})` : ""} ${text}`);
      }
    },
  });
  world.reset(spec.seed);
  const controllers: Record<Team, TeamController> = {
    red: makeController(spec.red, "red", spec.seed),
    blue: makeController(spec.blue, "blue", spec.seed),
  };

  const hash = createHash("sha256");
  const teamReward: Record<Team, number> = { red: 0, blue: 0 };
  let reason: EndReason = "horizon";
  let winner: Team | null = null;
  let steps = 0;

  for (;;) {
    const view = { step: steps, snapshot: world.renderSnapshot() };
    const result = world.step({ ...controllers.red(view), ...controllers.blue(view) });
    steps = result.info.step;

    const after = world.renderSnapshot();
    const tickRecord: number[] = [steps];
    for (const drone of after.drones) {
      tickRecord.push(...drone.position, result.rewards[drone.id] ?? 0);
      teamReward[drone.team] += result.rewards[drone.id] ?? 0;
    }
    hash.update(JSON.stringify(tickRecord));

    const anyId = world.agentIds()[0] ?? "";
    if (result.terminated[anyId]) {
      reason = "elimination";
      winner = result.info.winner;
      break;
    }
    if (result.truncated[anyId]) {
      break;
    }
  }

  const drones = world.agentIds().flatMap((id) => {
    const stats = world.inspectDrone(id);
    return stats ? [stats] : [];
  });

  return {
    spec,
    steps,
    outcome: { winner, reason },
    teams: {
      red: summarizeTeam("red", drones, teamReward.red, winner),
      blue: summarizeTeam("blue", drones, teamReward.blue, winner),
    },
    drones,
    digest: hash.digest("hex"),
    logs,
  };
}
