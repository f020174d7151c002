import { writeFileSync, mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { getFamily } from "../ai/families.ts";
import { WorkerPool } from "../lib/worker-pool.ts";
import { aggregateResults, wilsonLowerBound } from "./fitness.ts";
import type { CombatConfigInput, Team } from "../../../packages/skirmish-core/src/types.ts";
import type { MatchResult, MatchSpec, PilotSpec } from "../match/match-types.ts";

export type EvalJob = {
  spec: MatchSpec;
  candidateTeam: Team;
};

export type MatchupSummary = {
  candidate: PilotSpec;
  opponent: PilotSpec;
  games: number;
  wins: number;
  ties: number;
  losses: number;
  winRate: number;
  winRateLowerBound95: number;
  avgRewardMargin: number;
  seeds: number[];
};

export function buildSeedList(seed0: number, count: number): number[] {
  const seeds: number[] = [];
  for (let i = 0; i < count; i += 1) {
    seeds.push(seed0 + i * 9973);
  }
  return seeds;
}

/** Two jobs per seed, with the candidate flying red then blue. */
export function makeEvalJobs(config: CombatConfigInput, candidate: PilotSpec, opponent: PilotSpec, seeds: number[]): EvalJob[] {
  const jobs: EvalJob[] = [];
  for (const seed of seeds) {
    jobs.push({ spec: { seed, config, red: candidate, blue: opponent }, candidateTeam: "red" });
    jobs.push({ spec: { seed, config, red: opponent, blue: candidate }, candidateTeam: "blue" });
  }
  return jobs;
}

export function summarizeMatchup(jobs: EvalJob[], results: MatchResult[], candidate: PilotSpec, opponent: PilotSpec, seeds: number[]): MatchupSummary {
  const agg = aggregateResults(results, (_r, index) => jobs[index]?.candidateTeam ?? "red");
  return {
    candidate,
    opponent,
    games: agg.games,
    wins: agg.wins,
    ties: agg.ties,
    losses: agg.losses,
    winRate: agg.games > 0 ? agg.wins / agg.games : 0,
    winRateLowerBound95: wilsonLowerBound(agg.wins, agg.games),
    avgRewardMargin: agg.avgRewardMargin,
    seeds,
  };
}

export async function evaluateMatchup(opts: {
  candidate: PilotSpec;
  opponent: PilotSpec;
  config: CombatConfigInput;
  seed0: number;
  seeds: number;
  parallel: number;
  outPath: string | null;
}): Promise<MatchupSummary> {
  getFamily(opts.candidate.familyId);
  getFamily(opts.opponent.familyId);

  const seeds = buildSeedList(opts.seed0, opts.seeds);
  const jobs = makeEvalJobs(opts.config, opts.candidate, opts.opponent, seeds);

  const pool = new WorkerPool<MatchSpec, MatchResult>(WorkerPool.matchWorkerUrl(), opts.parallel);
  try {
    const results = await Promise.all(jobs.map((job) => pool.run(job.spec)));
    const summary = summarizeMatchup(jobs, results, opts.candidate, opts.opponent, seeds);

    if (opts.outPath) {
      const full = resolve(process.cwd(), opts.outPath);
      mkdirSync(dirname(full), { recursive: true });
      writeFileSync(full, JSON.stringify(summary, null, 2), "utf8");
    }

    // eslint-disable-next-line no-console
    console.log(JSON.stringify(summary, null, 2));
    return summary;
  } finally {
    await pool.close();
  }
}
