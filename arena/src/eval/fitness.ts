import type { Team } from "../../../packages/skirmish-core/src/types.ts";
import type { MatchResult } from "../match/match-types.ts";

export type MatchOutcome = "win" | "tie" | "loss";

export type Aggregate = {
  games: number;
  wins: number;
  ties: number;
  losses: number;
  /** Candidate team reward minus opponent team reward, averaged per game. */
  avgRewardMargin: number;
};

export function outcomeFor(result: MatchResult, team: Team): MatchOutcome {
  const winner = result.outcome.winner;
  if (winner === null) {
    return "tie";
  }
  return winner === team ? "win" : "loss";
}

export function aggregateResults(results: MatchResult[], candidateTeamFor: (result: MatchResult, index: number) => Team): Aggregate {
  const tally: Record<MatchOutcome, number> = { win: 0, tie: 0, loss: 0 };
  let marginTotal = 0;
  results.forEach((result, index) => {
    const team = candidateTeamFor(result, index);
    const opponent: Team = team === "red" ? "blue" : "red";
    tally[outcomeFor(result, team)] += 1;
    marginTotal += result.teams[team].totalReward - result.teams[opponent].totalReward;
  });
  return {
    games: results.length,
    wins: tally.win,
    ties: tally.tie,
    losses: tally.loss,
    avgRewardMargin: results.length > 0 ? marginTotal / results.length : 0,
  };
}

/** Lower end of the Wilson score interval on the win rate; z = 1.96 gives 95%. */
export function wilsonLowerBound(wins: number, games: number, z = 1.96): number {
  if (games <= 0) {
    return 0;
  }
  const rate = wins / games;
  const z2 = z * z;
  const spread = z * Math.sqrt((rate * (1 - rate)) / games + z2 / (4 * games * games));
  return (rate + z2 / (2 * games) - spread) / (1 + z2 / games);
}
