import { readFileSync } from "node:fs";
import { isRecord } from "../config/combat-config-input.ts";
import { readMatchSpec } from "../match/match-spec.ts";
import { runMatch } from "../match/run-match.ts";
import type { MatchResult } from "../match/match-types.ts";

/** Re-runs a stored match and fails unless it reproduces the same trajectory. */
export function verifyReplay(stored: unknown): MatchResult {
  if (!isRecord(stored) || typeof stored.digest !== "string") {
    throw new Error("replay file must contain a match result with a digest");
  }
  const result = runMatch(readMatchSpec(stored.spec));
  if (result.digest !== stored.digest) {
    throw new Error(`replay digest mismatch: stored ${stored.digest}, replayed ${result.digest}`);
  }
  return result;
}

export function runReplay(opts: { replayPath: string }): void {
  const raw = readFileSync(opts.replayPath, "utf8");
  const result = verifyReplay(JSON.parse(raw));
  // eslint-disable-next-line no-console
  console.log(
    `[arena replay] ok: ${result.steps} steps, winner ${result.outcome.winner ?? "none"} (${result.outcome.reason}), digest ${result.digest}`,
  );
}
