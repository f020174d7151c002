import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { readPilotSpec } from "./match-spec.ts";
import { runMatch } from "./run-match.ts";
import type { CombatConfigInput } from "../../../packages/skirmish-core/src/types.ts";
import type { MatchSpec, PilotSpec } from "./match-types.ts";

function resolvePilot(familyId: string, paramsPath: string | null, where: string): PilotSpec {
  if (!paramsPath) {
    return { familyId, params: {} };
  }
  const raw = readFileSync(paramsPath, "utf8");
  return readPilotSpec({ familyId, params: JSON.parse(raw) }, where);
}

export function runSingleMatch(opts: {
  redFamily: string;
  blueFamily: string;
  redParamsPath: string | null;
  blueParamsPath: string | null;
  seed: number;
  config: CombatConfigInput;
  verbose: boolean;
  outPath: string | null;
}): void {
  const spec: MatchSpec = {
    seed: opts.seed,
    config: opts.config,
    red: resolvePilot(opts.redFamily, opts.redParamsPath, "red"),
    blue: resolvePilot(opts.blueFamily, opts.blueParamsPath, "blue"),
  };

  const result = runMatch(spec, { verbose: opts.verbose });
  const out = JSON.stringify(result, null, 2);
  if (opts.outPath) {
    const full = resolve(process.cwd(), opts.outPath);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, out, "utf8");
    // eslint-disable-next-line no-console
    console.log(`[arena] ${result.outcome.reason} after ${result.steps} steps, winner ${result.outcome.winner ?? "none"} -> ${full}`);
  } else {
    // eslint-disable-next-line no-console
    console.log(out);
  }
}
