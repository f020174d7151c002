import { runSingleMatch } from "./match/run-single-match.ts";
import { runReplay } from "./replay/run-replay.ts";
import { evaluateMatchup } from "./eval/evaluate-matchup.ts";
import { startGrpcServer } from "./grpc/server.ts";
import { loadArenaDefaults } from "./config/arena-config.ts";
import type { CombatConfigInput } from "../../packages/skirmish-core/src/types.ts";
import type { ArenaDefaults } from "./config/arena-config.ts";

type Args = Record<string, string | boolean>;

function parseArgs(argv: string[]): { cmd: string; args: Args } {
  const [cmd = ""] = argv;
  const args: Args = {};
  for (let i = 1; i < argv.length; i += 1) {
    const token = argv[i] ?? "";
    if (!token.startsWith("--")) {
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      args[key] = true;
      continue;
    }
    args[key] = next;
    i += 1;
  }
  return { cmd, args };
}

function asNumber(value: unknown, fallback: number): number {
  if (typeof value !== "string") {
    return fallback;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

function asString(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim().length > 0 ? value : fallback;
}

function asPath(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function combatConfigFrom(args: Args, defaults: ArenaDefaults): CombatConfigInput {
  return {
    teamSize: Math.max(1, Math.floor(asNumber(args.teamSize, defaults.teamSize ?? 3))),
    maxSteps: Math.max(1, Math.floor(asNumber(args.maxSteps, defaults.maxSteps ?? 3000))),
    tickSeconds: asNumber(args.tickSeconds, defaults.tickSeconds ?? 0.1),
  };
}

async function main(): Promise<void> {
  const { cmd, args } = parseArgs(process.argv.slice(2));
  const defaults = loadArenaDefaults();
  if (cmd === "match") {
    runSingleMatch({
      redFamily: asString(args.red, "pursuit"),
      blueFamily: asString(args.blue, "pursuit"),
      redParamsPath: asPath(args.redParams),
      blueParamsPath: asPath(args.blueParams),
      seed: Math.floor(asNumber(args.seed, Date.now() % 1_000_000)),
      config: combatConfigFrom(args, defaults),
      verbose: args.verbose === true || args.verbose === "true",
      outPath: asPath(args.out),
    });
    return;
  }
  if (cmd === "evaluate") {
    await evaluateMatchup({
      candidate: { familyId: asString(args.candidate, "focus-fire"), params: {} },
      opponent: { familyId: asString(args.opponent, "pursuit"), params: {} },
      config: combatConfigFrom(args, defaults),
      seed0: Math.floor(asNumber(args.seed0, 100)),
      seeds: Math.max(1, Math.floor(asNumber(args.seeds, defaults.seeds ?? 8))),
      parallel: Math.max(1, Math.floor(asNumber(args.parallel, defaults.parallel ?? 4))),
      outPath: asPath(args.out),
    });
    return;
  }
  if (cmd === "replay") {
    const replayPath = asString(args.file, "");
    if (!replayPath) {
      throw new Error("replay requires --file <path>");
    }
    runReplay({ replayPath });
    return;
  }
  if (cmd === "serve") {
    await startGrpcServer(Math.floor(asNumber(args.port, defaults.port ?? 50061)));
    return;
  }
  // eslint-disable-next-line no-console
  console.log(
    [
      "skirmish arena cli",
      "",
      "Commands:",
      "  match --red squad --blue focus-fire --seed 123 --out match.json",
      "  match --redParams red.json --teamSize 2 --verbose",
      "  evaluate --candidate focus-fire --opponent pursuit --seeds 8 --parallel 4",
      "  replay --file match.json",
      "  serve --port 50061",
      "",
      "Pilot families: idle, pursuit, focus-fire, squad",
      "",
      "Common flags:",
      "  --teamSize 3 --maxSteps 3000 --tickSeconds 0.1",
      "",
      "Global defaults:",
      "  arena.config.json in the working directory (and/or env vars like SKIRMISH_TEAM_SIZE)",
    ].join("\n"),
  );
}

await main();
