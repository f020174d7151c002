import { parentPort } from "node:worker_threads";
import { readMatchSpec } from "../match/match-spec.ts";
import { runMatch } from "../match/run-match.ts";

type WorkerRequest = { id: string; payload: unknown };

if (!parentPort) {
  throw new Error("match-worker requires parentPort");
}

parentPort.on("message", (msg: WorkerRequest) => {
  try {
    const result = runMatch(readMatchSpec(msg.payload));
    parentPort?.postMessage({ id: msg.id, ok: true, result });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    parentPort?.postMessage({ id: msg.id, ok: false, error: message });
  }
});
