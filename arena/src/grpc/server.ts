import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { existsSync } from "node:fs";
import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import { CombatConfigError } from "../../../packages/skirmish-core/src/config/combat-config.ts";
import { isRecord } from "../config/combat-config-input.ts";
import { EpisodeSessionManager } from "./session-manager.ts";
import type { EpisodeResponse, SnapshotResponse } from "./session-manager.ts";

type RequestMessage = Record<string, unknown>;
type Unary<TResponse> = grpc.handleUnaryCall<RequestMessage, TResponse>;

function asString(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

function asInt(value: unknown, fallback: number): number {
  const n = Number(value);
  return Number.isInteger(n) ? n : fallback;
}

export function toServiceError(err: unknown): grpc.ServiceError {
  const message = err instanceof Error ? err.message : String(err);
  let code = grpc.status.INTERNAL;
  if (err instanceof CombatConfigError) {
    code = grpc.status.INVALID_ARGUMENT;
  } else if (message.startsWith("episode not found")) {
    code = grpc.status.NOT_FOUND;
  }
  return {
    name: err instanceof Error ? err.name : "Error",
    message,
    code,
    details: message,
    metadata: new grpc.Metadata(),
  };
}

function respond<TResponse>(callback: grpc.sendUnaryData<TResponse>, work: () => TResponse): void {
  let response: TResponse;
  try {
    response = work();
  } catch (err) {
    callback(toServiceError(err), null);
    return;
  }
  callback(null, response);
}

export function createService(manager: EpisodeSessionManager): grpc.UntypedServiceImplementation {
  const createEpisode: Unary<EpisodeResponse> = (call, callback) => {
    respond(callback, () => manager.createEpisode(asString(call.request.config_json, "{}")));
  };
  const resetEpisode: Unary<EpisodeResponse> = (call, callback) => {
    const episodeId = asString(call.request.episode_id);
    const seed = call.request.reseed === true ? asInt(call.request.seed, 0) : undefined;
    respond(callback, () => manager.resetEpisode(episodeId, seed));
  };
  const stepEpisode: Unary<EpisodeResponse> = (call, callback) => {
    const episodeId = asString(call.request.episode_id);
    const actions = Array.isArray(call.request.actions) ? call.request.actions.filter(isRecord) : [];
    respond(callback, () => manager.stepEpisode(episodeId, actions));
  };
  const getSnapshot: Unary<SnapshotResponse> = (call, callback) => {
    respond(callback, () => manager.getSnapshot(asString(call.request.episode_id)));
  };
  const closeEpisode: Unary<{ ok: boolean; error: string }> = (call, callback) => {
    const episodeId = asString(call.request.episode_id);
    const ok = manager.closeEpisode(episodeId);
    callback(null, ok ? { ok: true, error: "" } : { ok: false, error: `episode not found: ${episodeId}` });
  };
  return {
    CreateEpisode: createEpisode,
    ResetEpisode: resetEpisode,
    StepEpisode: stepEpisode,
    GetSnapshot: getSnapshot,
    CloseEpisode: closeEpisode,
  };
}

function isNamespace(value: unknown): value is grpc.GrpcObject {
  return typeof value === "object" && value !== null && !("format" in value);
}

function isServiceConstructor(value: unknown): value is grpc.ServiceClientConstructor {
  return typeof value === "function" && "service" in value;
}

export function resolveProtoPath(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const protoFromRepoSource = resolve(here, "..", "..", "..", "proto", "skirmish_service.proto");
  const protoFromCwd = resolve(process.cwd(), "proto", "skirmish_service.proto");
  return existsSync(protoFromCwd) ? protoFromCwd : protoFromRepoSource;
}

export function loadServiceDefinition(protoPath = resolveProtoPath()): grpc.ServiceDefinition {
  const packageDef = protoLoader.loadSync(protoPath, {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
  });
  const loaded = grpc.loadPackageDefinition(packageDef);
  const root = loaded.skirmish;
  const v1 = isNamespace(root) ? root.v1 : undefined;
  const service = isNamespace(v1) ? v1.SkirmishService : undefined;
  if (!isServiceConstructor(service)) {
    throw new Error(`skirmish.v1.SkirmishService missing from ${protoPath}`);
  }
  return service.service;
}

export async function startGrpcServer(port: number): Promise<grpc.Server> {
  const manager = new EpisodeSessionManager();
  const server = new grpc.Server();
  server.addService(loadServiceDefinition(), createService(manager));

  await new Promise<void>((resolveBind, rejectBind) => {
    server.bindAsync(`0.0.0.0:${port}`, grpc.ServerCredentials.createInsecure(), (err) => {
      if (err) {
        rejectBind(err);
        return;
      }
      resolveBind();
    });
  });
  // eslint-disable-next-line no-console
  console.log(`[skirmish grpc] listening on 0.0.0.0:${port}`);
  return server;
}
