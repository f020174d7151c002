import { fileURLToPath } from "node:url";
import * as grpc from "@grpc/grpc-js";
import { describe, expect, it } from "vitest";
import { loadServiceDefinition, toServiceError } from "../src/grpc/server.ts";
import { CombatConfigError } from "../../packages/skirmish-core/src/config/combat-config.ts";

const PROTO_PATH = fileURLToPath(new URL("../../proto/skirmish_service.proto", import.meta.url));

describe("grpc service", () => {
  it("loads every method from the proto", () => {
    const definition = loadServiceDefinition(PROTO_PATH);
    expect(Object.keys(definition).sort()).toEqual(["CloseEpisode", "CreateEpisode", "GetSnapshot", "ResetEpisode", "StepEpisode"]);
    expect(definition.StepEpisode?.path).toBe("/skirmish.v1.SkirmishService/StepEpisode");
  });

  it("maps failures to status codes", () => {
    const invalid = toServiceError(new CombatConfigError(["teamSize must be a positive integer (got 0)"]));
    expect(invalid.code).toBe(grpc.status.INVALID_ARGUMENT);
    expect(invalid.details).toBe("Invalid combat config: teamSize must be a positive integer (got 0)");

    expect(toServiceError(new Error("episode not found: ep_1")).code).toBe(grpc.status.NOT_FOUND);

    const internal = toServiceError("boom");
    expect(internal.code).toBe(grpc.status.INTERNAL);
    expect(internal.message).toBe("boom");
    expect(internal.name).toBe("Error");
  });
});
