import { describe, expect, it, vi } from "vitest";
import {
  AgentResolver,
  createZoneAgentTable,
  DEFAULT_ZONE_AGENTS,
  parseZoneAgents,
  ShowingAvailabilityService
} from "@showing-desk/domain";
import { ConfigError, createLogger } from "@showing-desk/shared";
import { handleShowingRequest } from "./handler";

const logger = createLogger({ silent: true });

function buildService() {
  const search = { findPropertyId: vi.fn(async (_query: string) => "p-828") };
  const service = new ShowingAvailabilityService({
    search,
    properties: {
      getProperty: async () => ({
        id: "p-828",
        name: "Elm Court",
        address: "828 Elm St",
        city: "Portland",
        state: "OR",
        groupIds: ["g-2"]
      }),
      getPropertyGroups: async () => [{ id: "g-2", name: "PD2" }]
    },
    credentials: { getAccessToken: async () => "test-token" },
    calendar: { getBusyIntervals: async () => [] },
    agents: new AgentResolver(createZoneAgentTable(DEFAULT_ZONE_AGENTS)),
    matcherLimiter: { acquire: async () => undefined },
    logger,
    now: () => new Date("2026-02-02T16:00:00.000Z")
  });
  return { service, search };
}

describe("handleShowingRequest", () => {
  it("returns the showing response for a direct invocation", async () => {
    const { service, search } = buildService();

    const result = await handleShowingRequest(JSON.stringify({ Query: "828 Elm St" }), {
      requestId: "req-1",
      logger,
      getService: () => service
    });

    expect(result.status).toBe(200);
    expect(search.findPropertyId).toHaveBeenCalledWith("828 Elm St", undefined);
    if (!("success" in result.body)) throw new Error("expected a showing response");
    expect(result.body.success).toBe(true);
    expect(result.body.message).toBe("Success");
    expect(result.body.agent?.name).toBe("Elizabeth");
    expect(result.body.availability.totalSlotsAvailable).toBe(75);
  });

  it("rejects unparseable payloads and missing queries with 400", async () => {
    const { service } = buildService();
    const ctx = { requestId: "req-2", logger, getService: () => service };

    expect(await handleShowingRequest("not json", ctx)).toEqual({ status: 400, body: { error: "Invalid event format" } });
    expect(await handleShowingRequest(JSON.stringify({ Phone: "+15550001111" }), ctx)).toEqual({
      status: 400,
      body: { error: "Query is required" }
    });
  });

  it("reports missing configuration as a 500", async () => {
    const result = await handleShowingRequest(JSON.stringify({ Query: "828 Elm St" }), {
      requestId: "req-3",
      logger,
      getService: () => {
        throw new ConfigError(["DATABASE_URL"]);
      }
    });

    expect(result).toEqual({ status: 500, body: { error: "Missing configuration" } });
  });

  it("maps malformed zone agent configuration to the configuration error response", async () => {
    const result = await handleShowingRequest(JSON.stringify({ Query: "828 Elm St" }), {
      requestId: "req-4",
      logger,
      getService: () => {
        parseZoneAgents("not json");
        return buildService().service;
      }
    });

    expect(result).toEqual({ status: 500, body: { error: "Missing configuration" } });
  });
});
