import { afterEach, describe, expect, it, vi } from "vitest";
import { AppFolioClient } from "./client";

const client = new AppFolioClient({
  baseUrl: "https://appfolio.test",
  authHeader: "Basic test-secret",
  developerId: "dev-1"
});

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(JSON.stringify(body), { status }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("AppFolioClient", () => {
  it("fetches a property by id with developer headers", async () => {
    const fetchMock = stubFetch(200, {
      data: [
        {
          Id: "p-828",
          Name: "Elm Court",
          Address1: "828 Elm St",
          City: "Portland",
          State: "OR",
          PropertyGroupIds: ["g-1", "g-2"]
        }
      ]
    });

    const property = await client.getProperty("p-828");

    expect(property).toEqual({
      id: "p-828",
      name: "Elm Court",
      address: "828 Elm St",
      city: "Portland",
      state: "OR",
      groupIds: ["g-1", "g-2"]
    });
    const [url, init] = fetchMock.mock.calls[0]!;
    expect(url).toBe("https://appfolio.test/api/v0/properties?filters[Id]=p-828");
    expect(init?.headers).toEqual({ Authorization: "Basic test-secret", "X-AppFolio-Developer-ID": "dev-1" });
  });

  it("reads null text fields as empty strings", async () => {
    stubFetch(200, {
      data: [{ Id: 828, Name: null, Address1: "828 Elm St", City: null, State: "OR", PropertyGroupIds: null }]
    });

    expect(await client.getProperty("828")).toEqual({
      id: "828",
      name: "",
      address: "828 Elm St",
      city: "",
      state: "OR",
      groupIds: []
    });
  });

  it("fails when the property is unknown", async () => {
    stubFetch(200, { data: [] });
    await expect(client.getProperty("p-404")).rejects.toThrow("property not found: p-404");
  });

  it("surfaces non-2xx responses", async () => {
    stubFetch(503, { error: "unavailable" });
    await expect(client.getProperty("p-828")).rejects.toThrow(/AppFolio \(Property\) API error: 503/);
  });

  it("loads groups for a comma-separated id filter", async () => {
    const fetchMock = stubFetch(200, { data: [{ Id: "g-1", Name: "Downtown" }, { Id: "g-2", Name: "PD2" }] });

    const groups = await client.getPropertyGroups(["g-1", "g-2"]);

    expect(groups).toEqual([
      { id: "g-1", name: "Downtown" },
      { id: "g-2", name: "PD2" }
    ]);
    expect(fetchMock.mock.calls[0]![0]).toBe("https://appfolio.test/api/v0/property_groups?filters[Id]=g-1,g-2");
  });

  it("keeps groups whose name is null", async () => {
    stubFetch(200, { data: [{ Id: "g-3", Name: null }] });
    expect(await client.getPropertyGroups(["g-3"])).toEqual([{ id: "g-3", name: "" }]);
  });

  it("skips the request when the property has no groups", async () => {
    const fetchMock = stubFetch(200, { data: [] });
    expect(await client.getPropertyGroups([])).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
