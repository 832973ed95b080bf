import { z } from "zod";
import { ConfigError } from "@showing-desk/shared";

export type AgentRecord = {
  id: string;
  name: string;
  email: string;
  zone: string;
  zoneGroup?: string;
};

export type ZoneAgentTable = ReadonlyMap<string, Readonly<AgentRecord>>;

export function normalizeZone(label: string): string {
  return label.trim().toUpperCase();
}

export function createZoneAgentTable(agents: readonly AgentRecord[]): ZoneAgentTable {
  const table = new Map<string, Readonly<AgentRecord>>();
  for (const agent of agents) {
    table.set(normalizeZone(agent.zone), Object.freeze({ ...agent }));
  }
  return table;
}

const agentListSchema = z.array(
  z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    email: z.string().email(),
    zone: z.string().min(1)
  })
);

/** Parses `ZONE_AGENTS_JSON`; anything malformed is a configuration error. */
export function parseZoneAgents(json: string): AgentRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new ConfigError(["ZONE_AGENTS_JSON"]);
  }

  const parsed = agentListSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(["ZONE_AGENTS_JSON"]);
  return parsed.data;
}

/**
 * Maps AppFolio property-group labels (e.g. "pd2 ") to the leasing agent
 * covering that zone. The first label with a match wins.
 */
export class AgentResolver {
  constructor(private readonly table: ZoneAgentTable) {}

  resolve(groups: readonly string[]): AgentRecord | null {
    for (const group of groups) {
      const agent = this.table.get(normalizeZone(group));
      if (agent) {
        return { ...agent, zoneGroup: group };
      }
    }
    return null;
  }
}
