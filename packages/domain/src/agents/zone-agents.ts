import type { AgentRecord } from "./agent-resolver";

export const DEFAULT_ZONE_AGENTS: readonly AgentRecord[] = [
  { id: "59a26c67-5791-11f0-b6c3-02094d1ce055", name: "Gracie", email: "gracie@leasing.example.com", zone: "PD1" },
  { id: "dcb80b8a-66bd-11ee-b6c3-02094d1ce055", name: "Elizabeth", email: "elizabeth@leasing.example.com", zone: "PD2" },
  { id: "4d6b75fd-5791-11f0-b6c3-02094d1ce055", name: "Alexandra", email: "alexandra@leasing.example.com", zone: "PD3" },
  { id: "4b8f5454-ef30-11ef-b6c3-02094d1ce055", name: "Brandi", email: "brandi@leasing.example.com", zone: "PD4" }
];
