import type { AgentRecord } from "../agents/agent-resolver";
import type { PipelineFailure, PipelineFailureReason, PipelineResult, PropertyInfo, PropertyRecord, ShowingResponse } from "./types";

export type PipelineStage =
  | "RESOLVE_PROPERTY_ID"
  | "FETCH_PROPERTY_DETAILS"
  | "FETCH_PROPERTY_GROUPS"
  | "MAP_AGENT"
  | "FETCH_CALENDAR_CREDENTIAL"
  | "FETCH_BUSY_INTERVALS"
  | "GENERATE_AVAILABILITY"
  | "FORMAT_MESSAGE"
  | "SUCCESS";

export type StageOutcome<T> = { ok: true; value: T } | { ok: false; result: PipelineFailure };

type FailureContext = {
  query: string;
  property?: PropertyInfo;
  agent?: AgentRecord;
};

export function toPropertyInfo(record: PropertyRecord): PropertyInfo {
  return {
    id: record.id,
    name: record.name,
    address: record.address,
    city: record.city,
    state: record.state
  };
}

function describeFailure(reason: PipelineFailureReason, ctx: FailureContext): { status: string; formattedMessage: string } {
  const address = ctx.property?.address ?? "this property";
  const agentName = ctx.agent?.name ?? "the agent";
  const agentEmail = ctx.agent?.email ?? "";

  switch (reason) {
    case "property_not_found":
      return {
        status: "Could not find property matching query.",
        formattedMessage: `I couldn't find a property matching '${ctx.query}'. Could you verify the address?`
      };
    case "property_details_unavailable":
      return {
        status: "Property found but details unavailable.",
        formattedMessage: "I found the property but couldn't access its details right now."
      };
    case "agent_lookup_failed":
      return {
        status: "Could not determine agent.",
        formattedMessage: `I have the details for ${address}, but I'm having trouble finding the assigned agent.`
      };
    case "agent_unmapped":
      return {
        status: "No leasing agent assigned (No PD group).",
        formattedMessage: `I checked ${address}, but there doesn't seem to be a leasing agent assigned to it yet.`
      };
    case "calendar_access_unavailable":
      return {
        status: "Agent calendar access unavailable.",
        formattedMessage: `I'd love to schedule a viewing for ${address}, but I can't access ${agentName}'s calendar right now. Please email them at ${agentEmail}.`
      };
    case "calendar_read_failed":
      return {
        status: "Failed to read calendar.",
        formattedMessage: `I'm having trouble checking ${agentName}'s availability. Please contact them directly at ${agentEmail}.`
      };
  }
}

export function pipelineFailure(reason: PipelineFailureReason, ctx: FailureContext): PipelineFailure {
  return {
    success: false,
    reason,
    ...describeFailure(reason, ctx),
    property: ctx.property ?? null,
    agent: ctx.agent ?? null
  };
}

export function toShowingResponse(result: PipelineResult): ShowingResponse {
  const availability = result.success
    ? {
        totalSlotsAvailable: result.availability.totalSlotsAvailable,
        daysChecked: result.availability.daysChecked,
        slots: result.availability.slots.map((s) => ({
          date: s.date,
          time: s.time,
          start: s.start.toISOString(),
          end: s.end.toISOString()
        }))
      }
    : { totalSlotsAvailable: 0, daysChecked: 0, slots: [] };

  return {
    success: result.success,
    reason: result.success ? null : result.reason,
    property: result.property,
    agent: result.agent,
    availability,
    message: result.status,
    formattedMessage: result.formattedMessage
  };
}
