import type { AddressCandidate } from "@showing-desk/shared";
import type { AgentRecord } from "../agents/agent-resolver";
import type { Availability, TimeInterval } from "../availability/types";

export type PropertyRecord = {
  id: string;
  name: string;
  address: string;
  city: string;
  state: string;
  groupIds: string[];
};

export type PropertyInfo = Omit<PropertyRecord, "groupIds">;

export type PropertyGroup = {
  id: string;
  name: string;
};

export interface PropertySearch {
  findPropertyId(query: string, signal?: AbortSignal): Promise<string>;
}

export interface PropertyDirectory {
  getProperty(propertyId: string, signal?: AbortSignal): Promise<PropertyRecord>;
  getPropertyGroups(groupIds: readonly string[], signal?: AbortSignal): Promise<PropertyGroup[]>;
}

export interface CredentialStore {
  getAccessToken(email: string, signal?: AbortSignal): Promise<string>;
}

export type BusyQuery = {
  accessToken: string;
  calendarId: string;
  timeMin: Date;
  timeMax: Date;
  timezone: string;
};

export interface BusyCalendar {
  getBusyIntervals(query: BusyQuery, signal?: AbortSignal): Promise<TimeInterval[]>;
}

export interface AddressMatcher {
  /** Property id of the best candidate, or null when none matches. */
  pickBestCandidate(query: string, candidates: readonly AddressCandidate[], signal?: AbortSignal): Promise<string | null>;
}

export type ShowingQuery = {
  query: string;
  phone?: string;
  /** Already resolved upstream (e.g. by candidate matching); skips search. */
  propertyId?: string;
  candidates?: readonly AddressCandidate[];
};

export type PipelineFailureReason =
  | "property_not_found"
  | "property_details_unavailable"
  | "agent_lookup_failed"
  | "agent_unmapped"
  | "calendar_access_unavailable"
  | "calendar_read_failed";

export type PipelineSuccess = {
  success: true;
  status: string;
  property: PropertyInfo;
  agent: AgentRecord;
  availability: Availability;
  formattedMessage: string;
};

export type PipelineFailure = {
  success: false;
  reason: PipelineFailureReason;
  status: string;
  property: PropertyInfo | null;
  agent: AgentRecord | null;
  formattedMessage: string;
};

export type PipelineResult = PipelineSuccess | PipelineFailure;

export type ShowingResponse = {
  success: boolean;
  reason: PipelineFailureReason | null;
  property: PropertyInfo | null;
  agent: AgentRecord | null;
  availability: {
    totalSlotsAvailable: number;
    daysChecked: number;
    slots: Array<{ date: string; time: string; start: string; end: string }>;
  };
  message: string;
  formattedMessage: string;
};
