import { DateTime } from "luxon";
import { describeError, InvalidRequestError, type Logger, type RateLimiter } from "@showing-desk/shared";
import type { AgentRecord, AgentResolver } from "../agents/agent-resolver";
import { generateShowingSlots, resolveTimezone } from "../availability/slot-generation";
import type { Availability, TimeInterval } from "../availability/types";
import { formatShowingMessage } from "../messages/format-message";
import { MAX_RETURNED_SLOTS, SHOWING_TIMEZONE, WINDOW_DAYS } from "../policies/rules";
import { pipelineFailure, toPropertyInfo, type PipelineStage, type StageOutcome } from "../pipeline/outcomes";
import type {
  AddressMatcher,
  BusyCalendar,
  CredentialStore,
  PipelineFailure,
  PipelineResult,
  PropertyDirectory,
  PropertyInfo,
  PropertyRecord,
  PropertySearch,
  ShowingQuery
} from "../pipeline/types";

export type ShowingAvailabilityDeps = {
  search: PropertySearch;
  properties: PropertyDirectory;
  credentials: CredentialStore;
  calendar: BusyCalendar;
  agents: AgentResolver;
  logger: Logger;
  /** Shared across invocations; gates the matcher only. */
  matcherLimiter: RateLimiter;
  matcher?: AddressMatcher | null;
  timezone?: string;
  now?: () => Date;
};

export class ShowingAvailabilityService {
  private readonly timezone: string;
  private readonly now: () => Date;

  constructor(private readonly deps: ShowingAvailabilityDeps) {
    this.timezone = resolveTimezone(deps.timezone ?? SHOWING_TIMEZONE, deps.logger);
    this.now = deps.now ?? (() => new Date());
  }

  async getAvailability(input: ShowingQuery, signal?: AbortSignal, logger = this.deps.logger): Promise<PipelineResult> {
    const query = input.query.trim();
    if (!query) throw new InvalidRequestError("Query is required");

    const preResolvedId = input.propertyId ?? (await this.matchCandidate(query, input, signal, logger));

    const propertyId = await this.stage(
      "RESOLVE_PROPERTY_ID",
      logger,
      async () => preResolvedId ?? this.deps.search.findPropertyId(query, signal),
      () => pipelineFailure("property_not_found", { query })
    );
    if (!propertyId.ok) return propertyId.result;
    logger.info("property_found", {
      property_id: propertyId.value,
      source: preResolvedId ? "pre_resolved" : "search"
    });

    const record = await this.stage(
      "FETCH_PROPERTY_DETAILS",
      logger,
      () => this.deps.properties.getProperty(propertyId.value, signal),
      () => pipelineFailure("property_details_unavailable", { query })
    );
    if (!record.ok) return record.result;
    const property = toPropertyInfo(record.value);

    const agent = await this.resolveAgent(query, record.value, property, signal, logger);
    if (!agent.ok) return agent.result;
    logger.info("agent_mapped", { name: agent.value.name, email: agent.value.email, zone: agent.value.zone });

    const token = await this.stage(
      "FETCH_CALENDAR_CREDENTIAL",
      logger,
      () => this.deps.credentials.getAccessToken(agent.value.email, signal),
      () => pipelineFailure("calendar_access_unavailable", { query, property, agent: agent.value })
    );
    if (!token.ok) return token.result;

    const now = this.now();
    const windowEnd = DateTime.fromJSDate(now, { zone: this.timezone }).plus({ days: WINDOW_DAYS }).toJSDate();
    const busy = await this.stage<TimeInterval[]>(
      "FETCH_BUSY_INTERVALS",
      logger,
      () =>
        this.deps.calendar.getBusyIntervals(
          { accessToken: token.value, calendarId: agent.value.email, timeMin: now, timeMax: windowEnd, timezone: this.timezone },
          signal
        ),
      () => pipelineFailure("calendar_read_failed", { query, property, agent: agent.value })
    );
    if (!busy.ok) return busy.result;

    const generated = generateShowingSlots(busy.value, now, { timezone: this.timezone, logger });
    const availability: Availability = {
      totalSlotsAvailable: generated.freeSlots.length,
      daysChecked: generated.daysChecked,
      slots: generated.freeSlots.slice(0, MAX_RETURNED_SLOTS)
    };

    logger.info("scheduling_success", {
      property_id: property.id,
      agent: agent.value.name,
      slots_available: availability.totalSlotsAvailable,
      candidate_slots: generated.totalSlots,
      days_checked: availability.daysChecked
    });

    return {
      success: true,
      status: "Success",
      property,
      agent: agent.value,
      availability,
      formattedMessage: formatShowingMessage(property, agent.value, availability)
    };
  }

  private async resolveAgent(
    query: string,
    record: PropertyRecord,
    property: PropertyInfo,
    signal: AbortSignal | undefined,
    logger: Logger
  ): Promise<StageOutcome<AgentRecord>> {
    const groups = await this.stage(
      "FETCH_PROPERTY_GROUPS",
      logger,
      () => this.deps.properties.getPropertyGroups(record.groupIds, signal),
      () => pipelineFailure("agent_lookup_failed", { query, property })
    );
    if (!groups.ok) return groups;

    const agent = this.deps.agents.resolve(groups.value.map((g) => g.name));
    if (!agent) {
      logger.warn("agent_mapping_failed", { property_id: property.id, groups: groups.value.map((g) => g.name) });
      return { ok: false, result: pipelineFailure("agent_unmapped", { query, property }) };
    }
    return { ok: true, value: agent };
  }

  /**
   * Best effort: any limiter, transport or parse failure falls back to search.
   */
  private async matchCandidate(
    query: string,
    input: ShowingQuery,
    signal: AbortSignal | undefined,
    logger: Logger
  ): Promise<string | null> {
    const candidates = input.candidates ?? [];
    const matcher = this.deps.matcher;
    if (candidates.length === 0 || !matcher) return null;

    logger.info("candidate_matching_started", { candidate_count: candidates.length });
    try {
      await this.deps.matcherLimiter.acquire(signal);
      const matched = await matcher.pickBestCandidate(query, candidates, signal);
      if (!matched) {
        logger.warn("candidate_matching_no_match", { candidate_count: candidates.length });
        return null;
      }
      logger.info("candidate_matching_succeeded", { property_id: matched });
      return matched;
    } catch (error) {
      logger.warn("candidate_matching_failed", { error: describeError(error) });
      return null;
    }
  }

  private async stage<T>(
    name: PipelineStage,
    logger: Logger,
    run: () => Promise<T>,
    fail: () => PipelineFailure
  ): Promise<StageOutcome<T>> {
    try {
      return { ok: true, value: await run() };
    } catch (error) {
      const result = fail();
      logger.error(`${name.toLowerCase()}_failed`, { error: describeError(error), reason: result.reason });
      return { ok: false, result };
    }
  }
}
