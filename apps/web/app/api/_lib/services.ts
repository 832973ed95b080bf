import { OpenAIAddressMatcher } from "@showing-desk/agent";
import { createDbClient } from "@showing-desk/db";
import {
  AgentResolver,
  CredentialRepository,
  DEFAULT_ZONE_AGENTS,
  ShowingAvailabilityService,
  createZoneAgentTable,
  parseZoneAgents
} from "@showing-desk/domain";
import { AppFolioClient, GoogleCalendarClient, PropertySearchClient } from "@showing-desk/integrations";
import { createLogger, loadConfig, TokenBucketRateLimiter } from "@showing-desk/shared";

export const logger = createLogger({ level: process.env.LOG_LEVEL ?? "info", service: "showing-desk-web" });

let showingService: ShowingAvailabilityService | null = null;

// Built on first use so a missing variable becomes a 500 response, not a crashed import.
export function getShowingService(): ShowingAvailabilityService {
  if (showingService) return showingService;

  const config = loadConfig();
  const agents = config.zoneAgentsJson ? parseZoneAgents(config.zoneAgentsJson) : DEFAULT_ZONE_AGENTS;

  showingService = new ShowingAvailabilityService({
    search: new PropertySearchClient(config.searchServiceUrl),
    properties: new AppFolioClient(config.appfolio),
    credentials: new CredentialRepository(createDbClient(config.databaseUrl)),
    calendar: new GoogleCalendarClient(),
    agents: new AgentResolver(createZoneAgentTable(agents)),
    matcher: config.openai.apiKey
      ? new OpenAIAddressMatcher({ apiKey: config.openai.apiKey, model: config.openai.model })
      : null,
    matcherLimiter: new TokenBucketRateLimiter({
      capacity: config.openai.burst,
      refillPerMinute: config.openai.requestsPerMinute
    }),
    timezone: config.timezone,
    logger
  });
  return showingService;
}
