import type { ShowingAvailabilityService, ShowingResponse } from "@showing-desk/domain";
import { toShowingResponse } from "@showing-desk/domain";
import {
  ConfigError,
  describeError,
  InvalidRequestError,
  parseInvocation,
  withRequestContext,
  type Logger
} from "@showing-desk/shared";

export type HandlerResult = {
  status: number;
  body: ShowingResponse | { error: string };
};

export type HandlerContext = {
  requestId: string;
  logger: Logger;
  getService: () => ShowingAvailabilityService;
  signal?: AbortSignal;
};

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidRequestError("Invalid event format");
  }
}

export async function handleShowingRequest(raw: string, ctx: HandlerContext): Promise<HandlerResult> {
  const startedAt = Date.now();
  const log = withRequestContext(ctx.logger, ctx.requestId);
  log.info("scheduling_service_invoked", { event_size: raw.length });

  try {
    const service = ctx.getService();
    const invocation = parseInvocation(parseJson(raw));
    log.info("request_parsed", { source: invocation.source, query: invocation.query });

    const result = await service.getAvailability(
      {
        query: invocation.query,
        candidates: invocation.candidates,
        ...(invocation.phone ? { phone: invocation.phone } : {})
      },
      ctx.signal,
      log
    );
    return { status: 200, body: toShowingResponse(result) };
  } catch (error) {
    if (error instanceof InvalidRequestError) {
      log.warn("request_rejected", { error: error.message });
      return { status: 400, body: { error: error.message } };
    }
    if (error instanceof ConfigError) {
      log.error("missing_env_vars", { keys: error.keys });
      return { status: 500, body: { error: "Missing configuration" } };
    }
    log.error("invocation_failed", { error: describeError(error) });
    return { status: 500, body: { error: "Internal error" } };
  } finally {
    log.info("invocation_complete", { duration_ms: Date.now() - startedAt });
  }
}
