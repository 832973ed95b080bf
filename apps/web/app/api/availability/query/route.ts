import { randomUUID } from "node:crypto";
import { NextResponse } from "next/server";
import { handleShowingRequest } from "../../_lib/handler";
import { getShowingService, logger } from "../../_lib/services";

export const runtime = "nodejs";

export async function POST(req: Request) {
  const raw = await req.text();
  const result = await handleShowingRequest(raw, {
    requestId: req.headers.get("x-request-id") ?? randomUUID(),
    logger,
    getService: getShowingService,
    signal: req.signal
  });
  return NextResponse.json(result.body, { status: result.status });
}
