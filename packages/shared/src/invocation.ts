import { z } from "zod";
import { InvalidRequestError } from "./errors";

export const showingRequestSchema = z.object({
  Query: z.string().optional(),
  Phone: z.string().optional()
});

const toolArgumentsSchema = z.preprocess(
  (value) => {
    if (typeof value !== "string") return value;
    try {
      return JSON.parse(value);
    } catch {
      return {};
    }
  },
  z
    .object({
      Query: z.string().optional(),
      Phone: z.string().optional(),
      ExtractedProperty: z.string().optional()
    })
    .passthrough()
);

const propertyResultSchema = z
  .object({
    id: z.string().optional(),
    property_id: z.string().optional(),
    metadata: z
      .object({
        Address1: z.string().optional(),
        PropertyId: z.string().optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

const toolCallResultSchema = z.object({
  count: z.number().optional(),
  results: z.array(propertyResultSchema)
});

export const vapiToolCallsPayloadSchema = z.object({
  message: z.object({
    type: z.literal("tool-calls"),
    toolCalls: z
      .array(
        z.object({
          id: z.string().optional(),
          function: z.object({ name: z.string().optional(), arguments: toolArgumentsSchema })
        })
      )
      .default([]),
    artifact: z
      .object({
        messages: z
          .array(z.object({ role: z.string(), result: z.unknown().optional() }).passthrough())
          .default([])
      })
      .optional()
  })
});

export type VapiToolCallsPayload = z.infer<typeof vapiToolCallsPayloadSchema>;

export type AddressCandidate = {
  index: number;
  address: string;
  propertyId: string;
};

export type InvocationSource = "vapi_tool_calls" | "api_gateway" | "direct_invocation";

export type ParsedInvocation = {
  source: InvocationSource;
  query: string;
  phone?: string;
  candidates: AddressCandidate[];
};

/**
 * Address candidates a previous search tool call already returned in the
 * same conversation. String results (plain tool output) are ignored.
 */
export function collectAddressCandidates(payload: VapiToolCallsPayload): AddressCandidate[] {
  const candidates: AddressCandidate[] = [];
  for (const msg of payload.message.artifact?.messages ?? []) {
    if (msg.role !== "tool_call_result" || msg.result === undefined) continue;
    const parsed = toolCallResultSchema.safeParse(msg.result);
    if (!parsed.success) continue;

    parsed.data.results.forEach((result, index) => {
      const address = result.metadata?.Address1 ?? "";
      const propertyId = result.metadata?.PropertyId ?? "";
      if (address && propertyId) {
        candidates.push({ index, address, propertyId });
      }
    });
  }
  return candidates;
}

function parseBody(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidRequestError("Invalid JSON in body");
  }
}

function finish(source: InvocationSource, query: string | undefined, phone: string | undefined, candidates: AddressCandidate[]) {
  const trimmed = query?.trim() ?? "";
  if (!trimmed) throw new InvalidRequestError("Query is required");
  const invocation: ParsedInvocation = { source, query: trimmed, candidates };
  if (phone) invocation.phone = phone;
  return invocation;
}

export function parseInvocation(payload: unknown): ParsedInvocation {
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    throw new InvalidRequestError("Invalid event format");
  }

  let source: InvocationSource = "direct_invocation";
  let body: unknown = payload;
  const envelope = z.object({ body: z.string().min(1) }).safeParse(payload);
  if (envelope.success) {
    source = "api_gateway";
    body = parseBody(envelope.data.body);
  }

  const vapi = vapiToolCallsPayloadSchema.safeParse(body);
  if (vapi.success) {
    const args = vapi.data.message.toolCalls[0]?.function.arguments;
    return finish("vapi_tool_calls", args?.Query, args?.Phone, collectAddressCandidates(vapi.data));
  }

  const direct = showingRequestSchema.safeParse(body);
  if (!direct.success) throw new InvalidRequestError("Invalid request format");
  return finish(source, direct.data.Query, direct.data.Phone, []);
}
