import { z } from "zod";
import type { PropertySearch } from "@showing-desk/domain";
import { requestJson } from "@showing-desk/shared";

const TIMEOUT_MS = 15_000;

const searchResponseSchema = z.object({
  count: z.number().optional(),
  results: z
    .array(
      z.object({
        property_id: z.union([z.string(), z.number()]).nullish(),
        metadata: z.record(z.string(), z.unknown()).nullish()
      })
    )
    .nullish()
});

function idFrom(value: unknown): string | null {
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number") return String(value);
  return null;
}

export class PropertySearchClient implements PropertySearch {
  constructor(private readonly url: string) {}

  async findPropertyId(query: string, signal?: AbortSignal): Promise<string> {
    const raw = await requestJson(
      this.url,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ Query: query, ExtractedProperty: query })
      },
      { service: "search service", timeoutMs: TIMEOUT_MS, signal }
    );

    const first = searchResponseSchema.parse(raw).results?.[0];
    if (!first) throw new Error(`no property found for query: ${query}`);

    // Unit-level hits carry the parent property id in metadata.
    const meta = first.metadata ?? {};
    const id =
      idFrom(meta.PropertyId) ??
      idFrom(meta.property_id) ??
      idFrom(first.property_id) ??
      idFrom(meta.Id) ??
      idFrom(meta.id);

    if (!id) throw new Error("property ID missing in search result");
    return id;
  }
}
