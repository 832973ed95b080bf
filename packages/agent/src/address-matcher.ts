import OpenAI from "openai";
import type { AddressMatcher } from "@showing-desk/domain";
import type { AddressCandidate } from "@showing-desk/shared";
import { buildAddressMatchPrompt } from "./prompt/address-match-prompt";

const TIMEOUT_MS = 30_000;

/**
 * Reads the leading integer of a model reply ("2", " 2.", "-1"). Returns
 * the candidate's property id, or null for -1 and out-of-range indexes.
 */
export function parseCandidateIndex(reply: string, candidates: readonly AddressCandidate[]): string | null {
  const match = /^\s*(-?\d+)/.exec(reply);
  if (!match?.[1]) {
    throw new Error(`failed to parse matcher response: ${reply}`);
  }
  const index = Number(match[1]);
  return candidates[index]?.propertyId ?? null;
}

export type OpenAIAddressMatcherOptions = {
  apiKey: string;
  model: string;
  client?: OpenAI;
};

export class OpenAIAddressMatcher implements AddressMatcher {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIAddressMatcherOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async pickBestCandidate(query: string, candidates: readonly AddressCandidate[], signal?: AbortSignal): Promise<string | null> {
    if (candidates.length === 0) throw new Error("no address candidates provided");

    const response = await this.client.responses.create(
      {
        model: this.options.model,
        input: [{ role: "user", content: buildAddressMatchPrompt(query, candidates) }],
        temperature: 0,
        max_output_tokens: 16
      },
      { timeout: TIMEOUT_MS, ...(signal ? { signal } : {}) }
    );

    return parseCandidateIndex(response.output_text, candidates);
  }
}
