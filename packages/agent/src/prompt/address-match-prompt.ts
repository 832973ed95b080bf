import type { AddressCandidate } from "@showing-desk/shared";

export function buildAddressMatchPrompt(query: string, candidates: readonly AddressCandidate[]): string {
  const addressList = candidates.map((c, i) => `${i}. ${c.address}\n`).join("");

  return `Given the user's spoken query about a property address, find the best matching address from the list.

User Query: "${query}"

Available Addresses:
${addressList}Return ONLY the index number (0, 1, 2, etc.) of the best matching address. If no address matches at all, return -1.

Important: The query may contain spoken numbers (like "eight twenty eight" for "828") or slight variations. Match based on the most likely intended address.`;
}
