import { drizzle } from "drizzle-orm/pg-proxy";
import { describe, expect, it, vi } from "vitest";
import { CredentialRepository } from "../src/repo/credential-repo";

function proxyDb(rows: unknown[][]) {
  const query = vi.fn(async (_sql: string, _params: unknown[], _method: string) => ({ rows }));
  return { db: drizzle(query), query };
}

describe("CredentialRepository", () => {
  it("reads the access token for the agent's email", async () => {
    const { db, query } = proxyDb([["test-token"]]);

    const token = await new CredentialRepository(db).getAccessToken("elizabeth@leasing.example.com");

    expect(token).toBe("test-token");
    expect(query).toHaveBeenCalledTimes(1);
    const [sql, params] = query.mock.calls[0]!;
    expect(sql).toContain('from "oauth_tokens"');
    expect(params[0]).toBe("elizabeth@leasing.example.com");
  });

  it("fails when no token is stored for the email", async () => {
    const { db } = proxyDb([]);

    await expect(new CredentialRepository(db).getAccessToken("nobody@leasing.example.com")).rejects.toThrow(
      "no token found for email: nobody@leasing.example.com"
    );
  });
});
