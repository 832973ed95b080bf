import { eq } from "drizzle-orm";
import { oauthTokens, type DbClient } from "@showing-desk/db";
import { withTimeout } from "@showing-desk/shared";
import type { CredentialStore } from "../pipeline/types";

const QUERY_TIMEOUT_MS = 10_000;

/** Only reads are needed, so any drizzle Postgres database will do. */
export type TokenReader = Pick<DbClient, "select">;

export class CredentialRepository implements CredentialStore {
  constructor(private readonly db: TokenReader) {}

  async getAccessToken(email: string): Promise<string> {
    const rows = await withTimeout(
      this.db
        .select({ accessToken: oauthTokens.accessToken })
        .from(oauthTokens)
        .where(eq(oauthTokens.email, email))
        .limit(1)
        .execute(),
      QUERY_TIMEOUT_MS,
      "oauth token lookup"
    );

    const row = rows[0];
    if (!row) throw new Error(`no token found for email: ${email}`);
    return row.accessToken;
  }
}
