import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema";

export function createDbClient(connectionString: string) {
  const client = postgres(connectionString, { max: 10, prepare: false });
  return drizzle(client, { schema });
}

export type DbClient = ReturnType<typeof createDbClient>;
