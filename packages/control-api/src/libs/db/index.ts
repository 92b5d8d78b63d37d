import { drizzle } from "drizzle-orm/node-postgres";
import * as schema from "./schema.js";

export function createDatabase(connection: string) {
  return drizzle({ connection, schema });
}

export type Database = ReturnType<typeof createDatabase>;
