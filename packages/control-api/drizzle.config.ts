import { defineConfig } from "drizzle-kit";

const url = process.env.DATABASE_URL;
if (!url) {
  throw new Error("DATABASE_URL is not defined");
}

export default defineConfig({
  out: "./migrations",
  schema: "./src/libs/db/schema.ts",
  dialect: "postgresql",
  strict: true,
  dbCredentials: { url },
});
