import { tmpdir } from "node:os";
import { z } from "zod";

export const config = z.object({
  APP_ENV: z.enum(["development", "production", "test"]),
  PORT: z.coerce.number().int().positive().default(8080),

  DATABASE_URL: z.string(),

  // Hostnames are allocated as <project-slug>.<BASE_DOMAIN>
  BASE_DOMAIN: z.string().default("localhost"),
  PUBLIC_URL_SCHEME: z.enum(["http", "https"]).default("http"),

  GITHUB_WEBHOOK_SECRET: z.string().min(1),
  API_TOKEN: z.string().min(1),

  // Webhook deliveries accepted per client within each window
  WEBHOOK_RATE_LIMIT: z.coerce.number().int().min(1).default(10),
  WEBHOOK_RATE_WINDOW_MS: z.coerce.number().int().positive().default(60_000),

  // Build workers
  BUILD_WORKERS: z.coerce.number().int().min(1).default(3),
  BUILD_WORK_DIR: z.string().default(tmpdir()),
  IMAGE_REGISTRY: z.string().optional(),

  // Publishing
  PUBLISH_TARGET: z.enum(["kubernetes", "none"]).default("kubernetes"),
  K8S_NAMESPACE: z.string().default("default"),
  WORKLOAD_PORT: z.coerce.number().int().positive().default(8080),
});

export type Config = z.infer<typeof config>;

export const env = config.parse(process.env);
