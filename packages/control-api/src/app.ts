import { otel } from "@hono/otel";
import { Hono } from "hono";
import { bearerAuth } from "hono/bearer-auth";
import { requestId } from "hono/request-id";
import { type Env, loggerMiddleware } from "./instrumentation.js";
import type { RecordStore } from "./libs/db/store.js";
import { type RateLimitOptions, rateLimit } from "./middleware/rate-limit.js";
import { createDeploymentsRouter } from "./routers/deployments.js";
import { createGithubRouter } from "./routers/github.js";
import { createProjectsRouter } from "./routers/projects.js";
import type { IngestionService } from "./service/github.service.js";
import type { HostnameAllocator } from "./service/hostname.service.js";

export interface AppDependencies {
  store: RecordStore;
  ingestion: IngestionService;
  allocator: HostnameAllocator;
  apiToken: string;
  webhookSecret: string;
  webhookRateLimit: RateLimitOptions;
}

export function createApp(deps: AppDependencies) {
  return new Hono<Env>()
    .use(requestId())
    .use(otel())
    .use(loggerMiddleware)
    .get("/.healthz", (c) => c.json({ message: "OK" }))
    .use("/github/webhook", rateLimit(deps.webhookRateLimit))
    .route(
      "/github",
      createGithubRouter({
        ingestion: deps.ingestion,
        webhookSecret: deps.webhookSecret,
      }),
    )
    .use("/api/*", bearerAuth({ token: deps.apiToken }))
    .route(
      "/api/projects",
      createProjectsRouter({ store: deps.store, allocator: deps.allocator }),
    )
    .route("/api/deployments", createDeploymentsRouter({ store: deps.store }));
}
