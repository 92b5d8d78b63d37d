import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { env } from "./config.js";
import { getLogger } from "./instrumentation.js";
import { DockerImageBuilder } from "./libs/docker.js";
import { createDatabase } from "./libs/db/index.js";
import { DrizzleRecordStore } from "./libs/db/drizzle-store.js";
import { GitSourceFetcher } from "./libs/git.js";
import { KubernetesCluster } from "./libs/kubernetes.js";
import {
  BuildPipeline,
  BuildQueue,
  WorkerPool,
} from "./service/build/index.js";
import { IngestionService } from "./service/github.service.js";
import { HostnameAllocator } from "./service/hostname.service.js";
import { WorkloadPublisher } from "./service/publisher.service.js";
import { KeyedMutex } from "./utils/lock.js";

const log = getLogger();

const db = createDatabase(env.DATABASE_URL);
const store = new DrizzleRecordStore(db);
const queue = new BuildQueue();

const allocator = new HostnameAllocator(store, {
  baseDomain: env.BASE_DOMAIN,
  publicUrlScheme: env.PUBLIC_URL_SCHEME,
});

const publishing =
  env.PUBLISH_TARGET === "kubernetes"
    ? {
        allocator,
        publisher: new WorkloadPublisher(KubernetesCluster.fromDefault(), {
          namespace: env.K8S_NAMESPACE,
          containerPort: env.WORKLOAD_PORT,
        }),
        lock: new KeyedMutex(),
      }
    : undefined;

if (!publishing) {
  log.warn("PUBLISH_TARGET is none, deployments stop after the image build");
}

const pipeline = new BuildPipeline({
  store,
  sourceFetcher: new GitSourceFetcher(),
  imageBuilder: new DockerImageBuilder({ push: Boolean(env.IMAGE_REGISTRY) }),
  publishing,
  workRoot: env.BUILD_WORK_DIR,
  imageRegistry: env.IMAGE_REGISTRY,
});

const pool = new WorkerPool({
  queue,
  store,
  pipeline,
  size: env.BUILD_WORKERS,
});
pool.start();

const app = createApp({
  store,
  ingestion: new IngestionService({ store, jobs: queue }),
  allocator,
  apiToken: env.API_TOKEN,
  webhookSecret: env.GITHUB_WEBHOOK_SECRET,
  webhookRateLimit: {
    limit: env.WEBHOOK_RATE_LIMIT,
    windowMs: env.WEBHOOK_RATE_WINDOW_MS,
  },
});

log.info(`Starting API server on port ${env.PORT}`);
const server = serve({
  fetch: app.fetch,
  port: env.PORT,
});

async function shutdown(signal: string) {
  log.info(`Received ${signal}, shutting down`);
  server.close();
  await pool.stop();
  await db.$client.end();
  log.info("Shutdown complete");
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      log.withError(error).error("Shutdown failed");
      process.exitCode = 1;
    });
  });
}
