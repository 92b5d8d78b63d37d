import { sign } from "@octokit/webhooks-methods";
import { beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { MemoryRecordStore } from "../test/memory-store.js";
import { createApp } from "./app.js";
import { BuildQueue } from "./service/build/queue.js";
import { IngestionService } from "./service/github.service.js";
import { HostnameAllocator } from "./service/hostname.service.js";
import { registerProject } from "./service/project.service.js";

const SECRET = "test-secret";
const TOKEN = "test-token";
const COMMIT = "9".repeat(40);

const withId = z.object({ id: z.string() }).passthrough();

function pushPayload(overrides: Record<string, unknown> = {}) {
  return {
    ref: "refs/heads/main",
    deleted: false,
    repository: { name: "web", owner: { login: "acme" } },
    head_commit: { id: COMMIT, message: "Ship it" },
    ...overrides,
  };
}

describe("control api", () => {
  let store: MemoryRecordStore;
  let queue: BuildQueue;
  let app: ReturnType<typeof createApp>;

  async function deliver(
    event: string,
    payload: unknown,
    secret = SECRET,
    headers: Record<string, string> = {},
  ) {
    const body = JSON.stringify(payload);
    return app.request("/github/webhook", {
      method: "POST",
      headers: {
        ...headers,
        "content-type": "application/json",
        "x-github-event": event,
        "x-github-delivery": "delivery-1",
        "x-hub-signature-256": await sign(secret, body),
      },
      body,
    });
  }

  function api(path: string, init: RequestInit = {}) {
    return app.request(path, {
      ...init,
      headers: {
        authorization: `Bearer ${TOKEN}`,
        "content-type": "application/json",
      },
    });
  }

  beforeEach(() => {
    store = new MemoryRecordStore();
    queue = new BuildQueue();
    app = createApp({
      store,
      ingestion: new IngestionService({ store, jobs: queue }),
      allocator: new HostnameAllocator(store, { baseDomain: "localhost" }),
      apiToken: TOKEN,
      webhookSecret: SECRET,
      webhookRateLimit: { limit: 100, windowMs: 60_000 },
    });
  });

  it("answers health checks", async () => {
    const res = await app.request("/.healthz");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: "OK" });
  });

  describe("POST /github/webhook", () => {
    beforeEach(async () => {
      await registerProject(store, {
        ownerId: "owner-1",
        name: "Web",
        repoUrl: "https://github.com/acme/web.git",
      });
    });

    it("queues a deployment for a push to the target branch", async () => {
      const res = await deliver("push", pushPayload());

      expect(res.status).toBe(202);
      const body = await res.json();
      expect(body).toMatchObject({ received: true, status: "queued" });
      expect(queue.size()).toBe(1);

      const deploymentId = await queue.dequeue();
      const deployment = await store.deployments.findById(deploymentId);
      expect(deployment).toMatchObject({
        status: "pending",
        commitSha: COMMIT,
        commitMessage: "Ship it",
        branch: "main",
      });
    });

    it("requires a signature", async () => {
      const res = await app.request("/github/webhook", {
        method: "POST",
        headers: { "x-github-event": "push" },
        body: JSON.stringify(pushPayload()),
      });
      expect(res.status).toBe(400);
    });

    it("rejects a signature made with another secret", async () => {
      const res = await deliver("push", pushPayload(), "other-secret");
      expect(res.status).toBe(401);
      expect(queue.size()).toBe(0);
    });

    it("ignores events other than push", async () => {
      const res = await deliver("ping", { zen: "Keep it simple." });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        received: true,
        status: "ignored",
        reason: "Unhandled event type ping",
      });
    });

    it("ignores tag pushes and branch deletions", async () => {
      const tag = await deliver("push", pushPayload({ ref: "refs/tags/v1.0.0" }));
      expect(await tag.json()).toMatchObject({ status: "ignored" });

      const deletion = await deliver(
        "push",
        pushPayload({ deleted: true, head_commit: null }),
      );
      expect(await deletion.json()).toEqual({
        received: true,
        status: "ignored",
        reason: "Branch deleted: refs/heads/main",
      });
      expect(queue.size()).toBe(0);
    });

    it("ignores pushes to other branches", async () => {
      const res = await deliver("push", pushPayload({ ref: "refs/heads/dev" }));
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: "ignored" });
      expect(queue.size()).toBe(0);
    });

    it("returns 404 for an unregistered repository", async () => {
      const res = await deliver(
        "push",
        pushPayload({ repository: { name: "api", owner: { login: "acme" } } }),
      );
      expect(res.status).toBe(404);
    });

    it("rejects a malformed push payload", async () => {
      const res = await deliver("push", { ref: "refs/heads/main" });
      expect(res.status).toBe(400);
    });
  });

  describe("webhook rate limit", () => {
    let clock: number;

    beforeEach(() => {
      clock = 1_000_000;
      app = createApp({
        store,
        ingestion: new IngestionService({ store, jobs: queue }),
        allocator: new HostnameAllocator(store, { baseDomain: "localhost" }),
        apiToken: TOKEN,
        webhookSecret: SECRET,
        webhookRateLimit: { limit: 2, windowMs: 60_000, now: () => clock },
      });
    });

    it("answers 429 once a client exceeds the window's limit", async () => {
      expect((await deliver("ping", {})).status).toBe(200);
      clock += 15_000;
      expect((await deliver("ping", {})).status).toBe(200);

      const limited = await deliver("ping", {});
      expect(limited.status).toBe(429);
      expect(limited.headers.get("retry-after")).toBe("45");
      expect(await limited.json()).toEqual({ error: "Rate limit exceeded" });
    });

    it("opens a new window once the previous one ends", async () => {
      await deliver("ping", {});
      await deliver("ping", {});
      expect((await deliver("ping", {})).status).toBe(429);

      clock += 60_000;
      expect((await deliver("ping", {})).status).toBe(200);
    });

    it("counts each forwarded client separately", async () => {
      const first = { "x-forwarded-for": "203.0.113.7, 10.0.0.1" };
      const second = { "x-forwarded-for": "198.51.100.4" };
      await deliver("ping", {}, SECRET, first);
      await deliver("ping", {}, SECRET, first);

      expect((await deliver("ping", {}, SECRET, first)).status).toBe(429);
      expect((await deliver("ping", {}, SECRET, second)).status).toBe(200);
    });
  });

  describe("/api", () => {
    it("lists projects newest first, optionally by owner", async () => {
      await registerProject(store, {
        ownerId: "owner-1",
        name: "Web",
        repoUrl: "https://github.com/acme/web.git",
      });
      await registerProject(store, {
        ownerId: "owner-2",
        name: "Docs",
        repoUrl: "https://github.com/acme/docs.git",
      });

      const all = await api("/api/projects");
      expect(all.status).toBe(200);
      const projects = z.array(withId).parse(await all.json());
      expect(projects.map((project) => project.slug)).toEqual(["docs", "web"]);
      expect(projects[0]).toMatchObject({ hostname: null, url: null });

      const owned = await api("/api/projects?ownerId=owner-1");
      const ownedProjects = z.array(withId).parse(await owned.json());
      expect(ownedProjects.map((project) => project.slug)).toEqual(["web"]);
    });

    it("lists recent deployments across projects", async () => {
      const { project: web } = await registerProject(store, {
        ownerId: "owner-1",
        name: "Web",
        repoUrl: "https://github.com/acme/web.git",
      });
      const { project: docs } = await registerProject(store, {
        ownerId: "owner-2",
        name: "Docs",
        repoUrl: "https://github.com/acme/docs.git",
      });
      await deliver("push", pushPayload());
      await deliver(
        "push",
        pushPayload({ repository: { name: "docs", owner: { login: "acme" } } }),
      );

      const all = await api("/api/deployments");
      expect(all.status).toBe(200);
      const deployments = z.array(withId).parse(await all.json());
      expect(deployments.map((deployment) => deployment.projectId)).toEqual([
        docs.id,
        web.id,
      ]);

      const owned = await api("/api/deployments?ownerId=owner-1");
      const ownedDeployments = z.array(withId).parse(await owned.json());
      expect(ownedDeployments.map((deployment) => deployment.projectId)).toEqual([
        web.id,
      ]);

      const page = await api("/api/deployments?limit=1");
      expect(z.array(withId).parse(await page.json())).toHaveLength(1);

      expect((await api("/api/deployments?limit=0")).status).toBe(400);
    });

    it("requires the bearer token", async () => {
      const res = await app.request("/api/projects", {
        method: "POST",
        body: JSON.stringify({}),
      });
      expect(res.status).toBe(401);
    });

    it("registers and fetches a project", async () => {
      const created = await api("/api/projects", {
        method: "POST",
        body: JSON.stringify({
          ownerId: "owner-1",
          name: "Docs Site",
          repoUrl: "https://github.com/acme/docs.git",
        }),
      });
      expect(created.status).toBe(201);
      const project = withId.parse(await created.json());
      expect(project).toMatchObject({ slug: "docs-site", repoName: "docs" });

      const again = await api("/api/projects", {
        method: "POST",
        body: JSON.stringify({
          ownerId: "owner-2",
          name: "Docs",
          repoUrl: "https://github.com/acme/docs",
        }),
      });
      expect(again.status).toBe(200);
      expect(await again.json()).toMatchObject({
        id: project.id,
        ownerId: "owner-2",
      });

      const fetched = await api(`/api/projects/${project.id}`);
      expect(fetched.status).toBe(200);
      expect(await fetched.json()).toMatchObject({
        id: project.id,
        hostname: null,
        url: null,
      });
    });

    it("reports the public URL of a project with a hostname", async () => {
      const { project } = await registerProject(store, {
        ownerId: "owner-1",
        name: "Web",
        repoUrl: "https://github.com/acme/web.git",
      });
      await deliver("push", pushPayload());
      const deploymentId = await queue.dequeue();
      await new HostnameAllocator(store, { baseDomain: "localhost" }).allocate(
        project.id,
        deploymentId,
      );

      const res = await api(`/api/projects/${project.id}`);
      expect(await res.json()).toMatchObject({
        hostname: "web.localhost",
        url: "http://web.localhost",
      });

      const deployments = await api(`/api/projects/${project.id}/deployments`);
      const list = z.array(withId).parse(await deployments.json());
      expect(list).toHaveLength(1);
      expect(list[0]).toMatchObject({ id: deploymentId, hostname: "web.localhost" });

      const deployment = await api(`/api/deployments/${deploymentId}`);
      expect(await deployment.json()).toMatchObject({
        id: deploymentId,
        status: "pending",
        build: null,
      });
    });

    it("links a project to another owner", async () => {
      const { project } = await registerProject(store, {
        ownerId: "owner-1",
        name: "Web",
        repoUrl: "https://github.com/acme/web.git",
      });

      const res = await api(`/api/projects/${project.id}/link`, {
        method: "POST",
        body: JSON.stringify({ ownerId: "owner-3" }),
      });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ ownerId: "owner-3" });
    });

    it("returns 404 for unknown ids and 400 for malformed ones", async () => {
      const missing = "3f1e2d3c-4b5a-4978-8a6b-5c4d3e2f1a0b";
      expect((await api(`/api/projects/${missing}`)).status).toBe(404);
      expect((await api(`/api/deployments/${missing}`)).status).toBe(404);
      expect((await api("/api/projects/not-a-uuid")).status).toBe(400);
    });

    it("validates the registration body", async () => {
      const res = await api("/api/projects", {
        method: "POST",
        body: JSON.stringify({ ownerId: "owner-1", repoUrl: "https://github.com/acme/x" }),
      });
      expect(res.status).toBe(400);
    });
  });
});
