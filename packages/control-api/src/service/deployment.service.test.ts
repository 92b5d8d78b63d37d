import { beforeEach, describe, expect, it } from "vitest";
import { MemoryRecordStore } from "../../test/memory-store.js";
import type { DeploymentStatus } from "../libs/db/schema.js";
import {
  canTransition,
  createPendingDeployment,
  DeploymentNotFoundError,
  getDeploymentWithBuild,
  InvalidTransitionError,
  isTerminalStatus,
  markDeploymentFailed,
  transitionDeployment,
} from "./deployment.service.js";

const STATUSES: DeploymentStatus[] = [
  "pending",
  "building",
  "deploying",
  "deployed",
  "failed",
];

describe("deployment state machine", () => {
  it("only allows the forward path and failure from active states", () => {
    const allowed = STATUSES.flatMap((from) =>
      STATUSES.filter((to) => canTransition(from, to)).map(
        (to) => `${from}->${to}`,
      ),
    );
    expect(allowed).toEqual([
      "pending->building",
      "pending->failed",
      "building->deploying",
      "building->failed",
      "deploying->deployed",
      "deploying->failed",
    ]);
  });

  it("treats deployed and failed as terminal", () => {
    expect(STATUSES.filter(isTerminalStatus)).toEqual(["deployed", "failed"]);
  });
});

describe("deployment transitions", () => {
  let store: MemoryRecordStore;
  let deploymentId: string;

  beforeEach(async () => {
    store = new MemoryRecordStore();
    const project = await store.projects.create({
      ownerId: "owner-1",
      name: "Demo",
      slug: "demo",
      repoOwner: "acme",
      repoName: "demo",
      repoUrl: "https://github.com/acme/demo.git",
      branch: "main",
    });
    const deployment = await createPendingDeployment(store, {
      projectId: project.id,
      commitSha: "f".repeat(40),
      commitMessage: "Fix header",
      branch: "main",
    });
    deploymentId = deployment.id;
  });

  it("creates pending deployments with a reference", async () => {
    const deployment = await store.deployments.findById(deploymentId);
    expect(deployment?.status).toBe("pending");
    expect(deployment?.reference).toMatch(/^dpl-[a-z]{10}$/);
    expect(deployment?.commitMessage).toBe("Fix header");
  });

  it("writes extra fields with the status", async () => {
    await transitionDeployment(store, deploymentId, "building");
    const deploying = await transitionDeployment(store, deploymentId, "deploying", {
      imageTag: "deploy-x:fffffff",
    });
    expect(deploying.status).toBe("deploying");
    expect(deploying.imageTag).toBe("deploy-x:fffffff");
  });

  it("refuses to skip a step", async () => {
    await expect(
      transitionDeployment(store, deploymentId, "deployed"),
    ).rejects.toThrow(
      new InvalidTransitionError(deploymentId, "pending", "deployed"),
    );
    expect((await store.deployments.findById(deploymentId))?.status).toBe(
      "pending",
    );
  });

  it("never leaves a terminal state", async () => {
    await markDeploymentFailed(store, deploymentId);

    await expect(
      transitionDeployment(store, deploymentId, "building"),
    ).rejects.toBeInstanceOf(InvalidTransitionError);
    expect(await markDeploymentFailed(store, deploymentId)).toBeNull();
    expect((await store.deployments.findById(deploymentId))?.status).toBe(
      "failed",
    );
  });

  it("does not fail a deployed deployment", async () => {
    await transitionDeployment(store, deploymentId, "building");
    await transitionDeployment(store, deploymentId, "deploying");
    await transitionDeployment(store, deploymentId, "deployed");

    expect(await markDeploymentFailed(store, deploymentId)).toBeNull();
    expect((await store.deployments.findById(deploymentId))?.status).toBe(
      "deployed",
    );
  });

  it("reports unknown deployments", async () => {
    await expect(
      transitionDeployment(store, "missing", "building"),
    ).rejects.toBeInstanceOf(DeploymentNotFoundError);
    await expect(getDeploymentWithBuild(store, "missing")).rejects.toThrow(
      "Deployment missing not found",
    );
  });

  it("returns the deployment with its build", async () => {
    expect((await getDeploymentWithBuild(store, deploymentId)).build).toBeNull();

    await store.builds.create({
      reference: "bld-abcdefghij",
      deploymentId,
      startedAt: new Date(),
    });
    const withBuild = await getDeploymentWithBuild(store, deploymentId);
    expect(withBuild.id).toBe(deploymentId);
    expect(withBuild.build?.reference).toBe("bld-abcdefghij");
    expect(withBuild.build?.status).toBe("building");
  });
});
