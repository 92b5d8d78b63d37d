import { beforeEach, describe, expect, it } from "vitest";
import { FakeCluster } from "../../test/fakes.js";
import {
  buildProcessGroup,
  PublishError,
  WorkloadPublisher,
  workloadName,
} from "./publisher.service.js";

const PROJECT_ID = "5b0c8a58-4c4e-4d7a-9c7e-1f2a3b4c5d6e";
const NAME = `project-${PROJECT_ID}`;
const deployment = { projectId: PROJECT_ID, reference: "dpl-abcdefghij" };

describe("WorkloadPublisher", () => {
  let cluster: FakeCluster;
  let publisher: WorkloadPublisher;

  beforeEach(() => {
    cluster = new FakeCluster();
    publisher = new WorkloadPublisher(cluster, {
      namespace: "apps",
      containerPort: 8080,
    });
  });

  it("creates the process group, endpoint and route in order", async () => {
    const workload = await publisher.publish(
      "deploy-dpl-abcdefghij:0123456",
      "demo.localhost",
      deployment,
    );

    expect(workload).toEqual({ name: NAME, namespace: "apps" });
    expect(cluster.calls).toEqual([
      { action: "create", kind: "processGroup", namespace: "apps", name: NAME },
      { action: "create", kind: "endpoint", namespace: "apps", name: NAME },
      { action: "create", kind: "route", namespace: "apps", name: NAME },
    ]);

    const endpoint = cluster.get("apps", "endpoint", NAME);
    if (endpoint?.kind !== "endpoint") {
      throw new Error("endpoint not created");
    }
    expect(endpoint.manifest.spec?.ports).toEqual([
      { port: 80, targetPort: 8080 },
    ]);

    const route = cluster.get("apps", "route", NAME);
    if (route?.kind !== "route") {
      throw new Error("route not created");
    }
    const rule = route.manifest.spec?.rules?.[0];
    expect(rule?.host).toBe("demo.localhost");
    expect(rule?.http?.paths[0]).toEqual({
      path: "/",
      pathType: "Prefix",
      backend: { service: { name: NAME, port: { number: 80 } } },
    });
  });

  it("replaces a process group that already exists and carries on", async () => {
    await cluster.create(
      "apps",
      buildProcessGroup({
        name: NAME,
        namespace: "apps",
        image: "deploy-old:1111111",
        containerPort: 8080,
        env: {},
        deploymentReference: "dpl-previous",
      }),
    );
    cluster.calls.length = 0;

    await publisher.publish("deploy-new:2222222", "demo.localhost", deployment);

    expect(cluster.calls.map((call) => `${call.action}:${call.kind}`)).toEqual([
      "create:processGroup",
      "replace:processGroup",
      "create:endpoint",
      "create:route",
    ]);
    const processGroup = cluster.get("apps", "processGroup", NAME);
    if (processGroup?.kind !== "processGroup") {
      throw new Error("process group missing");
    }
    const container = processGroup.manifest.spec?.template.spec?.containers[0];
    expect(container?.image).toBe("deploy-new:2222222");
  });

  it("updates every resource on a republish", async () => {
    await publisher.publish("deploy-a:1111111", "demo.localhost", deployment);
    cluster.calls.length = 0;

    await publisher.publish("deploy-b:2222222", "demo.localhost", deployment);

    expect(cluster.calls.filter((call) => call.action === "replace")).toHaveLength(3);
  });

  it("passes the port and extra variables to the container", async () => {
    const withEnv = new WorkloadPublisher(cluster, {
      namespace: "apps",
      containerPort: 3000,
      env: { NODE_ENV: "production" },
    });

    await withEnv.publish("deploy-a:1111111", "demo.localhost", deployment);

    const processGroup = cluster.get("apps", "processGroup", NAME);
    if (processGroup?.kind !== "processGroup") {
      throw new Error("process group missing");
    }
    const container = processGroup.manifest.spec?.template.spec?.containers[0];
    expect(container?.env).toEqual([
      { name: "PORT", value: "3000" },
      { name: "NODE_ENV", value: "production" },
    ]);
    expect(container?.ports).toEqual([{ containerPort: 3000 }]);
    expect(
      processGroup.manifest.spec?.template.metadata?.annotations?.[
        "slipway.dev/deployment"
      ],
    ).toBe("dpl-abcdefghij");
  });

  it("wraps cluster failures in a PublishError", async () => {
    cluster.failOn = {
      action: "create",
      kind: "endpoint",
      error: new Error("namespace apps not found"),
    };

    const publish = publisher.publish("deploy-a:1111111", "demo.localhost", deployment);

    await expect(publish).rejects.toBeInstanceOf(PublishError);
    await expect(publish).rejects.toThrow(
      `Failed to apply endpoint ${NAME}: namespace apps not found`,
    );
    // Earlier resources stay in place
    expect(cluster.get("apps", "processGroup", NAME)).toBeDefined();
    expect(cluster.get("apps", "route", NAME)).toBeUndefined();
  });
});

describe("workloadName", () => {
  it("is derived from the project only", () => {
    expect(workloadName("ABC-123")).toBe("project-abc-123");
  });
});
