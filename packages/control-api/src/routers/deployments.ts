import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";
import type { Env } from "../instrumentation.js";
import type { RecordStore } from "../libs/db/store.js";
import {
  DEFAULT_DEPLOYMENT_PAGE,
  DeploymentNotFoundError,
  getDeploymentWithBuild,
  listDeployments,
} from "../service/deployment.service.js";

const listQuery = z.object({
  ownerId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(DEFAULT_DEPLOYMENT_PAGE),
});

export function createDeploymentsRouter(deps: { store: RecordStore }) {
  return new Hono<Env>()
    .get("/", zValidator("query", listQuery), async (c) => {
      const query = c.req.valid("query");

      try {
        return c.json(await listDeployments(deps.store, query));
      } catch (error) {
        c.var.log.withError(error).error("Error listing deployments");
        return c.json(
          {
            error: "Failed to fetch deployments",
            details: error instanceof Error ? error.message : String(error),
          },
          500,
        );
      }
    })
    .get(
      "/:id",
      zValidator("param", z.object({ id: z.string().uuid() })),
      async (c) => {
        const { id } = c.req.valid("param");

        try {
          return c.json(await getDeploymentWithBuild(deps.store, id));
        } catch (error) {
          if (error instanceof DeploymentNotFoundError) {
            return c.json(
              { error: "Deployment not found", details: error.message },
              404,
            );
          }
          c.var.log.withError(error).error("Error fetching deployment");
          return c.json(
            {
              error: "Failed to fetch deployment",
              details: error instanceof Error ? error.message : String(error),
            },
            500,
          );
        }
      },
    );
}
