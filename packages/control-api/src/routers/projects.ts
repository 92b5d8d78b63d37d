import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";
import type { Env } from "../instrumentation.js";
import type { RecordStore } from "../libs/db/store.js";
import {
  type ProjectError,
  projectLinkSchema,
  projectRegisterSchema,
} from "../schemas/project.js";
import type { HostnameAllocator } from "../service/hostname.service.js";
import {
  getProject,
  InvalidProjectError,
  linkProject,
  listProjectDeployments,
  listProjects,
  ProjectConflictError,
  ProjectNotFoundError,
  registerProject,
} from "../service/project.service.js";

const idParam = z.object({ id: z.string().uuid() });
const ownerQuery = z.object({ ownerId: z.string().min(1).optional() });

function details(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export function createProjectsRouter(deps: {
  store: RecordStore;
  allocator: HostnameAllocator;
}) {
  const { store, allocator } = deps;

  return new Hono<Env>()
    .get("/", zValidator("query", ownerQuery), async (c) => {
      const { ownerId } = c.req.valid("query");

      try {
        const projects = await listProjects(store, { ownerId });
        return c.json(
          projects.map((project) => ({
            ...project,
            url: project.hostname ? allocator.urlFor(project.hostname) : null,
          })),
        );
      } catch (error) {
        c.var.log.withError(error).error("Error listing projects");
        const errorResponse: ProjectError = {
          error: "Failed to fetch projects",
          details: details(error),
        };
        return c.json(errorResponse, 500);
      }
    })
    .post("/", zValidator("json", projectRegisterSchema), async (c) => {
      const data = c.req.valid("json");

      try {
        const { project, created } = await registerProject(store, data);
        return c.json(project, created ? 201 : 200);
      } catch (error) {
        const errorResponse: ProjectError = {
          error: "Failed to register project",
          details: details(error),
        };
        if (error instanceof InvalidProjectError) {
          return c.json(errorResponse, 400);
        }
        if (error instanceof ProjectConflictError) {
          return c.json(errorResponse, 409);
        }
        c.var.log.withError(error).error("Error registering project");
        return c.json(errorResponse, 500);
      }
    })
    .post(
      "/:id/link",
      zValidator("param", idParam),
      zValidator("json", projectLinkSchema),
      async (c) => {
        const { id } = c.req.valid("param");
        const { ownerId } = c.req.valid("json");

        try {
          return c.json(await linkProject(store, id, ownerId));
        } catch (error) {
          const errorResponse: ProjectError = {
            error: "Failed to link project",
            details: details(error),
          };
          if (error instanceof ProjectNotFoundError) {
            return c.json(errorResponse, 404);
          }
          c.var.log.withError(error).error("Error linking project");
          return c.json(errorResponse, 500);
        }
      },
    )
    .get("/:id", zValidator("param", idParam), async (c) => {
      const { id } = c.req.valid("param");

      try {
        const project = await getProject(store, id);
        return c.json({
          ...project,
          url: project.hostname ? allocator.urlFor(project.hostname) : null,
        });
      } catch (error) {
        const errorResponse: ProjectError = {
          error: "Failed to fetch project",
          details: details(error),
        };
        if (error instanceof ProjectNotFoundError) {
          return c.json(errorResponse, 404);
        }
        c.var.log.withError(error).error("Error fetching project");
        return c.json(errorResponse, 500);
      }
    })
    .get("/:id/deployments", zValidator("param", idParam), async (c) => {
      const { id } = c.req.valid("param");

      try {
        return c.json(await listProjectDeployments(store, id));
      } catch (error) {
        const errorResponse: ProjectError = {
          error: "Failed to fetch deployments",
          details: details(error),
        };
        if (error instanceof ProjectNotFoundError) {
          return c.json(errorResponse, 404);
        }
        c.var.log.withError(error).error("Error fetching deployments");
        return c.json(errorResponse, 500);
      }
    });
}
