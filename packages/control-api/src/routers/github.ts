import { verify } from "@octokit/webhooks-methods";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError } from "zod";
import { type Env, getLogger } from "../instrumentation.js";
import { parseWebhookEvent, type WebhookEvent } from "../schemas/github.js";
import type { IngestionService } from "../service/github.service.js";
import { ProjectNotFoundError } from "../service/project.service.js";

export function createGithubRouter(deps: {
  ingestion: IngestionService;
  webhookSecret: string;
}) {
  return new Hono<Env>().post("/webhook", async (c) => {
    const log = getLogger();

    const signature = c.req.header("x-hub-signature-256");
    const eventName = c.req.header("x-github-event");
    const delivery = c.req.header("x-github-delivery");
    const body = await c.req.text();

    if (!signature) {
      throw new HTTPException(400, { message: "Missing signature" });
    }

    const isValid = await verify(deps.webhookSecret, body, signature);
    if (!isValid) {
      log.warn("Invalid webhook signature received.");
      throw new HTTPException(401, { message: "Invalid signature" });
    }

    log.info(`Received GitHub event: ${eventName} (Delivery: ${delivery})`);

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      log.withError(error).error("Failed to parse webhook payload");
      throw new HTTPException(400, { message: "Invalid JSON payload" });
    }

    let event: WebhookEvent;
    try {
      event = parseWebhookEvent(eventName, payload);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new HTTPException(400, { message: "Malformed push payload" });
      }
      throw error;
    }

    if (event.kind === "ignored") {
      log.info(event.reason);
      return c.json({ received: true, status: "ignored", reason: event.reason });
    }

    try {
      const result = await deps.ingestion.handlePush(event.push);
      if (result.status === "ignored") {
        return c.json({
          received: true,
          status: result.status,
          reason: result.reason,
        });
      }
      return c.json(
        {
          received: true,
          status: result.status,
          deployment: {
            id: result.deployment.id,
            reference: result.deployment.reference,
          },
        },
        202,
      );
    } catch (error) {
      if (error instanceof ProjectNotFoundError) {
        throw new HTTPException(404, { message: error.message });
      }
      log.withError(error).error("Error handling push event");
      throw new HTTPException(500, { message: "Internal server error" });
    }
  });
}
