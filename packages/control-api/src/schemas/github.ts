import { z } from "zod";

export const pushEventPayloadSchema = z.object({
  ref: z.string(),
  deleted: z.boolean().optional(),
  repository: z.object({
    name: z.string(),
    owner: z.object({
      login: z.string(),
    }),
  }),
  head_commit: z
    .object({
      id: z.string(),
      message: z.string(),
    })
    .nullable()
    .optional(),
});

export type PushEventPayload = z.infer<typeof pushEventPayloadSchema>;

export interface PushEvent {
  repoOwner: string;
  repoName: string;
  branch: string;
  commitSha: string;
  commitMessage: string;
}

export type WebhookEvent =
  | { kind: "push"; push: PushEvent }
  | { kind: "ignored"; event: string; reason: string };

const BRANCH_REF_PREFIX = "refs/heads/";

/**
 * Resolves a delivery into the one event kind that triggers deployments.
 * Throws a `ZodError` when a push payload is malformed.
 */
export function parseWebhookEvent(
  eventName: string | undefined,
  payload: unknown,
): WebhookEvent {
  const event = eventName ?? "unknown";
  if (event !== "push") {
    return { kind: "ignored", event, reason: `Unhandled event type ${event}` };
  }

  const push = pushEventPayloadSchema.parse(payload);
  if (!push.ref.startsWith(BRANCH_REF_PREFIX)) {
    return { kind: "ignored", event, reason: `Not a branch push: ${push.ref}` };
  }
  if (push.deleted) {
    return { kind: "ignored", event, reason: `Branch deleted: ${push.ref}` };
  }
  if (!push.head_commit) {
    return { kind: "ignored", event, reason: `No head commit on ${push.ref}` };
  }

  return {
    kind: "push",
    push: {
      repoOwner: push.repository.owner.login,
      repoName: push.repository.name,
      branch: push.ref.slice(BRANCH_REF_PREFIX.length),
      commitSha: push.head_commit.id,
      commitMessage: push.head_commit.message,
    },
  };
}
