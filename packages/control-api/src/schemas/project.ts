import { z } from "zod";

export const projectRegisterSchema = z
  .object({
    ownerId: z.string().min(1),
    name: z.string().min(1),
    slug: z.string().min(1).optional(),
    repoUrl: z.string().min(1),
    repoOwner: z.string().min(1).optional(),
    repoName: z.string().min(1).optional(),
    branch: z.string().min(1).optional(),
  })
  .refine((input) => !input.repoOwner === !input.repoName, {
    message: "repoOwner and repoName go together",
    path: ["repoName"],
  });

export const projectLinkSchema = z.object({
  ownerId: z.string().min(1),
});

export interface ProjectError {
  error: string;
  details: string;
}
