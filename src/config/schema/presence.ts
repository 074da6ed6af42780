import { z } from "zod";
import { durationIssue } from "../duration";

export const DurationSchema = z.union([z.number(), z.string()]).superRefine((value, ctx) => {
  const issue = durationIssue(value);
  if (issue) {
    ctx.addIssue({ code: "custom", message: issue });
  }
});

export const PresenceConfigSchema = z
  .object({
    gracePeriod: DurationSchema.optional(),
    idleTimeout: DurationSchema.optional(),
    agentInactivityTimeout: DurationSchema.optional(),
  })
  .strict();

export type PresenceConfig = z.infer<typeof PresenceConfigSchema>;
