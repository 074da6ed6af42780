import { z } from "zod";

export const IceServersConfigSchema = z
  .object({
    stunUrls: z.array(z.string().min(1)).optional(),
    turnUrl: z.string().optional(),
    turnUsername: z.string().optional(),
    turnCredential: z.string().optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.turnUrl?.trim() && !value.turnUsername) {
      ctx.addIssue({
        code: "custom",
        path: ["turnUsername"],
        message: "turnUsername is required when turnUrl is set",
      });
    }
  });

export const VoiceConfigSchema = z
  .object({
    iceServers: IceServersConfigSchema.optional(),
  })
  .strict();

export type VoiceConfig = z.infer<typeof VoiceConfigSchema>;
