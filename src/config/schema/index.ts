import { z } from "zod";
import { AuthConfigSchema } from "./auth";
import { LoggingSchema } from "./logging";
import { PresenceConfigSchema } from "./presence";
import { ServerConfigSchema } from "./server";
import { VoiceConfigSchema } from "./voice";

export const ParlorConfigSchema = z
  .object({
    $schema: z.string().optional(),
    server: ServerConfigSchema.optional(),
    logging: LoggingSchema.optional(),
    presence: PresenceConfigSchema.optional(),
    voice: VoiceConfigSchema.optional(),
    auth: AuthConfigSchema.optional(),
  })
  .strict();

export type ParlorConfig = z.infer<typeof ParlorConfigSchema>;
export type { AuthConfig, AuthUserConfig } from "./auth";
export type { PresenceConfig } from "./presence";
export type { ServerConfig } from "./server";
export type { VoiceConfig } from "./voice";
