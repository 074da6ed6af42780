import { z } from "zod";

export const AuthUserSchema = z
  .object({
    token: z.string().min(1),
    userId: z.string().min(1),
    displayName: z.string().min(1),
    isAgent: z.boolean().optional(),
  })
  .strict();

export const AuthConfigSchema = z
  .object({
    users: z.array(AuthUserSchema).optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    for (const [index, user] of (value.users ?? []).entries()) {
      if (seen.has(user.token)) {
        ctx.addIssue({
          code: "custom",
          path: ["users", index, "token"],
          message: "Duplicate auth token",
        });
      }
      seen.add(user.token);
    }
  });

export type AuthUserConfig = z.infer<typeof AuthUserSchema>;
export type AuthConfig = z.infer<typeof AuthConfigSchema>;
