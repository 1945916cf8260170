import { z } from "zod";

const feedConfigSchema = z.object({
  url: z.string().url(),
});

export const appConfigSchema = z.object({
  publisher: z
    .object({
      serviceUrl: z.string().url().default("https://bsky.social"),
    })
    .default({}),
  feeds: z.array(feedConfigSchema).default([]),
  schedule: z.object({
    sync: z.string().min(1),
  }),
  http: z
    .object({
      timeoutMs: z.number().int().positive().default(15000),
      userAgent: z.string().min(1).default("feedcaster/1.0 (+feed poster)"),
    })
    .default({}),
  post: z
    .object({
      textPrefix: z.string().default(""),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

const credentialsSchema = z.object({
  PUBLISHER_IDENTIFIER: z.string().min(1),
  PUBLISHER_PASSWORD: z.string().min(1),
});

export type PublisherCredentials = {
  readonly identifier: string;
  readonly password: string;
};

export function parseCredentials(env: NodeJS.ProcessEnv): PublisherCredentials {
  const result = credentialsSchema.safeParse(env);
  if (!result.success) {
    const missing = result.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new Error(`missing publisher credentials: ${missing}`);
  }
  return {
    identifier: result.data.PUBLISHER_IDENTIFIER,
    password: result.data.PUBLISHER_PASSWORD,
  };
}
