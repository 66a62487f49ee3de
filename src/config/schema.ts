// pattern: Functional Core
import { z } from "zod";

const FilterConfigSchema = z.object({
  languages: z.array(z.string()).default([]),
  keywords: z.array(z.string()).default([]),
  allowed_users: z.array(z.string()).default([]),
  blocked_users: z.array(z.string()).default([]),
  blocked_words: z.array(z.string()).default([]),
});

const TwitterConfigSchema = z.object({
  consumer_key: z.string().min(1),
  consumer_secret: z.string().min(1),
  access_key: z.string().min(1),
  access_secret: z.string().min(1),
});

const BlueskyConfigSchema = z.object({
  identifier: z.string().min(1),
  app_password: z.string().min(1),
  service: z.string().url().default("https://bsky.social"),
  jetstream_url: z.string().url().default("wss://jetstream2.us-east.bsky.network/subscribe"),
});

const AppConfigSchema = z
  .object({
    provider: z.enum(["twitter", "bluesky"]).default("twitter"),
    auth_timeout: z.number().int().positive().default(10000),
    channel_capacity: z.number().int().positive().default(1000),
    filter: FilterConfigSchema.default({}),
    twitter: TwitterConfigSchema.optional(),
    bluesky: BlueskyConfigSchema.optional(),
  })
  .superRefine((data, ctx) => {
    if (data.provider === "twitter" && data.bluesky && !data.twitter) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "provider is twitter but only bluesky credentials are configured",
        path: ["provider"],
      });
    }
    if (data.provider === "bluesky" && data.twitter && !data.bluesky) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "provider is bluesky but only twitter credentials are configured",
        path: ["provider"],
      });
    }
  });

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type FilterSpec = z.infer<typeof FilterConfigSchema>;
export type TwitterCredentials = z.infer<typeof TwitterConfigSchema>;
export type BlueskyCredentials = z.infer<typeof BlueskyConfigSchema>;
export type Provider = AppConfig["provider"];

export { AppConfigSchema, FilterConfigSchema, TwitterConfigSchema, BlueskyConfigSchema };
