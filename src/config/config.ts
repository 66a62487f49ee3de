// pattern: Imperative Shell
import TOML from "@iarna/toml";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema } from "./schema.ts";
import type { AppConfig } from "./schema.ts";

type Overrides = Record<string, string>;

function readEnv(mapping: Record<string, string>): Overrides {
  const values: Overrides = {};
  for (const [key, variable] of Object.entries(mapping)) {
    const value = process.env[variable];
    if (value) {
      values[key] = value;
    }
  }
  return values;
}

function section(parsed: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = parsed[key];
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? { ...value }
    : {};
}

export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? "config.toml");
  const raw = readFileSync(resolvedPath, "utf-8");
  const parsed: Record<string, unknown> = TOML.parse(raw);

  // Environment variable overrides for secrets
  const envOverrides: Record<string, unknown> = {};

  const twitterEnv = readEnv({
    consumer_key: "TWITTER_CONSUMER_KEY",
    consumer_secret: "TWITTER_CONSUMER_SECRET",
    access_key: "TWITTER_ACCESS_KEY",
    access_secret: "TWITTER_ACCESS_SECRET",
  });
  if (Object.keys(twitterEnv).length > 0) {
    envOverrides["twitter"] = { ...section(parsed, "twitter"), ...twitterEnv };
  }

  const blueskyEnv = readEnv({
    identifier: "BLUESKY_IDENTIFIER",
    app_password: "BLUESKY_APP_PASSWORD",
  });
  if (Object.keys(blueskyEnv).length > 0) {
    envOverrides["bluesky"] = { ...section(parsed, "bluesky"), ...blueskyEnv };
  }

  const merged = { ...parsed, ...envOverrides };
  return AppConfigSchema.parse(merged);
}
