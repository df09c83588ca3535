// bandwatch/src/config.ts
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { FeedSchema } from "./lib/types/feed.ts";

export const SinkTypeEnum = z.enum(["console", "jsonl", "nats"]);

export const EngineConfigSchema = z.object({
  feeds: z.array(FeedSchema).min(1, "At least one feed is required"),

  validator: z.object({
    insetFraction: z.number().min(0).max(0.5).default(0.1),
  }).default({}),

  tracker: z.object({
    seedPreviousFromHost: z.boolean().default(false),
  }).default({}),

  sink: z.object({
    type: SinkTypeEnum.default("console"),
    dir: z.string().default("./data"),
    natsUrl: z.string().default("nats://localhost:4222"),
    subjectPrefix: z.string().default("bandwatch"),
    logRecords: z.boolean().default(false),
  }).default({}),

  reporting: z.object({
    statsEvery: z.number().int().nonnegative().default(1000),
  }).default({}),
}).superRefine((cfg, ctx) => {
  const seen = new Set<string>();
  cfg.feeds.forEach((feed, i) => {
    if (seen.has(feed.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["feeds", i, "id"],
        message: `Duplicate feed id: ${feed.id}`,
      });
    }
    seen.add(feed.id);
  });
});

export type SinkType = z.infer<typeof SinkTypeEnum>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const env = {
  configPath: process.env.BANDWATCH_CONFIG,
  natsUrl: process.env.NATS_URL,
};

export function parseEngineConfig(raw: unknown): EngineConfig {
  return EngineConfigSchema.parse(raw);
}

/**
 * Load engine configuration from a YAML file.
 * NATS_URL, when set, overrides sink.natsUrl.
 */
export async function loadEngineConfig(configPath: string | undefined = env.configPath): Promise<EngineConfig> {
  if (!configPath) {
    throw new Error("Config path required (--config or BANDWATCH_CONFIG)");
  }

  const content = await readFile(configPath, "utf8");
  const config = parseEngineConfig(parseYaml(content));

  if (env.natsUrl) {
    config.sink.natsUrl = env.natsUrl;
  }
  return config;
}
