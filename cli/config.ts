import { readFile } from "fs/promises";

import { z } from "zod";

import type { IRCClientConfig } from "../irc/config";

// A channel is either "#name" or an object carrying its key
const ChannelSchema = z.union([
  z.string(),
  z.object({
    name: z.string(),
    key: z.string().optional(),
  }),
]);

const RateLimitSchema = z.object({
  burst: z.number().nonnegative().optional(),
  messageCost: z.number().nonnegative().optional(),
  byteCost: z.number().nonnegative().optional(),
});

const FileConfigSchema = z.object({
  host: z.string(),
  port: z.number().int().positive().default(6667),
  secure: z.boolean().default(false),
  nickname: z.string(),
  username: z.string().optional(),
  realname: z.string().optional(),
  retries: z.number().int().nonnegative().default(3),
  reconnectDelay: z.number().nonnegative().optional(),
  allowFlood: z.boolean().optional(),
  rateLimit: RateLimitSchema.optional(),
  supportedCaps: z.array(z.string()).optional(),
  debug: z.boolean().default(false),
  channels: z.array(ChannelSchema).default([]),
});

export interface CliConfig {
  client: IRCClientConfig;
  channels: { name: string; key?: string }[];
}

/**
 * Validate parsed JSON and merge in secrets from the environment
 * @param env IRC_PASSWORD, when set, becomes the server password
 */
export function parseConfig(data: unknown, env: NodeJS.ProcessEnv = process.env): CliConfig {
  const { channels, ...client } = FileConfigSchema.parse(data);

  return {
    client: env.IRC_PASSWORD ? { ...client, password: env.IRC_PASSWORD } : client,
    channels: channels.map((entry) => (typeof entry === "string" ? { name: entry } : entry)),
  };
}

/**
 * Load and validate a configuration file
 * @param filePath Path to the configuration JSON file
 */
export async function loadConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<CliConfig> {
  try {
    const fileContent = await readFile(filePath, "utf-8");
    const jsonData: unknown = JSON.parse(fileContent);

    return parseConfig(jsonData, env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("Configuration validation failed:");
      console.error(error.format());
    } else {
      console.error("Error loading configuration:", error);
    }
    throw error;
  }
}
