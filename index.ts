#!/usr/bin/env node

import { resolve } from "path";
import { promises as fs } from "fs";

import { config as loadEnv } from "dotenv";

import { loadConfig } from "./cli/config";
import { IRCClient } from "./irc/client";
import { CONNECTED, PRIVMSG } from "./irc/commands";
import { lastParam, sourceNick } from "./irc/message";

/**
 * Print usage information
 */
function printUsage() {
  console.log("\nUsage:");
  console.log("  npm start -- [config_path]");
  console.log("\nArguments:");
  console.log("  config_path  Path to config file (default: ./config.json)");
  console.log("\nEnvironment Variables:");
  console.log("  IRC_PASSWORD  Server password, if the server needs one");
  console.log("\nExamples:");
  console.log("  npm start");
  console.log("  npm start -- ./my-config.json");
}

/**
 * Main function
 */
async function main() {
  if (process.argv.includes("--help") || process.argv.includes("-h")) {
    printUsage();
    process.exit(0);
  }

  loadEnv();

  const configPath = process.argv[2] || "./config.json";
  const absoluteConfigPath = resolve(process.cwd(), configPath);

  try {
    await fs.access(absoluteConfigPath);
  } catch {
    console.error(`Error: Could not find config file at ${absoluteConfigPath}`);
    console.error(`See config.json.example for a sample configuration.`);
    process.exit(1);
  }

  console.log(`Using configuration from: ${absoluteConfigPath}`);

  const { client: clientConfig, channels } = await loadConfig(absoluteConfigPath);
  const client = new IRCClient(clientConfig);

  client.handlers.add(CONNECTED, async (irc) => {
    console.log(`Connected to ${irc.server()} as ${irc.getNick()}`);

    for (const channel of channels) {
      if (channel.key) {
        await irc.joinKey(channel.name, channel.key);
      } else {
        await irc.join(channel.name);
      }
    }
  });

  client.handlers.add(PRIVMSG, (_irc, event) => {
    console.log(`[${event.params[0] ?? "?"}] <${sourceNick(event)}> ${lastParam(event)}`);
  });

  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down...`);
    client
      .quitWithMessage("shutting down")
      .then(() => client.stop())
      .catch((error: unknown) => {
        console.error("Error during shutdown:", error);
        process.exit(1);
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  const running = client.run();
  await client.connect();
  console.log("Client is now running. Press Ctrl+C to stop.");

  await running;
  console.log("Goodbye!");
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("Unhandled error:", error);
    process.exit(1);
  });
}
