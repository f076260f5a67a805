/**
 * Bot entry point: loads the environment, creates the seyfert client and
 * uploads the slash commands.
 */
import "module-alias/register";
import "dotenv/config";

import { Client } from "seyfert";
import { loadEnv } from "@/configuration/env";

const client = new Client();

async function bootstrap(): Promise<void> {
  console.log("[bootstrap] Starting bot...");
  const env = loadEnv();
  if (!env.BOT_TOKEN) {
    throw new Error("[bootstrap] BOT_TOKEN is not set.");
  }
  await client.start();
  await client.uploadCommands({ cachePath: "./commands.json" });
  console.log("[bootstrap] Commands uploaded.");
}

bootstrap().catch((error) => {
  console.error("[bootstrap] Failed to start bot:", error);
  process.exitCode = 1;
});
