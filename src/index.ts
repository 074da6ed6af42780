import {
  loadConfig,
  resolveIceServerSettings,
  resolvePresenceOptions,
  resolveServerOptions,
} from "./config";
import { GatewayHub, GatewayServer, StaticUserDirectory } from "./gateway";
import { configureLogger, describeError, logger } from "./logger";
import { PresenceEngine } from "./presence";
import { registerProcessErrorHandlers } from "./process-error-handlers";
import { VoiceRelay } from "./voice";

async function main() {
  const args = process.argv.slice(2);
  const configArgIndex = args.indexOf("--config");
  const configPath = configArgIndex >= 0 ? args[configArgIndex + 1] : undefined;

  registerProcessErrorHandlers();

  const result = loadConfig(configPath);
  if (!result.success || !result.config) {
    logger.error({ errors: result.errors, path: result.path }, "Failed to load configuration");
    process.exit(1);
  }
  const config = result.config;
  configureLogger(config.logging?.level);

  const presence = new PresenceEngine(resolvePresenceOptions(config));
  const voice = new VoiceRelay(resolveIceServerSettings(config));
  const directory = new StaticUserDirectory(config.auth?.users);
  const hub = new GatewayHub(presence, voice);
  const server = new GatewayServer(resolveServerOptions(config), {
    hub,
    presence,
    voice,
    directory,
  });

  if (directory.size === 0) {
    logger.warn("No accounts configured under auth.users; every connection will be rejected");
  }

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await server.stop();
    voice.dispose();
    presence.dispose();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  await server.start();
  logger.info(
    { config: result.path, accounts: directory.size },
    "Parlor is running. Press Ctrl+C to stop.",
  );
}

main().catch((error: unknown) => {
  logger.error(
    { error: describeError(error) },
    "Fatal error during startup",
  );
  process.exit(1);
});
