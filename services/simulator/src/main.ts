import { loadConfig, type LoadConfigOptions, type ResolvedConfiguration } from "./config/loadConfig.js";
import { appLogger, normalizeError } from "./observability/logger.js";

if (process.env.NODE_ENV !== "test") {
  try {
    bootstrapSimulator();
  } catch (error) {
    appLogger.error({ err: normalizeError(error) }, "simulator startup failed");
    process.exit(1);
  }
}

/**
 * Resolves the simulator configuration from the settings file.
 *
 * @throws {ConfigError} when a resolution step fails
 */
export function bootstrapSimulator(options: LoadConfigOptions = {}): ResolvedConfiguration {
  const config = loadConfig(options);
  appLogger.info(
    { port: config.listenPort, importEnabled: config.importEnabled },
    "simulator configuration ready",
  );
  return config;
}
