import { loadConfig } from "./config";
import { logger } from "./observability/logger";
import { createStreamingServices } from "./services";
import { createApp } from "./server";
import { errorMessage } from "./errors";

async function main(): Promise<void> {
  const { config, warnings } = loadConfig();
  logger.level = config.logLevel;
  for (const warning of warnings) {
    logger.warn({ msg: "ignoring invalid setting", ...warning });
  }

  const services = await createStreamingServices(config);
  services.start();

  const app = createApp(services, { corsOrigins: config.corsOrigins });
  const server = app.listen(config.port, () => {
    logger.info({ msg: "runstream listening", port: config.port, channels: services.registry.activeBackend, eventLog: services.eventLog.backend });
  });

  const stop = (signal: NodeJS.Signals) => {
    logger.info({ msg: "shutting down", signal });
    server.close();
    void services.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ msg: "shutdown failed", err: errorMessage(err) });
        process.exit(1);
      }
    );
  };
  process.once("SIGTERM", stop);
  process.once("SIGINT", stop);
}

main().catch((err: unknown) => {
  logger.fatal({ msg: "startup failed", err: errorMessage(err) });
  process.exitCode = 1;
});
