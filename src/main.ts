import { createRotaApp } from "./app.js";

export const main = async () => {
  const app = await createRotaApp();
  await app.start();

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    app.logger.info({ signal }, "Shutting down...");
    try {
      await app.stop();
      process.exit(0);
    } catch (error) {
      app.logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        "shutdown failed"
      );
      process.exit(1);
    }
  };

  process.once("SIGINT", (signal) => {
    void shutdown(signal);
  });
  process.once("SIGTERM", (signal) => {
    void shutdown(signal);
  });
};
