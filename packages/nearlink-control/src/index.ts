import type { FastifyInstance } from "fastify";
import { loadConfig } from "./config.js";
import { buildServer } from "./server.js";

function closeOnSignal(app: FastifyInstance): void {
  let closing = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (closing) {
      return;
    }
    closing = true;
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error({ err: error }, "shutdown failed");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const app = await buildServer(config);
  closeOnSignal(app);
  await app.listen({ host: config.host, port: config.port });
  app.log.info(
    { deviceName: config.deviceName, pairedDevicesPath: config.pairedDevicesPath },
    "proximity engine ready; waiting for a host bridge",
  );
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
