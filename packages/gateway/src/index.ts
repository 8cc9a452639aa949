// @tidechat/gateway entry point: load .env, create and start the gateway

import "dotenv/config";
import { errorMessage } from "@tidechat/core";
import { type Gateway, createGateway } from "./gateway";

async function start(): Promise<Gateway> {
  const gateway = await createGateway();
  await gateway.start();
  return gateway;
}

const gateway = await start().catch((e: unknown) => {
  console.error("Startup failed:", errorMessage(e));
  process.exit(1);
});

const { logger } = gateway.deps;

// Graceful shutdown, guarded against a second signal while stopping
let shuttingDown = false;
const shutdown = async (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("Shutting down", { signal });
  await gateway.stop();
  process.exit(0);
};

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((e: unknown) => {
      logger.error("Shutdown failed", { error: errorMessage(e) });
      process.exit(1);
    });
  });
}
