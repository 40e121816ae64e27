import { matchMaker } from "@colyseus/core";
import { listen } from "@colyseus/tools";
import { logger } from "@tickbound/shared-servers";

// Import Colyseus config
import app from "./app-config";
import { readServerEnv } from "./config/env";

const env = readServerEnv();

const bootServer = async () => {
  await listen(app, env.port);
  const room = await matchMaker.createRoom("buffs", {});
  logger.info({ port: env.port, roomId: room.roomId, saveDir: env.saveDir }, "Buff server listening");
};

bootServer().catch((error: unknown) => {
  logger.error({ err: error }, "Failed to boot buff server");
  process.exitCode = 1;
});
