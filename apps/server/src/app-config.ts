import config from "@colyseus/tools";
import { WebSocketTransport } from "@colyseus/ws-transport";
import { logger } from "@tickbound/shared-servers";
import { readServerEnv } from "./config/env";
import { BuffRoom, type BuffRoomOptions } from "./rooms/buff-room";

const env = readServerEnv();

export default config({
  options: {
    logger,
  },

  initializeTransport: (options) => new WebSocketTransport(options),

  initializeGameServer: (gameServer) => {
    const roomOptions: BuffRoomOptions = {
      tickSeconds: env.tickSeconds,
      saveDir: env.saveDir,
      poisonConfigPath: env.poisonConfigPath,
    };
    gameServer.define("buffs", BuffRoom, roomOptions);
  },

  initializeExpress: (app) => {
    app.get("/healthz", (_req, res) => {
      res.send("ok");
    });
  },
});
