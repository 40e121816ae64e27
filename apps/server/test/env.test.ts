import path from "node:path";
import { describe, expect, it } from "vitest";
import { readServerEnv } from "../src/config/env";

describe("readServerEnv", () => {
  it("uses defaults when nothing is set", () => {
    const env = readServerEnv({});

    expect(env.port).toBe(2567);
    expect(env.tickSeconds).toBe(0.6);
    expect(env.saveDir).toBe(path.resolve("./saves"));
    expect(path.basename(env.poisonConfigPath)).toBe("poison-configs.json");
    expect(env.isProduction).toBe(false);
  });

  it("reads overrides and rejects unusable numbers", () => {
    const env = readServerEnv({
      PORT: "3100",
      TICK_SECONDS: "-1",
      SAVE_DIR: "/tmp/buff-saves",
      NODE_ENV: "production",
    });

    expect(env.port).toBe(3100);
    expect(env.tickSeconds).toBe(0.6);
    expect(env.saveDir).toBe("/tmp/buff-saves");
    expect(env.isProduction).toBe(true);
  });
});
