// Shared buff contracts for @tickbound/server and any client presenting buff timers

export * from "./constants";
export * from "./buffs/buff-types";
export * from "./buffs/buff-definition";
export * from "./buffs/save-records";
export * from "./status/poison";
export * from "./messages/buff-messages";
export * from "./utils/number";
export * from "./utils/guards";
