export * from "./app-state.js";
export * from "./codec.js";
export * from "./distance-estimator.js";
export * from "./engine.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./pairing.js";
export * from "./peer-registry.js";
export * from "./ranging.js";
export * from "./serial-queue.js";
export * from "./store.js";
export * from "./timers.js";
export * from "./token-exchange.js";
export * from "./transport.js";
