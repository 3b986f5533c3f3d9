export * from "./core/types.js";
export * from "./core/tokenizer.js";
export * from "./core/vectorizer.js";
export * from "./core/similarity.js";
export * from "./core/estimator.js";
export * from "./core/heap.js";
export * from "./core/errors.js";
export * from "./core/impl/index.js";

export * from "./consumers/skillIndex.js";
export * from "./consumers/eventLog.js";
export * from "./consumers/healthReport.js";

export * from "./config.js";
export * from "./logger.js";
