// @daybrief/shared: record types, schemas, configuration, and pipeline stages
export * from "./types.js";
export * from "./schemas.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./concurrency.js";
export * from "./articles/fetcher.js";
export * from "./profiles/store.js";
export * from "./anthropic/index.js";
