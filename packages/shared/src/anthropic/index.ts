export * from "./client.js";
export * from "./json.js";
export * from "./prompts.js";
export * from "./processor.js";
