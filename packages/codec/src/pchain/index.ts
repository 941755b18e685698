export * from "./types.js";
export * from "./codec.js";
export * from "./auth.js";
export * from "./signed.js";
