export * from "./types.js";
export * from "./functions.js";
