export * from "./answer.js";
export * from "./metadata.js";
