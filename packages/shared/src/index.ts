export * from "./store.js";
export * from "./types/api.js";
export * from "./types/conversation.js";
export * from "./types/document.js";
export * from "./types/metadata.js";
