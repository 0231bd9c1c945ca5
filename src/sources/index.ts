export * from "./types.js";
export * from "./memory-source.js";
export * from "./single-source.js";
export * from "./markdown-source.js";
export * from "./detect.js";
