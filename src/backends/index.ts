export * from "./types.js";
export * from "./command-runner.js";
export * from "./git-backend.js";
export * from "./docker-backend.js";
export * from "./auth-backend.js";
export * from "./terminal-backend.js";
export * from "./dry-run.js";
export * from "./factory.js";
export * from "./state-backend.js";
