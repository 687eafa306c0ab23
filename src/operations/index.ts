export * from "./channel.js";
export * from "./messages.js";
export * from "./dispatcher.js";
export * from "./workers/versions.js";
export * from "./workers/download.js";
export * from "./workers/hash-local.js";
export * from "./workers/staleness.js";
export * from "./workers/subprocess.js";
