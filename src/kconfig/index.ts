export * from "./config-file.js";
