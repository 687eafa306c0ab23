export * from "./session.js";
export * from "./loop.js";
