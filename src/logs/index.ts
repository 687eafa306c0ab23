export * from "./classifier.js";
