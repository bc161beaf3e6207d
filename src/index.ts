export * from "./config/index.js";
export * from "./generator/index.js";
export * from "./dataset/index.js";
