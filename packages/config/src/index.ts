export * from "./geometry.js";
export * from "./atlas.js";
