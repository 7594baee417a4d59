export * from "./analysis.js";
export * from "./qa.js";
