export * from "./validation-error.js";
export * from "./presentation.js";
