export * from "./collaborators.js";
export * from "./fields.js";
export * from "./schemas.js";
