/**
 * Renderer exports.
 */

export * from "./json.js";
export * from "./sarif.js";
export * from "./terminal.js";
