/**
 * Barrel exports.
 *
 * Re-exports the public modules so consumers can import everything from the
 * package root.
 */
export * from "./errors";
export * from "./models";
export * from "./statistics";
export * from "./table";
export * from "./types";
