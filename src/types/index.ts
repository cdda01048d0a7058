/*
 *  types/index.ts — Barrel export for all type definitions
 *  cave-sight
 */

export * from "./constants.js";
export * from "./flags.js";
export * from "./enums.js";
export * from "./types.js";
