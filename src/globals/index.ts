/*
 *  globals/index.ts — Barrel export for the static tables
 *  cave-sight
 */

export * from "./tables.js";
export * from "./feature-catalog.js";
