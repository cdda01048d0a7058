/*
 *  grid/index.ts — Barrel export for the cave and its squares
 *  cave-sight
 */

export * from "./cave.js";
export * from "./point-set.js";
export * from "./square-queries.js";
export * from "./terrain-ops.js";
export * from "./map-info.js";
