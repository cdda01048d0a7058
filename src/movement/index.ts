/*
 *  movement/index.ts — Barrel export for flow and scatter
 *  cave-sight
 */

export * from "./flow.js";
export * from "./scatter.js";
