/*
 *  math/index.ts — Barrel export for the RNG
 *  cave-sight
 */

export * from "./rng.js";
