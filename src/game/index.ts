/*
 *  game/index.ts — Barrel export for levels and deferred updates
 *  cave-sight
 *
 *  Re-exports:
 *    - level.ts  (createLevel, placeObserver, setObserverSight)
 *    - upkeep.ts (requestUpdate, requestRedraw, takeRedraw, updateStuff)
 */

export * from "./level.js";
export * from "./upkeep.js";
