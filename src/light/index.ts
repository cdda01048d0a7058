/*
 *  light/index.ts — Barrel export for sightlines, view and lighting
 *  cave-sight
 */

export * from "./los.js";
export * from "./view.js";
export * from "./room-light.js";
export * from "./illumination.js";
