/*
 *  constants.ts — Tunable limits for sight, flow and level feelings
 *  cave-sight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

// ----- Sight -----

/** Squares farther than this (by `distance`) are never in view. */
export const MAX_SIGHT = 20;

// ----- Flow -----

/** Capacity of the circular queue used by a flow pass. */
export const FLOW_MAX = 2048;

/** Squares at this cost are not expanded by a flow pass. */
export const MONSTER_FLOW_DEPTH = 32;

/** `when` stamps are bytes; the generation counter cycles below this. */
export const FLOW_GENERATION_LIMIT = 255;

/** Half of the stamp range: the "new" half survives a cycle. */
export const FLOW_GENERATION_HALF = 128;

// ----- Level feeling -----

/** Number of feeling squares seen before the level feeling is shown. */
export const FEELING1 = 10;

// ----- Dungeon -----

export const MAX_DEPTH = 128;

/** Chance (in percent) that light wakes a sleeping monster, by temper. */
export const WAKE_CHANCE_NORMAL = 25;
export const WAKE_CHANCE_STUPID = 10;
export const WAKE_CHANCE_SMART = 100;
