/*
 *  enums.ts — Enumerations shared across the engine
 *  cave-sight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

// ===== Terrain features =====

/** Indices into the default feature catalog. */
export enum Feat {
    NONE = 0,
    FLOOR,
    // Doors: DOOR_HEAD is an unlocked closed door, +1..+7 are lock powers
    CLOSED,
    LOCKED_1,
    LOCKED_2,
    LOCKED_3,
    LOCKED_4,
    LOCKED_5,
    LOCKED_6,
    LOCKED_7,
    OPEN,
    BROKEN,
    LESS,
    MORE,
    SHOP_HEAD,
    SECRET,
    RUBBLE,
    MAGMA,
    QUARTZ,
    MAGMA_H,
    QUARTZ_H,
    MAGMA_K,
    QUARTZ_K,
    GRANITE,
    PERM,
}

export const DOOR_HEAD = Feat.CLOSED;

// ===== Monsters =====

/** How readily a monster reacts to sudden light. */
export enum MonsterTemper {
    Normal,
    Stupid,
    Smart,
}

// ===== Display =====

/** Lighting reported to the renderer for a square. */
export enum Lighting {
    /** Not lit, or not known. */
    Dark,
    /** Remembered and permanently lit, but out of view. */
    Lit,
    /** In view, lit only by the player's light. */
    Torch,
    /** In view and lit. */
    Los,
}
