/*
 *  flags.ts — Bitfield flag constants for squares and terrain features
 *  cave-sight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

/**
 * Fl(N) — Unsigned 32-bit flag at bit position N.
 */
export function Fl(n: number): number {
    return (1 << n) >>> 0;
}

// ===== squareFlags (per-square info word) =====

export const SquareFlag = {
    MARK:           Fl(0),  // memorized feature
    GLOW:           Fl(1),  // self-illuminating
    VAULT:          Fl(2),
    ROOM:           Fl(3),
    SEEN:           Fl(4),  // in view and lit
    VIEW:           Fl(5),  // in line of sight
    WAS_SEEN:       Fl(6),  // only set during updateView
    FEEL:           Fl(7),  // counts toward the level feeling
    DTRAP:          Fl(8),  // trap detected
    DEDGE:          Fl(9),  // on the edge of a trap-detected area
    TRAP:           Fl(10), // known trap
    INVIS:          Fl(11), // unknown trap
    WALL_INNER:     Fl(12),
    WALL_OUTER:     Fl(13),
    WALL_SOLID:     Fl(14),
    MON_RESTRICT:   Fl(15),
    NO_TELEPORT:    Fl(16),
    NO_MAP:         Fl(17),
    NO_ESP:         Fl(18),
} as const;

/** Cleared whenever a feature is placed while the level is still being built. */
export const GENERATION_WALL_FLAGS = (
    SquareFlag.WALL_INNER | SquareFlag.WALL_OUTER | SquareFlag.WALL_SOLID
) >>> 0;

// ===== terrainFlags (per-feature catalog flags) =====

export const TerrainFlag = {
    LOS:            Fl(0),
    PROJECT:        Fl(1),
    PASSABLE:       Fl(2),
    INTERESTING:    Fl(3),
    PERMANENT:      Fl(4),
    NO_FLOW:        Fl(5),
    FLOOR:          Fl(6),
    WALL:           Fl(7),
    ROCK:           Fl(8),
    GRANITE:        Fl(9),
    DOOR_ANY:       Fl(10),
    DOOR_CLOSED:    Fl(11),
    DOOR_LOCKED:    Fl(12),
    DOOR_JAMMED:    Fl(13),
    CLOSABLE:       Fl(14),
    SHOP:           Fl(15),
    MAGMA:          Fl(16),
    QUARTZ:         Fl(17),
    STAIR:          Fl(18),
    UPSTAIR:        Fl(19),
    DOWNSTAIR:      Fl(20),
    GOLD:           Fl(21),
} as const;

// Composite terrain flags
export const TF_OPEN_GROUND = (
    TerrainFlag.LOS | TerrainFlag.PROJECT | TerrainFlag.PASSABLE
) >>> 0;

export const TF_SOLID_ROCK = (
    TerrainFlag.WALL | TerrainFlag.ROCK | TerrainFlag.NO_FLOW | TerrainFlag.INTERESTING
) >>> 0;

// ===== update / redraw requests =====

export const UpdateFlag = {
    FORGET_VIEW:    Fl(0),
    UPDATE_VIEW:    Fl(1),
    MONSTERS:       Fl(2),
    FORGET_FLOW:    Fl(3),
    UPDATE_FLOW:    Fl(4),
} as const;

/** Everything a change in lighting invalidates. */
export const UPDATE_AFTER_RELIGHT = (
    UpdateFlag.FORGET_VIEW | UpdateFlag.UPDATE_VIEW | UpdateFlag.MONSTERS
) >>> 0;

export const RedrawFlag = {
    MAP:            Fl(0),
    MONLIST:        Fl(1),
    ITEMLIST:       Fl(2),
} as const;
