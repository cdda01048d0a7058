/*
 *  room-light.ts — Lighting or darkening a whole room at once
 *  cave-sight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Occupant } from "../types/types.js";
import { MonsterTemper } from "../types/enums.js";
import { SquareFlag, UPDATE_AFTER_RELIGHT } from "../types/flags.js";
import { WAKE_CHANCE_NORMAL, WAKE_CHANCE_SMART, WAKE_CHANCE_STUPID } from "../types/constants.js";
import { randPercent } from "../math/rng.js";
import { nbDirs } from "../globals/tables.js";
import { type Cave, assertInBounds, squareInBounds, sqinfoOn, sqinfoOff } from "../grid/cave.js";
import { PointSet } from "../grid/point-set.js";
import { squareIsRoom, squareIsProjectable, squareIsInteresting } from "../grid/square-queries.js";
import { squareLightSpot } from "../grid/terrain-ops.js";
import type { Level } from "../game/level.js";
import { requestUpdate, updateStuff, type UpdateContext } from "../game/upkeep.js";

// =============================================================================
// Context
// =============================================================================

export interface RoomLightContext extends UpdateContext {
    /** The monster with index `idx`, or null if that slot is empty. */
    monsterAt(idx: number): Occupant | null;
    /** Clear the monster's sleep. */
    wakeMonster(monster: Occupant): void;
}

// =============================================================================
// Collecting the room
// =============================================================================

function addRoomSquare(c: Cave, seen: PointSet, y: number, x: number): void {
    if (!squareInBounds(c, y, x)) return;
    if (seen.contains(y, x)) return;
    if (!squareIsRoom(c, y, x)) return;
    seen.add(y, x);
}

/**
 * Every ROOM square connected to (y, x) through the 8-neighbourhood.
 * Walls are collected, so they get lit too, but the flood stops at them.
 */
export function collectRoom(c: Cave, y: number, x: number): PointSet {
    const ps = new PointSet();
    addRoomSquare(c, ps, y, x);

    // The set grows while we walk it
    for (let i = 0; i < ps.size; i++) {
        const pt = ps.at(i);
        if (!squareIsProjectable(c, pt.y, pt.x)) continue;

        for (const [dy, dx] of nbDirs) {
            addRoomSquare(c, ps, pt.y + dy, pt.x + dx);
        }
    }
    return ps;
}

// =============================================================================
// Lighting and darkening
// =============================================================================

function wakeChance(temper: MonsterTemper): number {
    switch (temper) {
        case MonsterTemper.Stupid: return WAKE_CHANCE_STUPID;
        case MonsterTemper.Smart: return WAKE_CHANCE_SMART;
        default: return WAKE_CHANCE_NORMAL;
    }
}

/**
 * Perma-light every square in the set. Smart monsters always wake when
 * their room lights up, normal ones a quarter of the time, stupid ones
 * one time in ten.
 */
function caveLight(level: Level, ps: PointSet, ctx: RoomLightContext): void {
    const c = level.cave;

    for (const pt of ps) {
        sqinfoOn(c, pt.y, pt.x, SquareFlag.GLOW);
    }

    requestUpdate(level, UPDATE_AFTER_RELIGHT);
    updateStuff(level, ctx);

    for (const pt of ps) {
        squareLightSpot(c, pt.y, pt.x, ctx);

        const idx = c.mIdx[pt.y][pt.x];
        if (idx <= 0) continue;

        const monster = ctx.monsterAt(idx);
        if (monster === null) continue;

        if (monster.asleep && randPercent(level.rng, wakeChance(monster.temper))) {
            ctx.wakeMonster(monster);
        }
    }
}

/** Darken every square in the set, forgetting the boring ones. */
function caveUnlight(level: Level, ps: PointSet, ctx: RoomLightContext): void {
    const c = level.cave;

    for (const pt of ps) {
        sqinfoOff(c, pt.y, pt.x, SquareFlag.GLOW);
        if (!squareIsInteresting(c, pt.y, pt.x)) {
            sqinfoOff(c, pt.y, pt.x, SquareFlag.MARK);
        }
    }

    requestUpdate(level, UPDATE_AFTER_RELIGHT);
    updateStuff(level, ctx);

    for (const pt of ps) {
        squareLightSpot(c, pt.y, pt.x, ctx);
    }
}

/**
 * Light (`light` true) or darken the room containing (y, x). A seed that
 * is not part of a room affects nothing; one outside the cave throws.
 */
export function lightRoom(level: Level, y: number, x: number, light: boolean, ctx: RoomLightContext): void {
    assertInBounds(level.cave, y, x, "lightRoom");
    const ps = collectRoom(level.cave, y, x);
    if (light) {
        caveLight(level, ps, ctx);
    } else {
        caveUnlight(level, ps, ctx);
    }
}
