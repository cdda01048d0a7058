/*
 *  terrain-ops.ts — Changing the feature on a square
 *  cave-sight
 *
 *  Every terrain change goes through squareSetFeat, which keeps the
 *  per-feature counts current and, once the level is live, memorizes and
 *  redraws the square.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Loc } from "../types/types.js";
import { Feat, DOOR_HEAD } from "../types/enums.js";
import { SquareFlag, GENERATION_WALL_FLAGS } from "../types/flags.js";
import { MAX_DEPTH } from "../types/constants.js";
import { randInt0, type RngState } from "../math/rng.js";
import { nbDirsWithSelf } from "../globals/tables.js";
import {
    type Cave,
    assertInBounds,
    sqinfoOn,
    sqinfoOff,
    squareInBoundsFully,
} from "./cave.js";
import {
    squareIsSeen,
    squareIsMark,
    squareIsLockedDoor,
    squareIsDoor,
    squareIsRubble,
    squareIsPassable,
} from "./square-queries.js";

// =============================================================================
// Context
// =============================================================================

/**
 * Hooks the grid calls when a square is memorized or needs repainting.
 * Both are fire-and-forget and must not call back into the engine.
 */
export interface SquareNoticeContext {
    /** The square should be repainted. */
    redrawSquare(y: number, x: number): void;
    /** The player now sees (y, x): mark the objects lying there as seen. */
    noteObjects(y: number, x: number): void;
}

/** Extra knowledge needed to place stairs. */
export interface StairContext extends SquareNoticeContext {
    isQuest(depth: number): boolean;
}

// =============================================================================
// Memorize / redraw
// =============================================================================

/**
 * Memorize the square if the player can see it. Objects on it are noted
 * even when the terrain was already memorized.
 */
export function squareNoteSpot(c: Cave, y: number, x: number, ctx: SquareNoticeContext): void {
    if (!squareIsSeen(c, y, x)) return;

    ctx.noteObjects(y, x);

    if (squareIsMark(c, y, x)) return;
    sqinfoOn(c, y, x, SquareFlag.MARK);
}

/** Ask the renderer to repaint (y, x). */
export function squareLightSpot(c: Cave, y: number, x: number, ctx: SquareNoticeContext): void {
    assertInBounds(c, y, x, "squareLightSpot");
    ctx.redrawSquare(y, x);
}

// =============================================================================
// Setting features
// =============================================================================

export function squareSetFeat(c: Cave, y: number, x: number, feat: number, ctx: SquareNoticeContext): void {
    assertInBounds(c, y, x, "squareSetFeat");
    if (feat < 0 || feat >= c.features.length) {
        throw new Error(`squareSetFeat: feature ${feat} is not in the catalog`);
    }

    const currentFeat = c.feat[y][x];
    if (currentFeat) c.featCount[currentFeat]--;
    if (feat) c.featCount[feat]++;

    c.feat[y][x] = feat;

    if (c.live) {
        squareNoteSpot(c, y, x, ctx);
        squareLightSpot(c, y, x, ctx);
    } else {
        // Generation wall roles only describe the feature they were set on
        sqinfoOff(c, y, x, GENERATION_WALL_FLAGS);
    }
}

// ----- Doors -----

/** Lock power of a closed door, 0 for an unlocked one. */
export function squareDoorPower(c: Cave, y: number, x: number): number {
    assertInBounds(c, y, x, "squareDoorPower");
    return (c.feat[y][x] - DOOR_HEAD) & 0x07;
}

export function squareOpenDoor(c: Cave, y: number, x: number, ctx: SquareNoticeContext): void {
    squareSetFeat(c, y, x, Feat.OPEN, ctx);
}

export function squareCloseDoor(c: Cave, y: number, x: number, ctx: SquareNoticeContext): void {
    squareSetFeat(c, y, x, DOOR_HEAD, ctx);
}

export function squareSmashDoor(c: Cave, y: number, x: number, ctx: SquareNoticeContext): void {
    squareSetFeat(c, y, x, Feat.BROKEN, ctx);
}

/** Lock the door with a power of 1 to 7. */
export function squareLockDoor(c: Cave, y: number, x: number, power: number, ctx: SquareNoticeContext): void {
    if (!Number.isInteger(power) || power < 1 || power > 7) {
        throw new Error(`squareLockDoor: lock power must be an integer in 1..7, got ${power}`);
    }
    squareSetFeat(c, y, x, DOOR_HEAD + power, ctx);
}

export function squareUnlockDoor(c: Cave, y: number, x: number, ctx: SquareNoticeContext): void {
    if (!squareIsLockedDoor(c, y, x)) {
        throw new Error(`squareUnlockDoor: no locked door at (${y}, ${x})`);
    }
    squareSetFeat(c, y, x, DOOR_HEAD, ctx);
}

export function squareDestroyDoor(c: Cave, y: number, x: number, ctx: SquareNoticeContext): void {
    if (!squareIsDoor(c, y, x)) {
        throw new Error(`squareDestroyDoor: no door at (${y}, ${x})`);
    }
    squareSetFeat(c, y, x, Feat.FLOOR, ctx);
}

export function squareAddDoor(c: Cave, y: number, x: number, closed: boolean, ctx: SquareNoticeContext): void {
    squareSetFeat(c, y, x, closed ? DOOR_HEAD : Feat.OPEN, ctx);
}

// ----- Walls and rubble -----

export function squareDestroyRubble(c: Cave, y: number, x: number, ctx: SquareNoticeContext): void {
    if (!squareIsRubble(c, y, x)) {
        throw new Error(`squareDestroyRubble: no rubble at (${y}, ${x})`);
    }
    squareSetFeat(c, y, x, Feat.FLOOR, ctx);
}

export function squareTunnelWall(c: Cave, y: number, x: number, ctx: SquareNoticeContext): void {
    squareSetFeat(c, y, x, Feat.FLOOR, ctx);
}

export function squareDestroyWall(c: Cave, y: number, x: number, ctx: SquareNoticeContext): void {
    squareSetFeat(c, y, x, Feat.FLOOR, ctx);
}

export function squareForceFloor(c: Cave, y: number, x: number, ctx: SquareNoticeContext): void {
    squareSetFeat(c, y, x, Feat.FLOOR, ctx);
}

/** Add visible treasure to a plain mineral vein. */
export function upgradeMineral(c: Cave, y: number, x: number, ctx: SquareNoticeContext): void {
    assertInBounds(c, y, x, "upgradeMineral");
    switch (c.feat[y][x]) {
        case Feat.MAGMA: squareSetFeat(c, y, x, Feat.MAGMA_K, ctx); break;
        case Feat.QUARTZ: squareSetFeat(c, y, x, Feat.QUARTZ_K, ctx); break;
    }
}

/** Reveal the treasure in a vein that was hiding it. */
export function squareShowVein(c: Cave, y: number, x: number, ctx: SquareNoticeContext): void {
    assertInBounds(c, y, x, "squareShowVein");
    if (c.feat[y][x] === Feat.MAGMA_H) {
        squareSetFeat(c, y, x, Feat.MAGMA_K, ctx);
    } else if (c.feat[y][x] === Feat.QUARTZ_H) {
        squareSetFeat(c, y, x, Feat.QUARTZ_K, ctx);
    }
}

// ----- Random terrain -----

/**
 * Place a staircase. Stairs lead down half the time; always down from the
 * town, and never down from a quest level or the bottom of the dungeon.
 */
export function squareAddStairs(
    c: Cave,
    y: number,
    x: number,
    depth: number,
    rng: RngState,
    ctx: StairContext,
): void {
    let down = randInt0(rng, 100) < 50;
    if (depth === 0) {
        down = true;
    } else if (ctx.isQuest(depth) || depth >= MAX_DEPTH - 1) {
        down = false;
    }
    squareSetFeat(c, y, x, down ? Feat.MORE : Feat.LESS, ctx);
}

/** Rubble left behind by a destruction effect: mostly floor, sometimes wall. */
export function squareDestroy(c: Cave, y: number, x: number, rng: RngState, ctx: SquareNoticeContext): void {
    let feat: Feat = Feat.FLOOR;
    const r = randInt0(rng, 200);

    if (r < 20) {
        feat = Feat.GRANITE;
    } else if (r < 70) {
        feat = Feat.QUARTZ;
    } else if (r < 100) {
        feat = Feat.MAGMA;
    }
    squareSetFeat(c, y, x, feat, ctx);
}

/** Earthquakes open up walls and fill in open squares. */
export function squareEarthquake(c: Cave, y: number, x: number, rng: RngState, ctx: SquareNoticeContext): void {
    if (!squareIsPassable(c, y, x)) {
        squareSetFeat(c, y, x, Feat.FLOOR, ctx);
        return;
    }

    const t = randInt0(rng, 100);
    let feat: Feat;
    if (t < 20) {
        feat = Feat.GRANITE;
    } else if (t < 70) {
        feat = Feat.QUARTZ;
    } else {
        feat = Feat.MAGMA;
    }
    squareSetFeat(c, y, x, feat, ctx);
}

// =============================================================================
// Counting
// =============================================================================

export interface FeatCount {
    count: number;
    /** The last matching square, or null when nothing matched. */
    loc: Loc | null;
}

/**
 * Count memorized squares around `from` that pass `test`, including `from`
 * itself when `under` is set.
 */
export function countFeats(
    c: Cave,
    from: Loc,
    test: (c: Cave, y: number, x: number) => boolean,
    under: boolean,
): FeatCount {
    let count = 0;
    let loc: Loc | null = null;

    for (const [dy, dx] of nbDirsWithSelf) {
        if (dy === 0 && dx === 0 && !under) continue;

        const yy = from.y + dy;
        const xx = from.x + dx;
        if (!squareInBoundsFully(c, yy, xx)) continue;
        if (!squareIsMark(c, yy, xx)) continue;
        if (!test(c, yy, xx)) continue;

        count++;
        loc = { y: yy, x: xx };
    }
    return { count, loc };
}
