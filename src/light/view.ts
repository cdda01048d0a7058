/*
 *  view.ts — Recomputing which squares the player can view and see
 *  cave-sight
 *
 *  VIEW means a square is in line of sight; SEEN means it is in view and
 *  lit, either by the player's light, by its own GLOW, or by a monster
 *  carrying a light. SEEN is never set without VIEW.
 *
 *  updateView runs to completion in one call. WAS_SEEN is only used inside
 *  it, to tell which squares changed, and is clear again when it returns.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { LightCarrier, Observer } from "../types/types.js";
import { SquareFlag } from "../types/flags.js";
import { FEELING1, MAX_SIGHT } from "../types/constants.js";
import { nbDirsWithSelf } from "../globals/tables.js";
import { type Cave, assertInBounds, squareInBounds, sqinfoOn, sqinfoOff } from "../grid/cave.js";
import {
    squareIsView,
    squareIsSeen,
    squareWasSeen,
    squareIsGlow,
    squareIsWall,
    squareIsProjectable,
    squareIsFeel,
} from "../grid/square-queries.js";
import { squareNoteSpot, squareLightSpot, type SquareNoticeContext } from "../grid/terrain-ops.js";
import { distance, los } from "./los.js";

// =============================================================================
// Context
// =============================================================================

export interface ViewContext extends SquareNoticeContext {
    /** Every monster on the level that might carry a light. */
    lightCarriers(): Iterable<LightCarrier>;
    /** Enough feeling squares have been seen: show the level feeling. */
    displayFeeling(): void;
}

// =============================================================================
// Forgetting
// =============================================================================

/** Clear VIEW and SEEN everywhere, redrawing each square that had VIEW. */
export function forgetView(c: Cave, ctx: SquareNoticeContext): void {
    for (let y = 0; y < c.height; y++) {
        for (let x = 0; x < c.width; x++) {
            if (!squareIsView(c, y, x)) continue;
            sqinfoOff(c, y, x, SquareFlag.VIEW | SquareFlag.SEEN);
            squareLightSpot(c, y, x, ctx);
        }
    }
}

// =============================================================================
// Pass steps
// =============================================================================

/** Remember which squares were seen, then clear VIEW and SEEN. */
function markWasSeen(c: Cave): void {
    for (let y = 0; y < c.height; y++) {
        for (let x = 0; x < c.width; x++) {
            if (squareIsSeen(c, y, x)) {
                sqinfoOn(c, y, x, SquareFlag.WAS_SEEN);
            }
            sqinfoOff(c, y, x, SquareFlag.VIEW | SquareFlag.SEEN);
        }
    }
}

/**
 * Light the 3×3 box around every light-carrying monster. A monster out of
 * sight only lights open squares, so its light cannot reveal walls the
 * player could not otherwise see.
 */
function addMonsterLights(c: Cave, from: Observer, maxSight: number, ctx: ViewContext): void {
    for (const m of ctx.lightCarriers()) {
        if (!m.alive || !m.carriesLight) continue;

        const inLos = los(c, from.y, from.x, m.y, m.x);

        for (const [dy, dx] of nbDirsWithSelf) {
            const sy = m.y + dy;
            const sx = m.x + dx;
            if (!squareInBounds(c, sy, sx)) continue;

            if (!inLos && !squareIsProjectable(c, sy, sx)) continue;
            if (distance(from.y, from.x, sy, sx) > maxSight) continue;
            if (!los(c, from.y, from.x, sy, sx)) continue;

            sqinfoOn(c, sy, sx, SquareFlag.VIEW | SquareFlag.SEEN);
        }
    }
}

/** Step one square toward the player on each axis. */
function stepToward(y: number, x: number, py: number, px: number): [number, number] {
    const yc = y < py ? y + 1 : y > py ? y - 1 : y;
    const xc = x < px ? x + 1 : x > px ? x - 1 : x;
    return [yc, xc];
}

function becomeViewable(c: Cave, y: number, x: number, lit: boolean, py: number, px: number): void {
    if (squareIsView(c, y, x)) return;

    sqinfoOn(c, y, x, SquareFlag.VIEW);

    if (lit) {
        sqinfoOn(c, y, x, SquareFlag.SEEN);
    }

    if (squareIsGlow(c, y, x)) {
        // A glowing wall is only seen if the floor in front of it glows too
        let [yc, xc] = [y, x];
        if (squareIsWall(c, y, x)) {
            [yc, xc] = stepToward(y, x, py, px);
        }
        if (squareIsGlow(c, yc, xc)) {
            sqinfoOn(c, y, x, SquareFlag.SEEN);
        }
    }
}

function updateViewOne(
    c: Cave,
    y: number,
    x: number,
    radius: number,
    py: number,
    px: number,
    maxSight: number,
): void {
    const d = distance(y, x, py, px);
    const lit = d < radius;

    if (d > maxSight) return;

    let yc = y;
    let xc = x;

    // A wall takes its line of sight from the square in front of it, so that
    // in
    //
    //     #1#############
    //     #............@#
    //     ###############
    //
    // the wall marked 1 is seen even though the sightline to it runs into
    // the wall beside it.
    if (squareIsWall(c, y, x)) {
        const dx = x - px;
        const dy = y - py;
        const ax = Math.abs(dx);
        const ay = Math.abs(dy);
        const sx = dx > 0 ? 1 : -1;
        const sy = dy > 0 ? 1 : -1;

        [yc, xc] = stepToward(y, x, py, px);

        // Never borrow from another wall, or both faces of a
        // double-thickness wall would show
        if (squareIsWall(c, yc, xc)) {
            yc = y;
            xc = x;
        }

        // Squares only reachable through the knight's-move exception
        // don't get to borrow either
        if (ax === 2 && ay === 1) {
            if (!squareIsWall(c, y, x - sx) && squareIsWall(c, y - sy, x - sx)) {
                yc = y;
                xc = x;
            }
        } else if (ax === 1 && ay === 2) {
            if (!squareIsWall(c, y - sy, x) && squareIsWall(c, y - sy, x - sx)) {
                yc = y;
                xc = x;
            }
        }
    }

    if (los(c, py, px, yc, xc)) {
        becomeViewable(c, y, x, lit, py, px);
    }
}

/** Settle one square after the scan and report what changed. */
function updateOne(c: Cave, y: number, x: number, blind: boolean, ctx: ViewContext): void {
    if (blind) {
        sqinfoOff(c, y, x, SquareFlag.SEEN);
    }

    const seen = squareIsSeen(c, y, x);
    const wasSeen = squareWasSeen(c, y, x);

    if (seen && !wasSeen) {
        if (squareIsFeel(c, y, x)) {
            c.feelingSquares++;
            sqinfoOff(c, y, x, SquareFlag.FEEL);
            if (c.feelingSquares === FEELING1) {
                ctx.displayFeeling();
            }
        }
        squareNoteSpot(c, y, x, ctx);
        squareLightSpot(c, y, x, ctx);
    }

    if (!seen && wasSeen) {
        squareLightSpot(c, y, x, ctx);
    }

    sqinfoOff(c, y, x, SquareFlag.WAS_SEEN);
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Recompute VIEW and SEEN for the whole cave from the observer's position.
 * Call after the observer moves, its light or blindness changes, or terrain
 * or GLOW changes anywhere it might see.
 *
 * Newly seen squares are memorized and redrawn; squares that stop being
 * seen are redrawn. Running it twice with nothing changed in between
 * writes the same flags and reports nothing the second time.
 */
export function updateView(
    c: Cave,
    observer: Observer,
    ctx: ViewContext,
    maxSight: number = MAX_SIGHT,
): void {
    const py = observer.y;
    const px = observer.x;
    assertInBounds(c, py, px, "updateView");

    markWasSeen(c);

    // A light of radius r lights squares at distance < r + 1
    let radius = observer.lightRadius;
    if (radius > 0) ++radius;

    addMonsterLights(c, observer, maxSight, ctx);

    // The player's own square is always in view
    sqinfoOn(c, py, px, SquareFlag.VIEW);
    if (radius > 0 || squareIsGlow(c, py, px)) {
        sqinfoOn(c, py, px, SquareFlag.SEEN);
    }

    for (let y = 0; y < c.height; y++) {
        for (let x = 0; x < c.width; x++) {
            updateViewOne(c, y, x, radius, py, px, maxSight);
        }
    }

    for (let y = 0; y < c.height; y++) {
        for (let x = 0; x < c.width; x++) {
            updateOne(c, y, x, observer.blind, ctx);
        }
    }
}

/** True if (y, x) is in the player's line of sight. */
export function playerHasLos(c: Cave, y: number, x: number): boolean {
    return squareIsView(c, y, x);
}

/** True if the player can see (y, x): in view and lit. */
export function playerCanSee(c: Cave, y: number, x: number): boolean {
    return squareIsSeen(c, y, x);
}

/** True if the observer is standing in the dark. */
export function noLight(c: Cave, observer: Observer): boolean {
    return !playerCanSee(c, observer.y, observer.x);
}
