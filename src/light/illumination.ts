/*
 *  illumination.ts — Lighting, forgetting or relighting the whole level
 *  cave-sight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { SquareFlag, RedrawFlag, UPDATE_AFTER_RELIGHT } from "../types/flags.js";
import { nbDirs, nbDirsWithSelf } from "../globals/tables.js";
import { type Cave, squareInBounds, sqinfoOn, sqinfoOff } from "../grid/cave.js";
import { squareIsFloor, squareIsKnownTrap, squareIsShop, squareSeemsLikeWall } from "../grid/square-queries.js";
import type { Level } from "../game/level.js";
import { requestRedraw, requestUpdate } from "../game/upkeep.js";

export interface ObjectMemoryContext {
    /** Mark every object on the floor as known; `full` reveals what each one is. */
    memorizeObjects(full: boolean): void;
    /** Forget every object on the floor. */
    forgetObjects(): void;
}

const GLOW_AND_MARK = SquareFlag.GLOW | SquareFlag.MARK;

function requestRelight(level: Level): void {
    requestUpdate(level, UPDATE_AFTER_RELIGHT);
    requestRedraw(level, RedrawFlag.MAP | RedrawFlag.MONLIST | RedrawFlag.ITEMLIST);
}

/**
 * Light up and map the whole level. Every square next to open ground
 * glows; everything but plain floor is memorized.
 */
export function wizLight(level: Level, full: boolean, ctx: ObjectMemoryContext): void {
    const c = level.cave;

    ctx.memorizeObjects(full);

    for (let y = 1; y < c.height - 1; y++) {
        for (let x = 1; x < c.width - 1; x++) {
            if (squareSeemsLikeWall(c, y, x)) continue;

            for (const [dy, dx] of nbDirsWithSelf) {
                const yy = y + dy;
                const xx = x + dx;

                sqinfoOn(c, yy, xx, SquareFlag.GLOW);

                if (!squareIsFloor(c, yy, xx) || squareIsKnownTrap(c, yy, xx)) {
                    sqinfoOn(c, yy, xx, SquareFlag.MARK);
                }
            }
        }
    }

    requestRelight(level);
}

/** Forget the map, trap detection and every remembered object. */
export function wizDark(level: Level, ctx: ObjectMemoryContext): void {
    const c = level.cave;

    for (let y = 0; y < c.height; y++) {
        for (let x = 0; x < c.width; x++) {
            sqinfoOff(c, y, x, SquareFlag.MARK | SquareFlag.DTRAP | SquareFlag.DEDGE);
        }
    }

    ctx.forgetObjects();

    requestRelight(level);
}

function lightShopEntrances(c: Cave): void {
    for (let y = 0; y < c.height; y++) {
        for (let x = 0; x < c.width; x++) {
            if (!squareIsShop(c, y, x)) continue;

            for (const [dy, dx] of nbDirs) {
                const yy = y + dy;
                const xx = x + dx;
                if (!squareInBounds(c, yy, xx)) continue;
                sqinfoOn(c, yy, xx, GLOW_AND_MARK);
            }
        }
    }
}

/**
 * Light a surface level for day or darken it for night. At night only
 * non-floor squares and the ground around shop entrances stay lit.
 */
export function caveIlluminate(level: Level, daytime: boolean): void {
    const c = level.cave;

    for (let y = 0; y < c.height; y++) {
        for (let x = 0; x < c.width; x++) {
            if (daytime || !squareIsFloor(c, y, x)) {
                sqinfoOn(c, y, x, GLOW_AND_MARK);
            } else {
                sqinfoOff(c, y, x, GLOW_AND_MARK);
            }
        }
    }

    lightShopEntrances(c);

    requestRelight(level);
}
