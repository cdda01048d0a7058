/*
 *  los.ts — Approximate distance and integer line of sight
 *  cave-sight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Cave } from "../grid/cave.js";
import { squareIsProjectable } from "../grid/square-queries.js";

// =============================================================================
// Distance
// =============================================================================

/**
 * Approximate distance between two squares: max(dy,dx) + min(dy,dx) / 2.
 *
 * Nearly exact when one component dwarfs the other; otherwise it
 * over-estimates by about one square in fifteen.
 */
export function distance(y1: number, x1: number, y2: number, x2: number): number {
    const ay = Math.abs(y2 - y1);
    const ax = Math.abs(x2 - x1);
    return ay > ax ? ay + (ax >> 1) : ax + (ay >> 1);
}

// =============================================================================
// Line of sight
// =============================================================================

/**
 * True if a line can be traced from the centre of (y1, x1) to the centre of
 * (y2, x2) with every square strictly between them projectable.
 *
 * The knight's move gets special treatment: it succeeds when the square
 * one step along the longer axis is open, so a monster around a wall corner
 * can still be seen. Apart from knight's moves the test is symmetric.
 *
 * The slope is kept as a fraction scaled by 2·|dy|·|dx|; we walk the longer
 * axis from the border between the first and second squares and step the
 * shorter axis when the fraction crosses the half-way mark. A line that only
 * brushes the corner of a square (the fraction lands exactly on it) does not
 * test that square.
 */
export function los(c: Cave, y1: number, x1: number, y2: number, x2: number): boolean {
    const dy = y2 - y1;
    const dx = x2 - x1;
    const ay = Math.abs(dy);
    const ax = Math.abs(dx);

    // Adjacent or identical
    if (ax < 2 && ay < 2) return true;

    // Directly north or south
    if (dx === 0) {
        if (dy > 0) {
            for (let ty = y1 + 1; ty < y2; ty++) {
                if (!squareIsProjectable(c, ty, x1)) return false;
            }
        } else {
            for (let ty = y1 - 1; ty > y2; ty--) {
                if (!squareIsProjectable(c, ty, x1)) return false;
            }
        }
        return true;
    }

    // Directly east or west
    if (dy === 0) {
        if (dx > 0) {
            for (let tx = x1 + 1; tx < x2; tx++) {
                if (!squareIsProjectable(c, y1, tx)) return false;
            }
        } else {
            for (let tx = x1 - 1; tx > x2; tx--) {
                if (!squareIsProjectable(c, y1, tx)) return false;
            }
        }
        return true;
    }

    const sx = dx < 0 ? -1 : 1;
    const sy = dy < 0 ? -1 : 1;

    // Knight's moves
    if (ax === 1) {
        if (ay === 2 && squareIsProjectable(c, y1 + sy, x1)) return true;
    } else if (ay === 1) {
        if (ax === 2 && squareIsProjectable(c, y1, x1 + sx)) return true;
    }

    // Scale factor and its half
    const f2 = ax * ay;
    const f1 = f2 * 2;

    if (ax >= ay) {
        // Travel horizontally; m = dy / dx scaled by 2·dy·dx
        let qy = ay * ay;
        const m = qy * 2;
        let tx = x1 + sx;
        let ty: number;

        // Slope exactly 1
        if (qy === f2) {
            ty = y1 + sy;
            qy -= f1;
        } else {
            ty = y1;
        }

        while (x2 - tx !== 0) {
            if (!squareIsProjectable(c, ty, tx)) return false;

            qy += m;
            if (qy < f2) {
                tx += sx;
            } else if (qy > f2) {
                ty += sy;
                if (!squareIsProjectable(c, ty, tx)) return false;
                qy -= f1;
                tx += sx;
            } else {
                // The line meets the corner exactly
                ty += sy;
                qy -= f1;
                tx += sx;
            }
        }
    } else {
        // Travel vertically; m = dx / dy scaled by 2·dx·dy
        let qx = ax * ax;
        const m = qx * 2;
        let ty = y1 + sy;
        let tx: number;

        if (qx === f2) {
            tx = x1 + sx;
            qx -= f1;
        } else {
            tx = x1;
        }

        while (y2 - ty !== 0) {
            if (!squareIsProjectable(c, ty, tx)) return false;

            qx += m;
            if (qx < f2) {
                ty += sy;
            } else if (qx > f2) {
                tx += sx;
                if (!squareIsProjectable(c, ty, tx)) return false;
                qx -= f1;
                ty += sy;
            } else {
                tx += sx;
                qx -= f1;
                ty += sy;
            }
        }
    }

    return true;
}
