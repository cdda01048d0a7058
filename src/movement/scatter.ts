/*
 *  scatter.ts — Picking a random square near a point
 *  cave-sight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Loc } from "../types/types.js";
import { randSpread } from "../math/rng.js";
import { squareInBoundsFully } from "../grid/cave.js";
import { distance, los } from "../light/los.js";
import type { Level } from "../game/level.js";

/**
 * A random square within `d` of (y, x), never on the outer edge of the
 * cave. With `needLos` the square must also be in line of sight of
 * (y, x). For `d` of 0 or 1 the whole square box is allowed, corners
 * included.
 */
export function scatter(level: Level, y: number, x: number, d: number, needLos: boolean): Loc {
    const c = level.cave;

    // Guarantees (y, x) itself is always acceptable, so the loop ends
    if (!squareInBoundsFully(c, y, x)) {
        throw new Error(`scatter: (${y}, ${x}) is not inside the ${c.height}x${c.width} cave's border`);
    }
    if (!Number.isInteger(d) || d < 0) {
        throw new Error(`scatter: distance must be a non-negative integer, got ${d}`);
    }

    for (;;) {
        const ny = randSpread(level.rng, y, d);
        const nx = randSpread(level.rng, x, d);

        if (!squareInBoundsFully(c, ny, nx)) continue;
        if (d > 1 && distance(y, x, ny, nx) > d) continue;
        if (needLos && !los(c, y, x, ny, nx)) continue;

        return { y: ny, x: nx };
    }
}
