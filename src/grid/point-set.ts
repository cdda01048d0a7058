/*
 *  point-set.ts — Ordered, duplicate-free collection of squares
 *  cave-sight
 *
 *  Points may be added while the set is being walked by index, which is how
 *  the room flood does a breadth-first search without a separate queue.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Loc } from "../types/types.js";

export class PointSet {
    private readonly pts: Loc[] = [];
    private readonly members = new Set<string>();

    /** Number of points added so far. */
    get size(): number {
        return this.pts.length;
    }

    /** The i'th point, in insertion order. */
    at(i: number): Loc {
        const pt = this.pts[i];
        if (pt === undefined) {
            throw new Error(`PointSet.at: index ${i} out of range (size ${this.pts.length})`);
        }
        return pt;
    }

    contains(y: number, x: number): boolean {
        return this.members.has(key(y, x));
    }

    /** Append (y, x) unless already present. Returns true if it was added. */
    add(y: number, x: number): boolean {
        const k = key(y, x);
        if (this.members.has(k)) {
            return false;
        }
        this.members.add(k);
        this.pts.push({ y, x });
        return true;
    }

    [Symbol.iterator](): Iterator<Loc> {
        return this.pts[Symbol.iterator]();
    }
}

function key(y: number, x: number): string {
    return `${y},${x}`;
}
