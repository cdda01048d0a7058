/*
 *  flow.ts — Breadth-first flow field toward the player
 *  cave-sight
 *
 *  Every square the player can reach within the flow depth gets its step
 *  count in `cost` and the current generation in `when`. Monsters compare
 *  `when` values to tell fresh flow from a trail the player left earlier.
 *
 *  Stamps are bytes. Generations 1..127 are "old" data and 128..255 "new":
 *  when the counter passes 255, every stamp is shifted down by 128 (or
 *  zeroed) and counting resumes at 128, so recent trails keep their order
 *  without clearing the whole grid every 255 turns.
 *
 *  Every step costs one, diagonals included, so a plain FIFO visits
 *  squares in cost order; no priority queue is needed.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Loc } from "../types/types.js";
import { TerrainFlag } from "../types/flags.js";
import {
    FLOW_MAX,
    FLOW_GENERATION_HALF,
    FLOW_GENERATION_LIMIT,
    MONSTER_FLOW_DEPTH,
} from "../types/constants.js";
import { nbDirs } from "../globals/tables.js";
import { type Cave, assertInBounds, squareInBounds, squareHasTerrainFlag, fillGrid } from "../grid/cave.js";

// =============================================================================
// State
// =============================================================================

/**
 * Flow bookkeeping for one level. The queues are reused from pass to pass;
 * a fresh state is needed whenever the cave changes.
 */
export interface FlowState {
    /** Current generation; 0 means no flow has been computed. */
    generation: number;
    readonly queueY: Uint16Array;
    readonly queueX: Uint16Array;
}

export function createFlowState(capacity: number = FLOW_MAX): FlowState {
    if (!Number.isInteger(capacity) || capacity < 2) {
        throw new Error(`createFlowState: queue capacity must be an integer >= 2, got ${capacity}`);
    }
    return {
        generation: 0,
        queueY: new Uint16Array(capacity),
        queueX: new Uint16Array(capacity),
    };
}

// =============================================================================
// Generation cycling
// =============================================================================

/** Advance the generation, shifting every stamp down once it passes 255. */
function cycleFlow(c: Cave, flow: FlowState): number {
    if (flow.generation++ === FLOW_GENERATION_LIMIT) {
        for (let y = 0; y < c.height; y++) {
            const row = c.when[y];
            for (let x = 0; x < c.width; x++) {
                const w = row[x];
                row[x] = w >= FLOW_GENERATION_HALF ? w - FLOW_GENERATION_HALF : 0;
            }
        }
        flow.generation = FLOW_GENERATION_HALF;
    }
    return flow.generation;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Forget all flow information. Does nothing if no flow has been computed
 * since the last reset.
 */
export function forgetFlow(c: Cave, flow: FlowState): void {
    if (!flow.generation) return;

    fillGrid(c.cost, 0);
    fillGrid(c.when, 0);
    flow.generation = 0;
}

/**
 * Fill in `cost` and `when` for every square reachable from `origin` in at
 * most `maxDepth` steps. Squares at `maxDepth` are reached but not expanded.
 *
 * Walls and rubble (NO_FLOW) are never entered. When the queue is full the
 * newly found square is dropped from it; its stamp stays, but the flood
 * does not continue from it.
 */
export function updateFlow(
    c: Cave,
    flow: FlowState,
    origin: Loc,
    maxDepth: number = MONSTER_FLOW_DEPTH,
): void {
    assertInBounds(c, origin.y, origin.x, "updateFlow");

    const flowN = cycleFlow(c, flow);
    const { queueY, queueX } = flow;
    const capacity = queueY.length;

    let head = 0;
    let tail = 0;

    c.when[origin.y][origin.x] = flowN;
    c.cost[origin.y][origin.x] = 0;
    queueY[tail] = origin.y;
    queueX[tail] = origin.x;
    tail++;

    while (head !== tail) {
        const ty = queueY[head];
        const tx = queueX[head];
        if (++head === capacity) head = 0;

        const parentCost = c.cost[ty][tx];
        if (parentCost >= maxDepth) continue;
        const n = parentCost + 1;

        for (const [dy, dx] of nbDirs) {
            const y = ty + dy;
            const x = tx + dx;
            if (!squareInBounds(c, y, x)) continue;

            // Already reached this pass
            if (c.when[y][x] === flowN) continue;

            if (squareHasTerrainFlag(c, y, x, TerrainFlag.NO_FLOW)) continue;

            c.when[y][x] = flowN;
            c.cost[y][x] = n;

            const oldTail = tail;
            queueY[tail] = y;
            queueX[tail] = x;
            if (++tail === capacity) tail = 0;

            // Full: forget the new entry
            if (tail === head) tail = oldTail;
        }
    }
}

/** Steps from the flow origin to (y, x), as of the square's last stamp. */
export function flowCost(c: Cave, y: number, x: number): number {
    assertInBounds(c, y, x, "flowCost");
    return c.cost[y][x];
}

/** Generation (y, x) was last reached in, or 0 if never. */
export function flowWhen(c: Cave, y: number, x: number): number {
    assertInBounds(c, y, x, "flowWhen");
    return c.when[y][x];
}
