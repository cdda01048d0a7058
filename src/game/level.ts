/*
 *  level.ts — One dungeon level: its cave, flow state, RNG and observer
 *  cave-sight
 *
 *  A Level is created when the player arrives and dropped when they leave.
 *  Nothing here is process-wide, so tests and hosts can keep several
 *  levels side by side.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { FeatureCatalog, Observer } from "../types/types.js";
import { UpdateFlag } from "../types/flags.js";
import { FLOW_MAX, MAX_SIGHT, MONSTER_FLOW_DEPTH } from "../types/constants.js";
import { createRng, type RngState } from "../math/rng.js";
import { featureCatalog } from "../globals/feature-catalog.js";
import { type Cave, createCave, assertInBounds } from "../grid/cave.js";
import { type FlowState, createFlowState } from "../movement/flow.js";

// =============================================================================
// Types
// =============================================================================

export interface LevelOptions {
    /** Farthest distance at which anything is in view. */
    maxSight: number;
    /** Squares at this flow cost are not expanded. */
    flowDepth: number;
    /** Capacity of the flow queue. */
    flowQueueCapacity: number;
    /** Report squares lit only by the player's light as Lighting.Torch. */
    viewYellowLight: boolean;
}

export const DEFAULT_LEVEL_OPTIONS: Readonly<LevelOptions> = Object.freeze({
    maxSight: MAX_SIGHT,
    flowDepth: MONSTER_FLOW_DEPTH,
    flowQueueCapacity: FLOW_MAX,
    viewYellowLight: false,
});

/** Pending work, as UpdateFlag and RedrawFlag bits. */
export interface Upkeep {
    update: number;
    redraw: number;
}

export interface Level {
    readonly cave: Cave;
    readonly flow: FlowState;
    readonly rng: RngState;
    readonly options: Readonly<LevelOptions>;
    readonly depth: number;
    observer: Observer;
    upkeep: Upkeep;
}

export interface LevelParams {
    height: number;
    width: number;
    depth?: number;
    features?: FeatureCatalog;
    seed?: number;
    options?: Partial<LevelOptions>;
}

// =============================================================================
// Creation
// =============================================================================

function validateOptions(options: LevelOptions): void {
    if (!Number.isInteger(options.maxSight) || options.maxSight < 0) {
        throw new Error(`createLevel: maxSight must be a non-negative integer, got ${options.maxSight}`);
    }
    if (!Number.isInteger(options.flowDepth) || options.flowDepth < 1 || options.flowDepth > 255) {
        throw new Error(`createLevel: flowDepth must be an integer in 1..255, got ${options.flowDepth}`);
    }
    if (!Number.isInteger(options.flowQueueCapacity) || options.flowQueueCapacity < 2) {
        throw new Error(
            `createLevel: flowQueueCapacity must be an integer >= 2, got ${options.flowQueueCapacity}`,
        );
    }
}

/**
 * Create an empty level. Every square starts as feature 0 with no flags;
 * the generator fills in terrain and then sets `cave.live`.
 */
export function createLevel(params: LevelParams): Level {
    const { height, width } = params;
    if (!Number.isInteger(height) || height < 1 || !Number.isInteger(width) || width < 1) {
        throw new Error(`createLevel: dimensions must be positive integers, got ${height}x${width}`);
    }

    const options: LevelOptions = { ...DEFAULT_LEVEL_OPTIONS, ...params.options };
    validateOptions(options);

    // On open ground the queue holds at most two rings, 8k and 8(k + 1) squares
    const frontier = 16 * options.flowDepth;
    if (options.flowQueueCapacity < frontier) {
        console.warn(
            `Flow queue of ${options.flowQueueCapacity} is smaller than the ${frontier}-square ` +
            `frontier of a depth ${options.flowDepth} flow; flow on open ground will be truncated.`,
        );
    }

    return {
        cave: createCave(height, width, params.features ?? featureCatalog),
        flow: createFlowState(options.flowQueueCapacity),
        rng: createRng(params.seed ?? Date.now()),
        options,
        depth: params.depth ?? 0,
        observer: { y: 0, x: 0, lightRadius: 0, blind: false },
        upkeep: { update: 0, redraw: 0 },
    };
}

// =============================================================================
// Observer
// =============================================================================

/**
 * Put the observer on (y, x), keeping the cave's occupancy in step, and
 * request a new view and flow.
 */
export function placeObserver(level: Level, y: number, x: number): void {
    const c = level.cave;
    assertInBounds(c, y, x, "placeObserver");

    const old = level.observer;
    if (c.mIdx[old.y][old.x] < 0) {
        c.mIdx[old.y][old.x] = 0;
    }
    c.mIdx[y][x] = -1;
    level.observer = { ...old, y, x };

    level.upkeep.update |= UpdateFlag.UPDATE_VIEW | UpdateFlag.UPDATE_FLOW;
}

/** Change the observer's light radius or blindness and request a new view. */
export function setObserverSight(level: Level, lightRadius: number, blind: boolean): void {
    if (!Number.isInteger(lightRadius) || lightRadius < 0) {
        throw new Error(`setObserverSight: light radius must be a non-negative integer, got ${lightRadius}`);
    }
    level.observer = { ...level.observer, lightRadius, blind };
    level.upkeep.update |= UpdateFlag.UPDATE_VIEW;
}
