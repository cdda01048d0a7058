/*
 *  cave.ts — The per-level square grid: terrain, info flags, flow arrays
 *  cave-sight
 *
 *  All arrays are row-major, indexed [y][x]. The `info` word of each square
 *  holds SquareFlag bits; `cost` and `when` hold the byte-sized values
 *  written by the flow field.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { FeatureCatalog, TerrainFeature } from "../types/types.js";

// =============================================================================
// Cave
// =============================================================================

/** Row-major 2D array [y][x]. */
export type Grid = number[][];

export interface Cave {
    readonly height: number;
    readonly width: number;
    /** Terrain feature index per square. */
    feat: Grid;
    /** SquareFlag bits per square. */
    info: Grid;
    /** Flow cost (steps from the flow origin). */
    cost: Grid;
    /** Flow generation stamp; 0 means never stamped. */
    when: Grid;
    /** 0: empty, > 0: monster index, < 0: the player. */
    mIdx: Grid;
    /** Index of the top object on the square, or 0. */
    oIdx: Grid;
    /** Number of squares carrying each feature (feature 0 is not counted). */
    featCount: number[];
    /** Feeling squares seen so far on this level. */
    feelingSquares: number;
    /** False while the level is being generated. */
    live: boolean;
    readonly features: FeatureCatalog;
}

/** Allocate a height × width grid initialized to `fillValue`. */
export function allocGrid(height: number, width: number, fillValue: number = 0): Grid {
    const grid: Grid = new Array(height);
    for (let y = 0; y < height; y++) {
        grid[y] = new Array(width).fill(fillValue);
    }
    return grid;
}

/** Fill every cell in the grid with `fillValue`. */
export function fillGrid(grid: Grid, fillValue: number): void {
    for (const row of grid) {
        row.fill(fillValue);
    }
}

/**
 * Create an empty cave. Every square starts as feature 0 with no flags.
 */
export function createCave(height: number, width: number, features: FeatureCatalog): Cave {
    return {
        height,
        width,
        feat: allocGrid(height, width),
        info: allocGrid(height, width),
        cost: allocGrid(height, width),
        when: allocGrid(height, width),
        mIdx: allocGrid(height, width),
        oIdx: allocGrid(height, width),
        featCount: new Array(features.length + 1).fill(0),
        feelingSquares: 0,
        live: false,
        features,
    };
}

// =============================================================================
// Bounds
// =============================================================================

export function squareInBounds(c: Cave, y: number, x: number): boolean {
    return x >= 0 && x < c.width && y >= 0 && y < c.height;
}

/** In bounds and not on the outermost ring. */
export function squareInBoundsFully(c: Cave, y: number, x: number): boolean {
    return x > 0 && x < c.width - 1 && y > 0 && y < c.height - 1;
}

/**
 * Throw if (y, x) is outside the cave. Callers are expected to pass legal
 * coordinates, so a failure here is a bug in the caller.
 */
export function assertInBounds(c: Cave, y: number, x: number, caller: string): void {
    if (!squareInBounds(c, y, x)) {
        throw new Error(`${caller}: (${y}, ${x}) is outside the ${c.height}x${c.width} cave`);
    }
}

// =============================================================================
// Flag accessors
// =============================================================================

export function sqinfoHas(c: Cave, y: number, x: number, flag: number): boolean {
    return (c.info[y][x] & flag) !== 0;
}

export function sqinfoOn(c: Cave, y: number, x: number, flag: number): void {
    c.info[y][x] = (c.info[y][x] | flag) >>> 0;
}

export function sqinfoOff(c: Cave, y: number, x: number, flag: number): void {
    c.info[y][x] = (c.info[y][x] & ~flag) >>> 0;
}

// =============================================================================
// Terrain
// =============================================================================

/** The catalog entry for the feature on (y, x). */
export function squareFeat(c: Cave, y: number, x: number): TerrainFeature {
    assertInBounds(c, y, x, "squareFeat");
    const feature = c.features[c.feat[y][x]];
    if (feature === undefined) {
        throw new Error(`squareFeat: feature ${c.feat[y][x]} at (${y}, ${x}) is not in the catalog`);
    }
    return feature;
}

/** True if the feature on (y, x) has any of the TerrainFlag bits in `flag`. */
export function squareHasTerrainFlag(c: Cave, y: number, x: number, flag: number): boolean {
    return (squareFeat(c, y, x).flags & flag) !== 0;
}

/** True if catalog entry `feat` has any of the TerrainFlag bits in `flag`. */
export function featHasFlag(features: FeatureCatalog, feat: number, flag: number): boolean {
    const feature = features[feat];
    return feature !== undefined && (feature.flags & flag) !== 0;
}
