/*
 *  tables.ts — Direction tables
 *  cave-sight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

// =============================================================================
// Direction tables
// =============================================================================

/**
 * Neighbor directions: S, N, E, W, SE, SW, NE, NW.
 * First 4 are cardinal, all 8 include diagonals.
 * Each entry is [dy, dx].
 */
export const nbDirs: readonly (readonly [number, number])[] = Object.freeze([
    [1, 0], [-1, 0], [0, 1], [0, -1],
    [1, 1], [1, -1], [-1, 1], [-1, -1],
]);

/** The eight neighbors followed by the square itself. */
export const nbDirsWithSelf: readonly (readonly [number, number])[] = Object.freeze([
    ...nbDirs,
    [0, 0],
]);
