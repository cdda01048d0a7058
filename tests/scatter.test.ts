/*
 *  scatter.test.ts — Tests for random nearby squares
 *  cave-sight
 */

import { describe, it, expect } from "vitest";
import { squareInBoundsFully } from "../src/grid/cave.js";
import { distance } from "../src/light/los.js";
import { scatter } from "../src/movement/scatter.js";
import { levelFromMap, openLevel } from "./cave-fixtures.js";

describe("scatter", () => {
    it("rejects an origin on or outside the cave's border", () => {
        const level = openLevel(5, 5);
        expect(() => scatter(level, 0, 2, 1, false))
            .toThrow("scatter: (0, 2) is not inside the 5x5 cave's border");
        expect(() => scatter(level, 2, 9, 1, false)).toThrow(/^scatter:/);
    });

    it("rejects negative or fractional distances", () => {
        const level = openLevel(5, 5);
        expect(() => scatter(level, 2, 2, -1, false)).toThrow(/non-negative integer/);
        expect(() => scatter(level, 2, 2, 1.5, false)).toThrow(/non-negative integer/);
    });

    it("returns the origin for distance 0", () => {
        const level = openLevel(5, 5);
        expect(scatter(level, 2, 3, 0, false)).toEqual({ y: 2, x: 3 });
    });

    it("stays within the distance and inside the border", () => {
        const level = openLevel(20, 20);
        for (let i = 0; i < 200; i++) {
            const pt = scatter(level, 10, 10, 3, false);
            expect(distance(10, 10, pt.y, pt.x)).toBeLessThanOrEqual(3);
        }
        for (let i = 0; i < 200; i++) {
            const pt = scatter(level, 1, 1, 3, false);
            expect(squareInBoundsFully(level.cave, pt.y, pt.x)).toBe(true);
        }
    });

    it("allows the corners of the box at distance 1", () => {
        const level = openLevel(5, 5);
        const seen = new Set<string>();
        for (let i = 0; i < 300; i++) {
            const pt = scatter(level, 2, 2, 1, false);
            seen.add(`${pt.y},${pt.x}`);
        }
        expect(seen.size).toBe(9);
    });

    describe("with line of sight", () => {
        const ROOMS = [
            "#######",
            "#..#..#",
            "#..#..#",
            "#######",
        ];

        it("never crosses a wall", () => {
            const { level } = levelFromMap(ROOMS);
            for (let i = 0; i < 200; i++) {
                expect(scatter(level, 1, 1, 4, true).x).toBeLessThan(4);
            }
        });

        it("crosses it when sight is not needed", () => {
            const { level } = levelFromMap(ROOMS);
            let far = 0;
            for (let i = 0; i < 200; i++) {
                if (scatter(level, 1, 1, 4, false).x >= 4) far++;
            }
            expect(far).toBeGreaterThan(0);
        });
    });
});
