/*
 *  view.test.ts — Tests for the view builder
 *  cave-sight
 */

import { describe, it, expect } from "vitest";
import { SquareFlag } from "../src/types/flags.js";
import type { Observer } from "../src/types/types.js";
import { sqinfoOn } from "../src/grid/cave.js";
import { forgetView, updateView, playerHasLos, playerCanSee, noLight } from "../src/light/view.js";
import { levelFromMap, openLevel, fakeWorld, squaresWith } from "./cave-fixtures.js";

// =============================================================================
// Helpers
// =============================================================================

const ROOM_5X5 = [
    "#####",
    "#...#",
    "#.@.#",
    "#...#",
    "#####",
];

function observerAt(y: number, x: number, lightRadius = 0, blind = false): Observer {
    return { y, x, lightRadius, blind };
}

function copyInfo(info: number[][]): number[][] {
    return info.map((row) => [...row]);
}

function allKeys(height: number, width: number): string[] {
    const out: string[] = [];
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) out.push(`${y},${x}`);
    }
    return out;
}

function glowEverywhere(info: number[][]): void {
    for (const row of info) {
        for (let x = 0; x < row.length; x++) row[x] |= SquareFlag.GLOW;
    }
}

// =============================================================================
// Torch light in a room
// =============================================================================

describe("updateView: lit room", () => {
    it("sees the whole room except the corners, which are beyond the light", () => {
        const { level, start } = levelFromMap(ROOM_5X5);
        const { ctx } = fakeWorld();

        updateView(level.cave, observerAt(start.y, start.x, 2), ctx);

        expect(squaresWith(level, SquareFlag.VIEW)).toEqual(allKeys(5, 5));
        const corners = ["0,0", "0,4", "4,0", "4,4"];
        expect(squaresWith(level, SquareFlag.SEEN)).toEqual(
            allKeys(5, 5).filter((k) => !corners.includes(k)),
        );
    });

    it("memorizes and redraws every newly seen square once", () => {
        const { level, start } = levelFromMap(ROOM_5X5);
        const { ctx } = fakeWorld();

        updateView(level.cave, observerAt(start.y, start.x, 2), ctx);

        expect(ctx.redrawSquare).toHaveBeenCalledTimes(21);
        expect(ctx.noteObjects).toHaveBeenCalledTimes(21);
        expect(ctx.redrawSquare).toHaveBeenCalledWith(0, 2);
        expect(ctx.redrawSquare).not.toHaveBeenCalledWith(0, 0);
        expect(squaresWith(level, SquareFlag.MARK)).toEqual(squaresWith(level, SquareFlag.SEEN));
    });

    it("leaves no WAS_SEEN behind", () => {
        const { level, start } = levelFromMap(ROOM_5X5);
        const { ctx } = fakeWorld();

        updateView(level.cave, observerAt(start.y, start.x, 2), ctx);
        updateView(level.cave, observerAt(start.y, start.x, 2), ctx);

        expect(squaresWith(level, SquareFlag.WAS_SEEN)).toEqual([]);
    });

    it("is idempotent and reports nothing the second time", () => {
        const { level, start } = levelFromMap(ROOM_5X5);
        const { ctx } = fakeWorld();
        const observer = observerAt(start.y, start.x, 2);

        updateView(level.cave, observer, ctx);
        const first = copyInfo(level.cave.info);
        ctx.redrawSquare.mockClear();
        ctx.noteObjects.mockClear();

        updateView(level.cave, observer, ctx);

        expect(level.cave.info).toEqual(first);
        expect(ctx.redrawSquare).not.toHaveBeenCalled();
        expect(ctx.noteObjects).not.toHaveBeenCalled();
    });

    it("redraws squares that stop being seen when the light goes out", () => {
        const { level, start } = levelFromMap(ROOM_5X5);
        const { ctx } = fakeWorld();

        updateView(level.cave, observerAt(start.y, start.x, 2), ctx);
        ctx.redrawSquare.mockClear();
        ctx.noteObjects.mockClear();

        updateView(level.cave, observerAt(start.y, start.x, 0), ctx);

        expect(squaresWith(level, SquareFlag.SEEN)).toEqual([]);
        expect(squaresWith(level, SquareFlag.VIEW)).toEqual(allKeys(5, 5));
        expect(ctx.redrawSquare).toHaveBeenCalledTimes(21);
        expect(ctx.noteObjects).not.toHaveBeenCalled();
        expect(noLight(level.cave, observerAt(start.y, start.x))).toBe(true);
    });
});

// =============================================================================
// Blindness
// =============================================================================

describe("updateView: blind observer", () => {
    it("sees nothing, even in a glowing room, but still has line of sight", () => {
        const { level, start } = levelFromMap(ROOM_5X5);
        const { ctx } = fakeWorld();
        glowEverywhere(level.cave.info);

        updateView(level.cave, observerAt(start.y, start.x, 3, true), ctx);

        expect(squaresWith(level, SquareFlag.SEEN)).toEqual([]);
        expect(squaresWith(level, SquareFlag.VIEW)).toEqual(allKeys(5, 5));
        expect(ctx.redrawSquare).not.toHaveBeenCalled();
    });
});

// =============================================================================
// GLOW
// =============================================================================

describe("updateView: glowing squares", () => {
    it("sees a glowing room without any light", () => {
        const { level, start } = levelFromMap(ROOM_5X5);
        const { ctx } = fakeWorld();
        glowEverywhere(level.cave.info);

        updateView(level.cave, observerAt(start.y, start.x, 0), ctx);

        expect(squaresWith(level, SquareFlag.SEEN)).toEqual(allKeys(5, 5));
        expect(noLight(level.cave, observerAt(start.y, start.x))).toBe(false);
    });

    it("does not see glowing walls whose floor in front is dark", () => {
        const { level, start } = levelFromMap(ROOM_5X5);
        const { ctx } = fakeWorld();
        // Only the walls glow
        for (let y = 0; y < 5; y++) {
            for (let x = 0; x < 5; x++) {
                if (y === 0 || y === 4 || x === 0 || x === 4) sqinfoOn(level.cave, y, x, SquareFlag.GLOW);
            }
        }

        updateView(level.cave, observerAt(start.y, start.x, 0), ctx);

        expect(squaresWith(level, SquareFlag.SEEN)).toEqual([]);
    });

    it("sees a glowing wall once the floor in front of it glows too", () => {
        const { level } = levelFromMap(["@...#"]);
        const { ctx } = fakeWorld();
        sqinfoOn(level.cave, 0, 4, SquareFlag.GLOW);

        updateView(level.cave, observerAt(0, 0), ctx);
        expect(playerCanSee(level.cave, 0, 4)).toBe(false);
        expect(playerHasLos(level.cave, 0, 4)).toBe(true);

        sqinfoOn(level.cave, 0, 3, SquareFlag.GLOW);
        updateView(level.cave, observerAt(0, 0), ctx);
        expect(squaresWith(level, SquareFlag.SEEN)).toEqual(["0,3", "0,4"]);
    });
});

// =============================================================================
// Walls
// =============================================================================

describe("updateView: wall visibility", () => {
    it("shows every wall along a straight corridor", () => {
        const { level, start } = levelFromMap([
            "########",
            "#.....@#",
            "########",
        ]);
        const { ctx } = fakeWorld();

        updateView(level.cave, observerAt(start.y, start.x), ctx);

        expect(squaresWith(level, SquareFlag.VIEW)).toEqual(allKeys(3, 8));
    });

    it("shows only the near face of a double-thickness wall", () => {
        const { level, start } = levelFromMap([
            "########",
            "########",
            "#.....@#",
            "########",
        ]);
        const { ctx } = fakeWorld();

        updateView(level.cave, observerAt(start.y, start.x), ctx);

        const view = squaresWith(level, SquareFlag.VIEW);
        expect(view.filter((k) => k.startsWith("0,"))).toEqual([]);
        expect(view).toEqual(allKeys(4, 8).filter((k) => !k.startsWith("0,")));
    });

    it("does not show a wall that is only reachable around a corner", () => {
        const { level } = levelFromMap([
            "...",
            "..#",
            "@#.",
        ]);
        const { ctx } = fakeWorld();

        updateView(level.cave, observerAt(2, 0), ctx);

        expect(playerHasLos(level.cave, 1, 2)).toBe(false);
        expect(playerHasLos(level.cave, 2, 1)).toBe(true);
    });
});

// =============================================================================
// Sight limit
// =============================================================================

describe("updateView: sight limit", () => {
    it("stops at the default of 20", () => {
        const level = openLevel(1, 30);
        const { ctx } = fakeWorld();

        updateView(level.cave, observerAt(0, 0), ctx);

        expect(playerHasLos(level.cave, 0, 20)).toBe(true);
        expect(playerHasLos(level.cave, 0, 21)).toBe(false);
    });

    it("takes a shorter limit", () => {
        const level = openLevel(1, 30);
        const { ctx } = fakeWorld();

        updateView(level.cave, observerAt(0, 0), ctx, 5);

        expect(squaresWith(level, SquareFlag.VIEW)).toEqual(["0,0", "0,1", "0,2", "0,3", "0,4", "0,5"]);
    });

    it("throws for an observer outside the cave", () => {
        const level = openLevel(3, 3);
        const { ctx } = fakeWorld();
        expect(() => updateView(level.cave, observerAt(3, 0), ctx)).toThrow(/updateView/);
    });
});

// =============================================================================
// Monster lights
// =============================================================================

describe("updateView: light-carrying monsters", () => {
    const CORRIDOR = [
        "#######",
        "#@..#.#",
        "#######",
    ];

    it("lights the squares around a visible monster", () => {
        const { level, start } = levelFromMap(CORRIDOR);
        const { ctx, carriers } = fakeWorld();
        carriers.push({ y: 1, x: 3, alive: true, carriesLight: true });

        updateView(level.cave, observerAt(start.y, start.x), ctx);

        expect(squaresWith(level, SquareFlag.SEEN)).toEqual([
            "0,2", "0,3", "1,2", "1,3", "1,4", "2,2", "2,3",
        ]);
    });

    it("does not let a hidden monster's light reveal the wall between", () => {
        const { level, start } = levelFromMap(CORRIDOR);
        const { ctx, carriers } = fakeWorld();
        carriers.push({ y: 1, x: 5, alive: true, carriesLight: true });

        updateView(level.cave, observerAt(start.y, start.x), ctx);

        expect(squaresWith(level, SquareFlag.SEEN)).toEqual([]);
    });

    it("ignores dead monsters and monsters without a light", () => {
        const { level, start } = levelFromMap(CORRIDOR);
        const { ctx, carriers } = fakeWorld();
        carriers.push({ y: 1, x: 3, alive: false, carriesLight: true });
        carriers.push({ y: 1, x: 2, alive: true, carriesLight: false });

        updateView(level.cave, observerAt(start.y, start.x), ctx);

        expect(squaresWith(level, SquareFlag.SEEN)).toEqual([]);
    });

    it("lights a dark corridor from further away", () => {
        const { level, start } = levelFromMap([
            "#########",
            "#@......#",
            "#########",
        ]);
        const { ctx, carriers } = fakeWorld();
        carriers.push({ y: 1, x: 6, alive: true, carriesLight: true });

        updateView(level.cave, observerAt(start.y, start.x), ctx);

        expect(squaresWith(level, SquareFlag.SEEN)).toEqual(["1,5", "1,6", "1,7"]);
    });
});

// =============================================================================
// Level feeling
// =============================================================================

describe("updateView: feeling squares", () => {
    it("counts each feeling square once and reports the tenth", () => {
        const { level, start } = levelFromMap(ROOM_5X5);
        const { ctx } = fakeWorld();
        const feel = ["1,1", "1,2", "1,3", "2,1", "2,2", "2,3", "3,1", "3,2", "3,3", "0,2", "2,0", "4,2"];
        for (const k of feel) {
            const [y, x] = k.split(",").map(Number);
            sqinfoOn(level.cave, y, x, SquareFlag.FEEL);
        }

        updateView(level.cave, observerAt(start.y, start.x, 2), ctx);
        updateView(level.cave, observerAt(start.y, start.x, 2), ctx);

        expect(level.cave.feelingSquares).toBe(12);
        expect(ctx.displayFeeling).toHaveBeenCalledTimes(1);
        expect(squaresWith(level, SquareFlag.FEEL)).toEqual([]);
    });

    it("does not count feeling squares that stay dark", () => {
        const { level, start } = levelFromMap(ROOM_5X5);
        const { ctx } = fakeWorld();
        sqinfoOn(level.cave, 0, 0, SquareFlag.FEEL);

        updateView(level.cave, observerAt(start.y, start.x, 2), ctx);

        expect(level.cave.feelingSquares).toBe(0);
        expect(squaresWith(level, SquareFlag.FEEL)).toEqual(["0,0"]);
    });
});

// =============================================================================
// SEEN implies VIEW
// =============================================================================

describe("updateView: SEEN implies VIEW", () => {
    it("holds for lit, glowing and monster-lit squares", () => {
        const { level } = levelFromMap([
            "##########",
            "#....#...#",
            "#.##.#.#.#",
            "#....:...#",
            "##########",
        ]);
        const { ctx, carriers } = fakeWorld();
        carriers.push({ y: 1, x: 7, alive: true, carriesLight: true });
        sqinfoOn(level.cave, 3, 7, SquareFlag.GLOW);

        for (const [y, x, r] of [[1, 1, 2], [3, 4, 1], [1, 8, 0], [3, 6, 3]]) {
            updateView(level.cave, observerAt(y, x, r), ctx);
            for (let yy = 0; yy < level.cave.height; yy++) {
                for (let xx = 0; xx < level.cave.width; xx++) {
                    if (playerCanSee(level.cave, yy, xx)) {
                        expect(playerHasLos(level.cave, yy, xx)).toBe(true);
                    }
                }
            }
        }
    });
});

// =============================================================================
// forgetView
// =============================================================================

describe("forgetView", () => {
    it("clears VIEW and SEEN and redraws every square that was in view", () => {
        const { level, start } = levelFromMap(ROOM_5X5);
        const { ctx } = fakeWorld();
        updateView(level.cave, observerAt(start.y, start.x, 2), ctx);
        ctx.redrawSquare.mockClear();

        forgetView(level.cave, ctx);

        expect(squaresWith(level, SquareFlag.VIEW)).toEqual([]);
        expect(squaresWith(level, SquareFlag.SEEN)).toEqual([]);
        expect(ctx.redrawSquare).toHaveBeenCalledTimes(25);
        // Memory is kept
        expect(squaresWith(level, SquareFlag.MARK)).toHaveLength(21);
    });
});
