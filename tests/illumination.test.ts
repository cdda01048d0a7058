/*
 *  illumination.test.ts — Tests for whole-level lighting
 *  cave-sight
 */

import { describe, it, expect, vi } from "vitest";
import { SquareFlag, RedrawFlag, UPDATE_AFTER_RELIGHT } from "../src/types/flags.js";
import { sqinfoOn } from "../src/grid/cave.js";
import { wizLight, wizDark, caveIlluminate } from "../src/light/illumination.js";
import { levelFromMap, squaresWith } from "./cave-fixtures.js";

const ALL_REDRAWS = RedrawFlag.MAP | RedrawFlag.MONLIST | RedrawFlag.ITEMLIST;

function objectMemory() {
    return { memorizeObjects: vi.fn(), forgetObjects: vi.fn() };
}

function allKeys(height: number, width: number): string[] {
    const out: string[] = [];
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) out.push(`${y},${x}`);
    }
    return out;
}

// =============================================================================
// wizLight
// =============================================================================

describe("wizLight", () => {
    const ROOM = [
        "#####",
        "#...#",
        "#.+.#",
        "#...#",
        "#####",
    ];

    it("lights every square touching open ground", () => {
        const { level } = levelFromMap(ROOM);
        wizLight(level, false, objectMemory());
        expect(squaresWith(level, SquareFlag.GLOW)).toEqual(allKeys(5, 5));
    });

    it("memorizes everything but plain floor", () => {
        const { level } = levelFromMap(ROOM);
        wizLight(level, false, objectMemory());

        const marked = squaresWith(level, SquareFlag.MARK);
        expect(marked).toHaveLength(17);
        expect(marked).toContain("2,2");
        expect(marked).not.toContain("1,1");
    });

    it("memorizes known traps on floor", () => {
        const { level } = levelFromMap(ROOM);
        sqinfoOn(level.cave, 1, 1, SquareFlag.TRAP);

        wizLight(level, false, objectMemory());

        expect(squaresWith(level, SquareFlag.MARK)).toContain("1,1");
    });

    it("leaves solid rock dark", () => {
        const { level } = levelFromMap(["###", "###", "###"]);
        wizLight(level, false, objectMemory());
        expect(squaresWith(level, SquareFlag.GLOW)).toEqual([]);
    });

    it("passes `full` on to the object memory and requests a relight", () => {
        const { level } = levelFromMap(ROOM);
        const ctx = objectMemory();

        wizLight(level, true, ctx);

        expect(ctx.memorizeObjects).toHaveBeenCalledWith(true);
        expect(level.upkeep.update).toBe(UPDATE_AFTER_RELIGHT);
        expect(level.upkeep.redraw).toBe(ALL_REDRAWS);
    });
});

// =============================================================================
// wizDark
// =============================================================================

describe("wizDark", () => {
    it("forgets the map and trap detection but keeps the light", () => {
        const { level } = levelFromMap(["..", ".."]);
        const ctx = objectMemory();
        sqinfoOn(level.cave, 0, 1, SquareFlag.MARK | SquareFlag.DTRAP | SquareFlag.DEDGE | SquareFlag.GLOW);

        wizDark(level, ctx);

        expect(level.cave.info[0][1]).toBe(SquareFlag.GLOW);
        expect(ctx.forgetObjects).toHaveBeenCalledTimes(1);
        expect(level.upkeep.update).toBe(UPDATE_AFTER_RELIGHT);
        expect(level.upkeep.redraw).toBe(ALL_REDRAWS);
    });
});

// =============================================================================
// caveIlluminate
// =============================================================================

describe("caveIlluminate", () => {
    const TOWN = [
        "1..",
        "#..",
        "...",
    ];

    it("lights and maps everything by day", () => {
        const { level } = levelFromMap(TOWN);

        caveIlluminate(level, true);

        const lit = allKeys(3, 3);
        expect(squaresWith(level, SquareFlag.GLOW)).toEqual(lit);
        expect(squaresWith(level, SquareFlag.MARK)).toEqual(lit);
    });

    it("keeps only walls, shops and shop doorsteps lit at night", () => {
        const { level } = levelFromMap(TOWN);
        caveIlluminate(level, true);

        caveIlluminate(level, false);

        const lit = ["0,0", "0,1", "1,0", "1,1"];
        expect(squaresWith(level, SquareFlag.GLOW)).toEqual(lit);
        expect(squaresWith(level, SquareFlag.MARK)).toEqual(lit);
        expect(level.upkeep.update).toBe(UPDATE_AFTER_RELIGHT);
    });
});
