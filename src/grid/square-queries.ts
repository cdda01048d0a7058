/*
 *  square-queries.ts — Per-square predicates
 *  cave-sight
 *
 *  Feature predicates say what kind of terrain is on a square. Behaviour
 *  predicates (passable, diggable, wall...) are written in terms of them,
 *  and are usually the ones to call: a secret door is not rock, but it
 *  behaves like a wall until it is found.
 *
 *  Every predicate throws on coordinates outside the cave.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { FeatureCatalog, TerrainFeature } from "../types/types.js";
import { Feat } from "../types/enums.js";
import { SquareFlag, TerrainFlag } from "../types/flags.js";
import {
    type Cave,
    assertInBounds,
    squareFeat,
    squareHasTerrainFlag,
    squareInBoundsFully,
    sqinfoHas,
    featHasFlag,
} from "./cave.js";

// =============================================================================
// Feature predicates (catalog entries)
// =============================================================================

export function featIsMagma(features: FeatureCatalog, feat: number): boolean {
    return featHasFlag(features, feat, TerrainFlag.MAGMA);
}

export function featIsQuartz(features: FeatureCatalog, feat: number): boolean {
    return featHasFlag(features, feat, TerrainFlag.QUARTZ);
}

/** A mineral vein whose treasure is visible. */
export function featIsTreasure(features: FeatureCatalog, feat: number): boolean {
    return featHasFlag(features, feat, TerrainFlag.GOLD)
        && featHasFlag(features, feat, TerrainFlag.INTERESTING);
}

/** A solid wall; rubble is not one. */
export function featIsWall(features: FeatureCatalog, feat: number): boolean {
    return featHasFlag(features, feat, TerrainFlag.WALL);
}

export function featIsShop(features: FeatureCatalog, feat: number): boolean {
    return featHasFlag(features, feat, TerrainFlag.SHOP);
}

export function featIsPassable(feature: TerrainFeature): boolean {
    return (feature.flags & TerrainFlag.PASSABLE) !== 0;
}

export function featIsProjectable(feature: TerrainFeature): boolean {
    return (feature.flags & TerrainFlag.PROJECT) !== 0;
}

export function featIsBoring(feature: TerrainFeature): boolean {
    return (feature.flags & TerrainFlag.INTERESTING) === 0;
}

// =============================================================================
// Feature predicates (squares)
// =============================================================================

export function squareIsFloor(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.FLOOR);
}

/** Plain granite, not a secret door. */
export function squareIsRock(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.GRANITE)
        && !squareHasTerrainFlag(c, y, x, TerrainFlag.DOOR_ANY);
}

export function squareIsPerm(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.PERMANENT)
        && squareHasTerrainFlag(c, y, x, TerrainFlag.ROCK);
}

export function squareIsMagma(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.MAGMA);
}

export function squareIsQuartz(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.QUARTZ);
}

export function squareIsMineral(c: Cave, y: number, x: number): boolean {
    return squareIsRock(c, y, x) || squareIsMagma(c, y, x) || squareIsQuartz(c, y, x);
}

export function squareIsRubble(c: Cave, y: number, x: number): boolean {
    return !squareHasTerrainFlag(c, y, x, TerrainFlag.WALL)
        && squareHasTerrainFlag(c, y, x, TerrainFlag.ROCK);
}

/** A hidden door, which looks like granite until found. */
export function squareIsSecretDoor(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.DOOR_ANY)
        && squareHasTerrainFlag(c, y, x, TerrainFlag.ROCK);
}

export function squareIsOpenDoor(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.CLOSABLE);
}

/** Closed, whether or not it is locked or jammed. */
export function squareIsClosedDoor(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.DOOR_CLOSED);
}

export function squareIsLockedDoor(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.DOOR_LOCKED | TerrainFlag.DOOR_JAMMED);
}

export function squareIsBrokenDoor(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.DOOR_ANY)
        && squareHasTerrainFlag(c, y, x, TerrainFlag.PASSABLE)
        && !squareHasTerrainFlag(c, y, x, TerrainFlag.CLOSABLE);
}

/** Any door: open, closed, broken or secret. */
export function squareIsDoor(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.DOOR_ANY);
}

export function squareIsStairs(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.STAIR);
}

export function squareIsUpStairs(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.UPSTAIR);
}

export function squareIsDownStairs(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.DOWNSTAIR);
}

export function squareIsShop(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.SHOP);
}

/** Index of the shop on (y, x), counted from SHOP_HEAD, or -1. */
export function squareShopNum(c: Cave, y: number, x: number): number {
    if (squareIsShop(c, y, x)) {
        return c.feat[y][x] - Feat.SHOP_HEAD;
    }
    return -1;
}

export function squareHasGoldVein(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.GOLD);
}

/** A vein whose treasure has not been noticed yet. */
export function squareHasSecretVein(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.GOLD)
        && !squareHasTerrainFlag(c, y, x, TerrainFlag.INTERESTING);
}

export function squareSeemsLikeWall(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.ROCK);
}

export function squareIsInteresting(c: Cave, y: number, x: number): boolean {
    return squareHasTerrainFlag(c, y, x, TerrainFlag.INTERESTING);
}

export function squareNoticeable(c: Cave, y: number, x: number): boolean {
    return squareIsInteresting(c, y, x);
}

export function squareIsBoring(c: Cave, y: number, x: number): boolean {
    return featIsBoring(squareFeat(c, y, x));
}

export function squareIsPlayer(c: Cave, y: number, x: number): boolean {
    assertInBounds(c, y, x, "squareIsPlayer");
    return c.mIdx[y][x] < 0;
}

// =============================================================================
// Behaviour predicates
// =============================================================================

/** Floor with no monster on it. */
export function squareIsOpen(c: Cave, y: number, x: number): boolean {
    return squareIsFloor(c, y, x) && c.mIdx[y][x] === 0;
}

/** Open, with no objects either. */
export function squareIsEmpty(c: Cave, y: number, x: number): boolean {
    return squareIsOpen(c, y, x) && c.oIdx[y][x] === 0;
}

export function squareCanPutItem(c: Cave, y: number, x: number): boolean {
    return squareIsFloor(c, y, x) && c.oIdx[y][x] === 0;
}

export function squareCanWard(c: Cave, y: number, x: number): boolean {
    return squareIsFloor(c, y, x);
}

/** Rubble, secret doors and non-permanent walls. */
export function squareIsDiggable(c: Cave, y: number, x: number): boolean {
    return squareIsMineral(c, y, x)
        || squareIsSecretDoor(c, y, x)
        || squareIsRubble(c, y, x);
}

export function squareIsMonsterWalkable(c: Cave, y: number, x: number): boolean {
    return featIsPassable(squareFeat(c, y, x));
}

export function squareIsPassable(c: Cave, y: number, x: number): boolean {
    return featIsPassable(squareFeat(c, y, x));
}

/** Light and projectiles pass through the square. */
export function squareIsProjectable(c: Cave, y: number, x: number): boolean {
    return featIsProjectable(squareFeat(c, y, x));
}

/** The negation of squareIsProjectable: anything that blocks sight. */
export function squareIsWall(c: Cave, y: number, x: number): boolean {
    return !squareIsProjectable(c, y, x);
}

/** Granite, magma, quartz or permanent wall; not doors or rubble. */
export function squareIsStrongWall(c: Cave, y: number, x: number): boolean {
    return squareIsMineral(c, y, x) || squareIsPerm(c, y, x);
}

// =============================================================================
// Info predicates
// =============================================================================

function infoPredicate(flag: number, name: string): (c: Cave, y: number, x: number) => boolean {
    return (c, y, x) => {
        assertInBounds(c, y, x, name);
        return sqinfoHas(c, y, x, flag);
    };
}

export const squareIsMark = infoPredicate(SquareFlag.MARK, "squareIsMark");
export const squareIsGlow = infoPredicate(SquareFlag.GLOW, "squareIsGlow");
export const squareIsVault = infoPredicate(SquareFlag.VAULT, "squareIsVault");
export const squareIsRoom = infoPredicate(SquareFlag.ROOM, "squareIsRoom");
export const squareIsSeen = infoPredicate(SquareFlag.SEEN, "squareIsSeen");
export const squareIsView = infoPredicate(SquareFlag.VIEW, "squareIsView");
export const squareWasSeen = infoPredicate(SquareFlag.WAS_SEEN, "squareWasSeen");
export const squareIsDtrap = infoPredicate(SquareFlag.DTRAP, "squareIsDtrap");
export const squareIsFeel = infoPredicate(SquareFlag.FEEL, "squareIsFeel");
export const squareIsDedge = infoPredicate(SquareFlag.DEDGE, "squareIsDedge");
export const squareIsTrap = infoPredicate(SquareFlag.TRAP, "squareIsTrap");
export const squareIsInvis = infoPredicate(SquareFlag.INVIS, "squareIsInvis");
export const squareIsWallInner = infoPredicate(SquareFlag.WALL_INNER, "squareIsWallInner");
export const squareIsWallOuter = infoPredicate(SquareFlag.WALL_OUTER, "squareIsWallOuter");
export const squareIsWallSolid = infoPredicate(SquareFlag.WALL_SOLID, "squareIsWallSolid");
export const squareIsMonRestrict = infoPredicate(SquareFlag.MON_RESTRICT, "squareIsMonRestrict");
export const squareIsNoTeleport = infoPredicate(SquareFlag.NO_TELEPORT, "squareIsNoTeleport");
export const squareIsNoMap = infoPredicate(SquareFlag.NO_MAP, "squareIsNoMap");
export const squareIsNoEsp = infoPredicate(SquareFlag.NO_ESP, "squareIsNoEsp");

/** A trap the player knows about. */
export const squareIsKnownTrap = squareIsTrap;

/** A trap that still looks like floor. */
export const squareIsSecretTrap = squareIsInvis;

// =============================================================================
// Derived queries
// =============================================================================

/**
 * True for a trap-detected square on the inner edge of the detected area:
 * one of its four orthogonal neighbours is fully in bounds and undetected.
 */
export function dtrapEdge(c: Cave, y: number, x: number): boolean {
    if (!squareIsDtrap(c, y, x)) return false;

    const neighbours: [number, number][] = [[y + 1, x], [y, x + 1], [y - 1, x], [y, x - 1]];
    for (const [ny, nx] of neighbours) {
        if (squareInBoundsFully(c, ny, nx) && !squareIsDtrap(c, ny, nx)) {
            return true;
        }
    }
    return false;
}

/** The name the player would give this square. */
export function squareApparentName(c: Cave, y: number, x: number): string {
    let f = squareFeat(c, y, x).mimic || c.feat[y][x];

    if (!squareIsMark(c, y, x) && !squareIsSeen(c, y, x)) {
        f = Feat.NONE;
    }
    if (f === Feat.NONE) {
        return "unknown_grid";
    }
    const feature = c.features[f];
    return feature === undefined ? "unknown_grid" : feature.name;
}
