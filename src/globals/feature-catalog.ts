/*
 *  feature-catalog.ts — Default terrain feature table
 *  cave-sight
 *
 *  Hosts with their own terrain may pass a different catalog to
 *  createLevel; the engine only ever reads `flags` and `mimic`.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { TerrainFeature, FeatureCatalog } from "../types/types.js";
import { Feat } from "../types/enums.js";
import { TerrainFlag as T, TF_OPEN_GROUND, TF_SOLID_ROCK } from "../types/flags.js";

const LOCKED_DOOR = (
    T.DOOR_ANY | T.DOOR_CLOSED | T.DOOR_LOCKED | T.INTERESTING
) >>> 0;

function feature(name: string, flags: number, mimic?: Feat): TerrainFeature {
    return { name, flags: flags >>> 0, mimic: mimic ?? Feat.NONE };
}

function lockedDoor(power: number): TerrainFeature {
    return feature(`locked door (${power})`, LOCKED_DOOR, Feat.CLOSED);
}

export const featureCatalog: FeatureCatalog = Object.freeze([
    // NONE
    feature("nothing", 0),
    // FLOOR
    feature("open floor", TF_OPEN_GROUND | T.FLOOR),
    // CLOSED (DOOR_HEAD)
    feature("closed door", T.DOOR_ANY | T.DOOR_CLOSED | T.INTERESTING),
    lockedDoor(1),
    lockedDoor(2),
    lockedDoor(3),
    lockedDoor(4),
    lockedDoor(5),
    lockedDoor(6),
    lockedDoor(7),
    // OPEN
    feature("open door", TF_OPEN_GROUND | T.DOOR_ANY | T.CLOSABLE | T.INTERESTING),
    // BROKEN
    feature("broken door", TF_OPEN_GROUND | T.DOOR_ANY | T.INTERESTING),
    // LESS
    feature("up staircase", TF_OPEN_GROUND | T.STAIR | T.UPSTAIR | T.INTERESTING | T.PERMANENT),
    // MORE
    feature("down staircase", TF_OPEN_GROUND | T.STAIR | T.DOWNSTAIR | T.INTERESTING | T.PERMANENT),
    // SHOP_HEAD
    feature("General Store", TF_OPEN_GROUND | T.SHOP | T.INTERESTING | T.PERMANENT),
    // SECRET
    feature("secret door", T.WALL | T.ROCK | T.DOOR_ANY | T.GRANITE | T.NO_FLOW, Feat.GRANITE),
    // RUBBLE
    feature("pile of rubble", T.ROCK | T.NO_FLOW | T.INTERESTING),
    // MAGMA
    feature("magma vein", TF_SOLID_ROCK | T.MAGMA),
    // QUARTZ
    feature("quartz vein", TF_SOLID_ROCK | T.QUARTZ),
    // MAGMA_H: treasure that still looks like plain magma
    feature("magma vein with treasure", T.WALL | T.ROCK | T.NO_FLOW | T.MAGMA | T.GOLD, Feat.MAGMA),
    // QUARTZ_H
    feature("quartz vein with treasure", T.WALL | T.ROCK | T.NO_FLOW | T.QUARTZ | T.GOLD, Feat.QUARTZ),
    // MAGMA_K
    feature("magma vein with treasure", TF_SOLID_ROCK | T.MAGMA | T.GOLD),
    // QUARTZ_K
    feature("quartz vein with treasure", TF_SOLID_ROCK | T.QUARTZ | T.GOLD),
    // GRANITE
    feature("granite wall", TF_SOLID_ROCK | T.GRANITE),
    // PERM
    feature("permanent wall", TF_SOLID_ROCK | T.PERMANENT),
]);
