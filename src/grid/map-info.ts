/*
 *  map-info.ts — What the player knows about one square, for the renderer
 *  cave-sight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { GridData } from "../types/types.js";
import { Feat, Lighting } from "../types/enums.js";
import type { Level } from "../game/level.js";
import { squareFeat } from "./cave.js";
import { squareIsDedge, squareIsGlow, squareIsMark, squareIsSeen } from "./square-queries.js";

export interface MapInfoContext {
    /** True if the player currently perceives monster `idx`. */
    monsterVisible(idx: number): boolean;
}

export function mapInfo(level: Level, y: number, x: number, ctx: MapInfoContext): GridData {
    const c = level.cave;

    const feat = squareFeat(c, y, x);
    let featIdx = feat.mimic || c.feat[y][x];

    const inView = squareIsSeen(c, y, x);
    const idx = c.mIdx[y][x];
    const isPlayer = idx < 0;
    const monsterIdx = idx > 0 && ctx.monsterVisible(idx) ? idx : 0;

    let lighting = Lighting.Dark;
    if (inView) {
        lighting = !squareIsGlow(c, y, x) && level.options.viewYellowLight ? Lighting.Torch : Lighting.Los;
    } else if (!squareIsMark(c, y, x)) {
        featIdx = Feat.NONE;
    } else if (squareIsGlow(c, y, x)) {
        lighting = Lighting.Lit;
    }

    return {
        featIdx,
        monsterIdx,
        inView,
        isPlayer,
        trapBorder: squareIsDedge(c, y, x),
        lighting,
    };
}
