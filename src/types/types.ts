/*
 *  types.ts — Shared structural types
 *  cave-sight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Lighting, MonsterTemper } from "./enums.js";

// ===== Loc — dungeon coordinate =====

export interface Loc {
    y: number;
    x: number;
}

// ===== Terrain =====

export interface TerrainFeature {
    name: string;
    /** Feature index this one is displayed as (secret doors look like granite). */
    mimic: number;
    /** TerrainFlag bits. */
    flags: number;
}

export type FeatureCatalog = readonly TerrainFeature[];

// ===== Entities =====

/** The single point the view is computed from. */
export interface Observer {
    y: number;
    x: number;
    /** 0 means the observer carries no light of its own. */
    lightRadius: number;
    blind: boolean;
}

/** A monster that may carry a light, as seen by the view builder. */
export interface LightCarrier {
    y: number;
    x: number;
    alive: boolean;
    carriesLight: boolean;
}

/** A monster standing on a square, as seen by the room lighting code. */
export interface Occupant {
    temper: MonsterTemper;
    asleep: boolean;
}

// ===== Display =====

/** What the player is allowed to know about a square. */
export interface GridData {
    /** Feature as known to the player, after mimicry. Feat.NONE when unknown. */
    featIdx: number;
    /** Visible monster index, or 0. */
    monsterIdx: number;
    inView: boolean;
    isPlayer: boolean;
    trapBorder: boolean;
    lighting: Lighting;
}
