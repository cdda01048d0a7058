/*
 *  upkeep.ts — Deferred view, flow and monster updates
 *  cave-sight
 *
 *  Effects that change lighting or terrain don't recompute the view
 *  themselves; they set UpdateFlag bits and the next updateStuff call does
 *  the work once. Redraw bits are collected for the host to act on.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { UpdateFlag } from "../types/flags.js";
import { forgetView, updateView, type ViewContext } from "../light/view.js";
import { forgetFlow, updateFlow } from "../movement/flow.js";
import type { Level } from "./level.js";

// =============================================================================
// Context
// =============================================================================

export interface UpdateContext extends ViewContext {
    /** Recheck which monsters the player can see. */
    updateMonsters(): void;
}

// =============================================================================
// Requests
// =============================================================================

export function requestUpdate(level: Level, flags: number): void {
    level.upkeep.update = (level.upkeep.update | flags) >>> 0;
}

export function requestRedraw(level: Level, flags: number): void {
    level.upkeep.redraw = (level.upkeep.redraw | flags) >>> 0;
}

/** Return the pending RedrawFlag bits and clear them. */
export function takeRedraw(level: Level): number {
    const redraw = level.upkeep.redraw;
    level.upkeep.redraw = 0;
    return redraw;
}

// =============================================================================
// Processing
// =============================================================================

/** Run every pending update, in dependency order. */
export function updateStuff(level: Level, ctx: UpdateContext): void {
    const { upkeep, cave } = level;
    if (!upkeep.update) return;

    if (upkeep.update & UpdateFlag.FORGET_VIEW) {
        upkeep.update &= ~UpdateFlag.FORGET_VIEW;
        forgetView(cave, ctx);
    }

    if (upkeep.update & UpdateFlag.UPDATE_VIEW) {
        upkeep.update &= ~UpdateFlag.UPDATE_VIEW;
        updateView(cave, level.observer, ctx, level.options.maxSight);
    }

    if (upkeep.update & UpdateFlag.FORGET_FLOW) {
        upkeep.update &= ~UpdateFlag.FORGET_FLOW;
        forgetFlow(cave, level.flow);
    }

    if (upkeep.update & UpdateFlag.UPDATE_FLOW) {
        upkeep.update &= ~UpdateFlag.UPDATE_FLOW;
        updateFlow(cave, level.flow, level.observer, level.options.flowDepth);
    }

    if (upkeep.update & UpdateFlag.MONSTERS) {
        upkeep.update &= ~UpdateFlag.MONSTERS;
        ctx.updateMonsters();
    }
}
