/*
 *  rng.ts — Bob Jenkins' small PRNG with per-level state
 *  cave-sight
 *
 *  Each level owns its own stream, so tests and parallel levels never
 *  disturb each other's rolls. Arithmetic is unsigned 32-bit; `>>> 0`
 *  keeps JavaScript numbers in that range.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

// ===== State =====

export interface RngState {
    a: number;
    b: number;
    c: number;
    d: number;
}

// ===== Core PRNG (Jenkins small) =====

function rot(x: number, k: number): number {
    return ((x << k) | (x >>> (32 - k))) >>> 0;
}

function ranval(rng: RngState): number {
    const e = (rng.a - rot(rng.b, 27)) >>> 0;
    rng.a = (rng.b ^ rot(rng.c, 17)) >>> 0;
    rng.b = (rng.c + rng.d) >>> 0;
    rng.c = (rng.d + e) >>> 0;
    rng.d = (e + rng.a) >>> 0;
    return rng.d;
}

/**
 * Create a stream seeded from `seed`. The same seed always yields the
 * same sequence.
 */
export function createRng(seed: number): RngState {
    const lo = seed >>> 0;
    const hi = Math.floor(seed / 0x100000000) >>> 0;
    const rng: RngState = {
        a: 0xf1ea5eed,
        b: lo,
        c: (lo ^ hi) >>> 0,
        d: lo,
    };
    for (let i = 0; i < 20; i++) {
        ranval(rng);
    }
    return rng;
}

// ===== Ranges =====

const RAND_MAX_COMBO = 0xFFFFFFFF;

/** Unbiased value in [0, n-1], by rejection sampling. */
export function randInt0(rng: RngState, n: number): number {
    if (n <= 1) {
        return 0;
    }
    const div = Math.floor(RAND_MAX_COMBO / n);
    let r: number;
    do {
        r = Math.floor(ranval(rng) / div);
    } while (r >= n);
    return r;
}

/** Value in [lowerBound, upperBound], inclusive. */
export function randRange(rng: RngState, lowerBound: number, upperBound: number): number {
    if (upperBound <= lowerBound) {
        return lowerBound;
    }
    return lowerBound + randInt0(rng, upperBound - lowerBound + 1);
}

/** Value in [center - spread, center + spread]. */
export function randSpread(rng: RngState, center: number, spread: number): number {
    return randRange(rng, center - spread, center + spread);
}

/** True `percent` times out of 100. */
export function randPercent(rng: RngState, percent: number): boolean {
    return randInt0(rng, 100) < clamp(percent, 0, 100);
}

// ===== Utility functions =====

export function clamp(value: number, min: number, max: number): number {
    if (value < min) return min;
    if (value > max) return max;
    return value;
}
