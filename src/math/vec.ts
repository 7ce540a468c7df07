/**
 * 2D Vector helpers
 *
 * Plain float vectors for screen-space and world-space positions. Vectors are
 * immutable values: every function returns a new object.
 */

// ============================================
// 2D Vector
// ============================================

export interface Vec2 {
    readonly x: number;
    readonly y: number;
}

export function vec2(x: number, y: number): Vec2 {
    return { x, y };
}

export function vec2Add(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x + b.x, y: a.y + b.y };
}

export function vec2Sub(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x - b.x, y: a.y - b.y };
}

export function vec2Scale(v: Vec2, s: number): Vec2 {
    return { x: v.x * s, y: v.y * s };
}

export function vec2LengthSq(v: Vec2): number {
    return v.x * v.x + v.y * v.y;
}

export function vec2Length(v: Vec2): number {
    return Math.sqrt(vec2LengthSq(v));
}

export function vec2Distance(a: Vec2, b: Vec2): number {
    return vec2Length(vec2Sub(a, b));
}

/** Component-wise comparison within `epsilon`. */
export function vec2Equals(a: Vec2, b: Vec2, epsilon: number = 0): boolean {
    return Math.abs(a.x - b.x) <= epsilon && Math.abs(a.y - b.y) <= epsilon;
}
