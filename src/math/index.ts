/**
 * Math Module
 */

export type { Vec2 } from './vec';

export {
    vec2,
    vec2Add,
    vec2Sub,
    vec2Scale,
    vec2LengthSq,
    vec2Length,
    vec2Distance,
    vec2Equals
} from './vec';
