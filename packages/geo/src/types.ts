// ----------------------------
// Geometry value types
// ----------------------------

export type Point = {
    readonly x: number;
    readonly y: number;
};

/** Ordered sequence of points describing a path. May be empty. */
export type LineString = readonly Point[];

/**
 * Axis-aligned rectangle.
 *
 * For a box produced from a non-empty input, `xmin <= xmax` and `ymin <= ymax`.
 * A single point yields a degenerate box with zero width and height.
 */
export type Bbox = {
    readonly xmin: number;
    readonly xmax: number;
    readonly ymin: number;
    readonly ymax: number;
};

export function point(x: number, y: number): Point {
    return Object.freeze({ x, y });
}

export function lineString(points: Iterable<Point>): LineString {
    return Object.freeze(Array.from(points));
}
