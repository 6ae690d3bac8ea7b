import type { Bbox, Point } from "../types";

export type BoundingBoxOptions = {
    /**
     * If true, throw on the first NaN or infinite coordinate instead of
     * returning a box. Default: false (such inputs give unspecified results).
     */
    finiteOnly?: boolean;
};

/**
 * Axis-aligned bounding box of a sequence of points, in a single pass.
 *
 * Min and max are tracked independently per axis, so the extremal x and y
 * need not come from the same point.
 *
 * Returns null for an empty sequence. A single point yields a degenerate box.
 *
 * NaN or infinite coordinates produce unspecified results; use `finiteOnly`
 * to reject them.
 */
export function boundingBox(points: Iterable<Point>, options: BoundingBoxOptions = {}): Bbox | null {
    const finiteOnly = options.finiteOnly ?? false;

    let xmin = Infinity;
    let xmax = -Infinity;
    let ymin = Infinity;
    let ymax = -Infinity;
    let count = 0;

    for (const p of points) {
        const { x, y } = p;
        if (finiteOnly && (!Number.isFinite(x) || !Number.isFinite(y))) {
            throw new Error(`@linebox/geo: boundingBox coordinates must be finite (point ${count})`);
        }
        if (x < xmin) xmin = x;
        if (x > xmax) xmax = x;
        if (y < ymin) ymin = y;
        if (y > ymax) ymax = y;
        count++;
    }

    if (count === 0) return null;

    return { xmin, xmax, ymin, ymax };
}
