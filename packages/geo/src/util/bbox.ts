import type { Bbox, Point } from "../types";

/** Corners in order: top-left, top-right, bottom-right, bottom-left. */
export function bboxCorners(box: Bbox): [Point, Point, Point, Point] {
    return [
        { x: box.xmin, y: box.ymax },
        { x: box.xmax, y: box.ymax },
        { x: box.xmax, y: box.ymin },
        { x: box.xmin, y: box.ymin },
    ];
}

export function bboxWidth(box: Bbox): number {
    return box.xmax - box.xmin;
}

export function bboxHeight(box: Bbox): number {
    return box.ymax - box.ymin;
}

/** Inclusive: points on the boundary are contained. */
export function bboxContains(box: Bbox, p: Point): boolean {
    return p.x >= box.xmin && p.x <= box.xmax && p.y >= box.ymin && p.y <= box.ymax;
}

export function translateBbox(box: Bbox, dx: number, dy: number): Bbox {
    return {
        xmin: box.xmin + dx,
        xmax: box.xmax + dx,
        ymin: box.ymin + dy,
        ymax: box.ymax + dy,
    };
}

export function translatePoints(points: Iterable<Point>, dx: number, dy: number): Point[] {
    const out: Point[] = [];
    for (const p of points) out.push({ x: p.x + dx, y: p.y + dy });
    return out;
}
