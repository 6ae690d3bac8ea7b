import { describe, expect, it } from "vitest";

import {
    bboxContains,
    bboxCorners,
    bboxHeight,
    bboxWidth,
    boundingBox,
    point,
    translateBbox,
    translatePoints,
    type Bbox,
    type Point
} from "../src/index";

const pts: Point[] = [point(1, 1), point(2, -2), point(-3, -3), point(-4, 4)];
const box: Bbox = { xmin: -4, xmax: 2, ymin: -3, ymax: 4 };

describe("bbox helpers", () => {
    it("lists corners top-left, top-right, bottom-right, bottom-left", () => {
        expect(bboxCorners(box)).toEqual([
            { x: -4, y: 4 },
            { x: 2, y: 4 },
            { x: 2, y: -3 },
            { x: -4, y: -3 },
        ]);
    });

    it("is idempotent over its own corners", () => {
        expect(boundingBox(bboxCorners(box))).toEqual(box);

        const degenerate: Bbox = { xmin: 40.02, xmax: 40.02, ymin: 116.34, ymax: 116.34 };
        expect(boundingBox(bboxCorners(degenerate))).toEqual(degenerate);
    });

    it("measures width and height", () => {
        expect(bboxWidth(box)).toBe(6);
        expect(bboxHeight(box)).toBe(7);
    });

    it("contains every input point, including those on the boundary", () => {
        const b = boundingBox(pts);
        expect(b).not.toBeNull();
        if (!b) return;
        for (const p of pts) expect(bboxContains(b, p)).toBe(true);
        expect(bboxContains(b, point(2.5, 0))).toBe(false);
        expect(bboxContains(b, point(0, -3.5))).toBe(false);
    });

    it("translates the box along with its points", () => {
        const dx = 10.5;
        const dy = -0.25;
        const moved = boundingBox(translatePoints(pts, dx, dy));
        expect(moved).toEqual({ xmin: 6.5, xmax: 12.5, ymin: -3.25, ymax: 3.75 });
        expect(moved).toEqual(translateBbox(box, dx, dy));
    });

    it("leaves the source points untouched when translating", () => {
        const src = [point(1, 2)];
        const moved = translatePoints(src, 3, 4);
        expect(moved).toEqual([{ x: 4, y: 6 }]);
        expect(src[0]).toEqual({ x: 1, y: 2 });
    });
});
