export type GeoVersion = "0.1.0";

export const GEO_VERSION: GeoVersion = "0.1.0";

// ----------------------------
// Core Types
// ----------------------------

export type { Point, LineString, Bbox } from "./types";
export { point, lineString } from "./types";

// ----------------------------
// Bounding box
// ----------------------------

export type { BoundingBoxOptions } from "./algorithm/boundingBox";
export { boundingBox } from "./algorithm/boundingBox";

// ----------------------------
// Box helpers
// ----------------------------

export {
    bboxCorners,
    bboxWidth,
    bboxHeight,
    bboxContains,
    translateBbox,
    translatePoints
} from "./util/bbox";
