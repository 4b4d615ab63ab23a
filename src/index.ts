export { clipAxis } from "./AxisPass";
export { clip, clipPolygon, clipPolygonChecked, requiredCapacity } from "./Clip";
export type { ClipOptions } from "./Clip";
export { ClipError } from "./ClipError";
export type { ClipErrorCode } from "./ClipError";
export { ClipRect } from "./ClipRect";
export { isConvex } from "./Conditioning";
export { ConvexPolygon } from "./ConvexPolygon";
export { FLOAT64, INT16, INT32 } from "./Coordinates";
export type { CoordinateType } from "./Coordinates";
export { Axis, isVisible, polygonArea, toVertex, vert_eql } from "./util";
export type { ExternalVertex, Vertex } from "./util";
