import { clipAxis } from "./AxisPass";
import { ClipError } from "./ClipError";
import { ClipRect } from "./ClipRect";
import { isConvex } from "./Conditioning";
import { CoordinateType, INT16 } from "./Coordinates";
import { Axis, ExternalVertex, isVisible, toVertex, Vertex, vert_eql } from "./util";

export interface ClipOptions {
    /** Numeric width of the coordinates. Defaults to INT16. */
    coords?: CoordinateType;
    /** Validate the input with clipPolygonChecked before clipping. */
    checked?: boolean;
}

function resolveOptions({ coords = INT16, checked = false }: ClipOptions) {
    return { coords, checked };
}

/**
 * Buffer size that always holds a clipped convex polygon of `nVertices`.
 * Each pass grows a convex polygon by at most two vertices, so a triangle
 * can come out with seven.
 */
export function requiredCapacity(nVertices: number): number {
    return Math.max(2 * nVertices, nVertices + 4);
}

/**
 * Clip a convex polygon of either winding to `rect`, first along X into
 * `scratch`, then along Y into `output`.
 *
 * Nothing is validated: `nVertices` must be at least 1, the rect must not be
 * inverted and both buffers need room for the clipped polygon (see
 * requiredCapacity).
 *
 * @returns the number of vertices in `output`. Below 3 the polygon is not
 * visible and `output` holds nothing meaningful.
 */
export function clipPolygon(
    source: ArrayLike<Vertex>,
    nVertices: number,
    rect: ClipRect,
    scratch: Vertex[],
    output: Vertex[],
    coords: CoordinateType = INT16,
): number {
    const { narrow } = coords;
    const count = clipAxis(Axis.X, source, nVertices, narrow(rect.left), narrow(rect.right), scratch, coords);

    // Clipped out along X; no need for the second pass.
    if (!isVisible(count)) { return count; }

    return clipAxis(Axis.Y, scratch, count, narrow(rect.top), narrow(rect.bottom), output, coords);
}

/**
 * Same as clipPolygon, after checking every precondition it leaves to the
 * caller. Throws a ClipError naming the first one that fails; buffers are
 * untouched in that case.
 */
export function clipPolygonChecked(
    source: ArrayLike<Vertex>,
    nVertices: number,
    rect: ClipRect,
    scratch: Vertex[],
    output: Vertex[],
    coords: CoordinateType = INT16,
): number {
    if (!Number.isInteger(nVertices) || nVertices < 1 || nVertices > source.length) {
        throw new ClipError("BAD_VERTEX_COUNT",
            `Vertex count ${nVertices} is not between 1 and ${source.length}`);
    }

    const { left, top, right, bottom } = rect;
    if (left > right || top > bottom) {
        throw new ClipError("INVERTED_RECT",
            `Clip rect (${left}, ${top}, ${right}, ${bottom}) is inverted`);
    }

    for (const bound of [left, top, right, bottom]) {
        if (!coords.fits(bound)) {
            throw new ClipError("COORDINATE_RANGE", `Clip bound ${bound} is not a valid ${coords.name}`);
        }
    }

    for (let i = 0; i < nVertices; i++) {
        const { x, y } = source[i];
        if (!coords.fits(x) || !coords.fits(y)) {
            throw new ClipError("COORDINATE_RANGE", `Vertex ${i} (${x}, ${y}) is not a valid ${coords.name} point`);
        }
    }

    const capacity = requiredCapacity(nVertices);
    if (scratch.length < capacity || output.length < capacity) {
        throw new ClipError("BUFFER_CAPACITY",
            `Buffers of ${scratch.length} and ${output.length} vertices cannot hold ${capacity}`);
    }

    if (!isConvex(source, nVertices)) {
        throw new ClipError("NOT_CONVEX", "Source polygon is not convex");
    }

    return clipPolygon(source, nVertices, rect, scratch, output, coords);
}

// Drop vertices repeating their predecessor, wrapping from last to first.
function dropRepeats(points: Vertex[], count: number): Vertex[] {
    const kept: Vertex[] = [];
    for (let i = 0; i < count; i++) {
        const p = points[i];
        if (kept.length === 0 || !vert_eql(kept[kept.length - 1], p)) {
            kept.push(p);
        }
    }
    while (kept.length > 1 && vert_eql(kept[kept.length - 1], kept[0])) {
        kept.pop();
    }
    return kept;
}

/**
 * Clip `points` to `rect`, allocating the buffers.
 *
 * A vertex lying on a bound can come out of clipPolygon twice in a row;
 * the copy is removed here.
 *
 * @returns the visible polygon, or an empty array when nothing is visible.
 */
export function clip(points: ExternalVertex[], rect: ClipRect, options: ClipOptions = {}): Vertex[] {
    const { coords, checked } = resolveOptions(options);
    const n = points.length;
    if (n === 0) { return []; }

    const source = points.map(toVertex);
    const capacity = requiredCapacity(n);
    const scratch = new Array<Vertex>(capacity);
    const output = new Array<Vertex>(capacity);

    const count = checked ?
        clipPolygonChecked(source, n, rect, scratch, output, coords) :
        clipPolygon(source, n, rect, scratch, output, coords);

    if (!isVisible(count)) { return []; }

    const kept = dropRepeats(output, count);
    return isVisible(kept.length) ? kept : [];
}
