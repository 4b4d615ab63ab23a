import { CoordinateType } from "./Coordinates";
import { Axis, Vertex } from "./util";

/**
 * Clip a closed polygon against the slab `low <= axis <= high`.
 *
 * Edges are walked backwards from vertex 0, so the first edge is
 * `source[0] -> source[nVertices - 1]` and the last is `source[1] -> source[0]`.
 * Every edge that reaches the slab emits its (clamped) start point, plus a
 * point on the far bound when it leaves the slab. Crossing points are always
 * interpolated from the endpoint lying outside the bound, so an edge shared by
 * two polygons gets the same crossing in either direction.
 *
 * `output` must have room for `2 * nVertices` entries; nothing checks this.
 *
 * @returns the number of vertices written to `output`.
 */
export function clipAxis(
    axis: Axis,
    source: ArrayLike<Vertex>,
    nVertices: number,
    low: number,
    high: number,
    output: Vertex[],
    coords: CoordinateType,
): number {
    if (nVertices < 1) { return 0; }

    const a = axis === Axis.X ? "x" : "y";
    const o = axis === Axis.X ? "y" : "x";
    const { lerp } = coords;

    let pIndex = 0;
    const put = axis === Axis.X ?
        (along: number, across: number) => { output[pIndex++] = { x: along, y: across }; } :
        (along: number, across: number) => { output[pIndex++] = { x: across, y: along }; };

    let na = source[0][a];
    let no = source[0][o];

    for (let i = nVertices - 1; i >= 0; i--) {
        let a1 = na;
        let o1 = no;
        const a2 = source[i][a];
        const o2 = source[i][o];

        // The next edge starts from the unclipped end, even if this one is skipped.
        na = a2;
        no = o2;

        if (a1 > a2) {
            // Decreasing along the axis.
            if (a1 < low || a2 > high) { continue; }

            if (a1 > high) {
                o1 = lerp(o1, o2 - o1, high - a1, a2 - a1);
                a1 = high;
            }

            put(a1, o1);

            if (a2 < low) {
                put(low, lerp(o2, o1 - o2, low - a2, a1 - a2));
            }
        } else {
            if (a2 < low || a1 > high) { continue; }

            if (a1 < low) {
                o1 = lerp(o1, o2 - o1, low - a1, a2 - a1);
                a1 = low;
            }

            put(a1, o1);

            if (a2 > high) {
                put(high, lerp(o2, o1 - o2, high - a2, a1 - a2));
            }
        }
    }

    return pIndex;
}
