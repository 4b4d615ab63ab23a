export type Vertex = {
    x: number;
    y: number;
}

export type ExternalVertex = Vertex | [number, number];

export function toVertex(p: ExternalVertex): Vertex {
    return Array.isArray(p) ? { x: p[0] || 0, y: p[1] || 0 } : { x: p.x, y: p.y };
}

export function vert_eql(a: Vertex, b: Vertex): boolean {
    return a.x === b.x && a.y === b.y;
}

export enum Axis {
    X,
    Y,
}

// A polygon with fewer vertices than this has no area.
export const MIN_VISIBLE = 3;

export function isVisible(count: number): boolean {
    return count >= MIN_VISIBLE;
}

// Signed shoelace area; the sign follows the winding order.
export function polygonArea(points: ArrayLike<Vertex>, n = points.length) {
    if (n === 0) { return 0; }
    let a = 0;
    let { x: jx, y: jy } = points[n - 1];
    for (let i = 0; i < n; i++) {
        const { x: ix, y: iy } = points[i];
        a += (jx + ix) * (jy - iy);
        jx = ix;
        jy = iy;
    }
    return a / 2;
}
