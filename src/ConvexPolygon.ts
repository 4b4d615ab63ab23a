import { clip, ClipOptions } from "./Clip";
import { ClipRect } from "./ClipRect";
import { isConvex } from "./Conditioning";
import { ExternalVertex, isVisible, polygonArea, toVertex, Vertex, vert_eql } from "./util";

// An immutable convex polygon in either winding order.
export class ConvexPolygon {

    private area = NaN;
    private _bounds: ClipRect | null = null;

    private constructor(private readonly pointList: Vertex[]) { }

    public static fromPoints(points: ExternalVertex[]): ConvexPolygon {
        return new ConvexPolygon(points.map(toVertex));
    }

    public get isEmpty(): boolean {
        return this.pointList.length === 0;
    }

    public get isVisible(): boolean {
        return isVisible(this.pointList.length);
    }

    public get bounds(): ClipRect {
        if (this._bounds === null) {
            this._bounds = ClipRect.fromBounds(this.pointList);
        }
        return this._bounds;
    }

    // Return the number of points in the polygon.
    public getNumPoints(): number {
        return this.pointList.length;
    }

    // Return a copy of the vertex at the given index.
    public get(index: number): Vertex {
        const { x, y } = this.pointList[index];
        return { x, y };
    }

    public *iterVertices(): IterableIterator<Vertex> {
        for (const { x, y } of this.pointList) {
            yield { x, y };
        }
    }

    public getArea(): number {
        if (isNaN(this.area)) {
            this.area = Math.abs(polygonArea(this.pointList));
        }
        return this.area;
    }

    public isConvex(): boolean {
        return isConvex(this.pointList);
    }

    public clip(rect: ClipRect, options?: ClipOptions): ConvexPolygon {
        return new ConvexPolygon(clip(this.pointList, rect, options));
    }

    public reversed(): ConvexPolygon {
        return new ConvexPolygon(this.pointList.slice().reverse());
    }

    // Same vertices in the same cyclic order, starting anywhere.
    public equals(that: ConvexPolygon): boolean {
        if (that === this) { return true; }

        const { pointList: v } = this;
        const { pointList: u } = that;
        const n = v.length;
        if (n !== u.length) { return false; }
        if (n === 0) { return true; }

        for (let k = 0; k < n; k++) {
            if (v.every((p, i) => vert_eql(p, u[(i + k) % n]))) {
                return true;
            }
        }
        return false;
    }

    public toJSON(): Vertex[] {
        return this.pointList.map(({ x, y }) => ({ x, y }));
    }
}
