import { Vertex } from "./util";

// Axis-aligned clip region. Bounds are inclusive; y grows from top to bottom.
export class ClipRect {
    constructor(
        public readonly left: number,
        public readonly top: number,
        public readonly right: number,
        public readonly bottom: number,
    ) { }

    public get width(): number {
        return this.right - this.left;
    }

    public get height(): number {
        return this.bottom - this.top;
    }

    public contains({ x, y }: Vertex): boolean {
        return x >= this.left && x <= this.right && y >= this.top && y <= this.bottom;
    }

    public toJSON() {
        const { left, top, right, bottom } = this;
        return { left, top, right, bottom };
    }

    public static fromBounds(points: Iterable<Vertex>): ClipRect {
        let xmin = Number.MAX_VALUE;
        let ymin = Number.MAX_VALUE;
        let xmax = -Number.MAX_VALUE;
        let ymax = -Number.MAX_VALUE;

        for (const { x, y } of points) {
            if (x < xmin) { xmin = x; }
            if (x > xmax) { xmax = x; }
            if (y < ymin) { ymin = y; }
            if (y > ymax) { ymax = y; }
        }

        return new ClipRect(xmin, ymin, xmax, ymax);
    }
}
