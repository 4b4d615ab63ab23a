import { Vertex } from "./util";

function sign(v: number): -1 | 0 | 1 {
    return v > 0 ? 1 : v < 0 ? -1 : 0;
}

/**
 * Convexity test on exact cross products of consecutive edges.
 *
 * Every turn must go the same way, and the edges may reverse direction at
 * most twice along each axis, which rules out star polygons. Straight runs
 * through a collinear vertex are allowed; zero-length edges and edges that
 * double back are not.
 */
export function isConvex(points: ArrayLike<Vertex>, n = points.length): boolean {
    if (n < 3) { return true; }

    let { x: px, y: py } = points[n - 1];
    let dx0 = px - points[n - 2].x;
    let dy0 = py - points[n - 2].y;
    let xDir = sign(dx0);
    let yDir = sign(dy0);
    let xFlips = 0;
    let yFlips = 0;
    let turn = 0;

    for (let i = 0; i < n; i++) {
        const { x, y } = points[i];
        const dx = x - px;
        const dy = y - py;
        if (dx === 0 && dy === 0) { return false; }

        const cross = sign(dx0 * dy - dy0 * dx);
        if (cross === 0) {
            if (dx0 * dx + dy0 * dy < 0) { return false; }
        } else if (turn === 0) {
            turn = cross;
        } else if (cross !== turn) {
            return false;
        }

        const sx = sign(dx);
        if (sx !== 0) {
            if (xDir !== 0 && sx !== xDir) { xFlips++; }
            xDir = sx;
        }
        const sy = sign(dy);
        if (sy !== 0) {
            if (yDir !== 0 && sy !== yDir) { yFlips++; }
            yDir = sy;
        }

        dx0 = dx;
        dy0 = dy;
        px = x;
        py = y;
    }

    return turn !== 0 && xFlips <= 2 && yFlips <= 2;
}
