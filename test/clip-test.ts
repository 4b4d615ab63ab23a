import 'mocha';
import { expect } from 'chai';

import {
  square, triangle, wideTriangle, apexOnBound,
  sharedLeft, sharedRight, sharedUpper, sharedLower,
} from './vertices';
import { clip, clipPolygon, requiredCapacity } from '../src/Clip';
import { ClipRect } from '../src/ClipRect';
import { isConvex } from '../src/Conditioning';
import { polygonArea, Vertex } from '../src/util';

function run(source: Vertex[], rect: ClipRect): Vertex[] {
  const n = source.length;
  const scratch = new Array<Vertex>(requiredCapacity(n));
  const output = new Array<Vertex>(requiredCapacity(n));
  const count = clipPolygon(source, n, rect, scratch, output);
  return output.slice(0, count);
}

function sortVertices(points: Vertex[]): Vertex[] {
  return points.slice().sort((a, b) => a.x - b.x || a.y - b.y);
}

describe("Test two-axis clipping", () => {
  it("should clip a square to its right half", () => {
    const rect = new ClipRect(5, -5, 15, 15);
    const output: Vertex[] = [];
    const count = clipPolygon(square, 4, rect, [], output);
    expect(count).eql(4);
    expect(output.slice(0, count)).eql([
      { x: 5, y: 10 }, { x: 5, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 10 },
    ]);
  });

  it("should cut both flanks off a triangle", () => {
    const p = run(triangle, new ClipRect(5, 0, 15, 20));
    expect(p).eql([
      { x: 5, y: 10 }, { x: 5, y: 0 }, { x: 15, y: 0 }, { x: 15, y: 10 }, { x: 10, y: 20 },
    ]);
    expect(Math.abs(polygonArea(p))).eql(150);
    expect(isConvex(p), "Clipped triangle is not convex.").to.be.true;
  });

  it("should return 0 for a triangle left of the region", () => {
    const tri = [{ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 5, y: 10 }];
    const count = clipPolygon(tri, 3, new ClipRect(100, 0, 200, 100), [], []);
    expect(count).eql(0);
  });

  it("should reject a polygon outside any single side", () => {
    const rects = [
      new ClipRect(20, 0, 30, 10),
      new ClipRect(-30, 0, -20, 10),
      new ClipRect(0, 20, 10, 30),
      new ClipRect(0, -30, 10, -20),
    ];
    for (const rect of rects) {
      expect(clipPolygon(square, 4, rect, [], [])).lessThan(3);
    }
  });

  it("should skip the second pass when the first clips everything", () => {
    const output: Vertex[] = [];
    const count = clipPolygon(square, 4, new ClipRect(20, 0, 30, 10), [], output);
    expect(count).eql(0);
    expect(output.length).eql(0);
  });

  it("should pass a contained polygon through unchanged", () => {
    expect(run(square, new ClipRect(-1, -1, 11, 11))).eql(square);
    expect(run(square, new ClipRect(0, 0, 10, 10))).eql(square);
  });

  it("should be idempotent", () => {
    const rect = new ClipRect(5, 0, 15, 20);
    const once = run(triangle, rect);
    expect(run(once, rect)).eql(once);

    const box = new ClipRect(0, 0, 100, 100);
    const hept = run(wideTriangle, box);
    expect(run(hept, box)).eql(hept);
  });

  it("should grow a triangle into a heptagon", () => {
    const p = run(wideTriangle, new ClipRect(0, 0, 100, 100));
    expect(p.length).eql(7);
    expect(requiredCapacity(3)).eql(7);
    expect(p).eql([
      { x: 0, y: 20 }, { x: 0, y: 0 }, { x: 36, y: 0 }, { x: 100, y: 38 },
      { x: 100, y: 94 }, { x: 97, y: 100 }, { x: 40, y: 100 },
    ]);
  });

  it("should not depend on winding order", () => {
    const rect = new ClipRect(5, 0, 15, 20);
    const cw = run(triangle, rect);
    const ccw = run(triangle.slice().reverse(), rect);
    expect(ccw).eql(cw.slice().reverse());

    const box = new ClipRect(0, 0, 100, 100);
    const a = run(wideTriangle, box);
    const b = run(wideTriangle.slice().reverse(), box);
    expect(sortVertices(b)).eql(sortVertices(a));
    expect(Math.abs(polygonArea(b))).eql(Math.abs(polygonArea(a)));
  });

  it("should place shared crossings identically on the X axis", () => {
    const rect = new ClipRect(5, -100, 100, 100);
    const left = run(sharedLeft, rect);
    const right = run(sharedRight, rect);
    expect(left).eql([{ x: 5, y: 18 }, { x: 5, y: 1 }, { x: 30, y: 7 }]);
    expect(right).eql([{ x: 30, y: 7 }, { x: 30, y: 30 }, { x: 5, y: 21 }, { x: 5, y: 18 }]);
  });

  it("should place shared crossings identically on the Y axis", () => {
    const rect = new ClipRect(-100, -100, 100, 30);
    const upper = run(sharedUpper, rect);
    const lower = run(sharedLower, rect);
    expect(upper).eql([{ x: 0, y: 0 }, { x: 40, y: 0 }, { x: 23, y: 30 }, { x: 8, y: 30 }]);
    expect(lower).eql([{ x: 40, y: 0 }, { x: 48, y: 30 }, { x: 23, y: 30 }]);
  });

  it("should report fewer than 3 vertices for degenerate input", () => {
    const rect = new ClipRect(0, 0, 10, 10);
    expect(clipPolygon([{ x: 1, y: 1 }], 1, rect, [], [])).eql(1);
    expect(clipPolygon([{ x: 1, y: 1 }, { x: 5, y: 5 }], 2, rect, [], [])).eql(2);
    expect(clipPolygon([], 0, rect, [], [])).eql(0);
  });

  it("should only read the first nVertices of the source", () => {
    const rect = new ClipRect(-1, -1, 11, 11);
    const extra = [...square, { x: 500, y: 500 }];
    const output = new Array<Vertex>(8);
    expect(clipPolygon(extra, 4, rect, new Array<Vertex>(8), output)).eql(4);
    expect(output.slice(0, 4)).eql(square);
  });

  it("should repeat a vertex lying on a bound in the fast path", () => {
    const output = new Array<Vertex>(requiredCapacity(3));
    const count = clipPolygon(apexOnBound, 3, new ClipRect(-5, -100, 5, 100), new Array<Vertex>(7), output);
    expect(count).eql(4);
    expect(output.slice(0, count)).eql([
      { x: 0, y: 0 }, { x: 5, y: 0 }, { x: 5, y: 10 }, { x: 5, y: 10 },
    ]);
  });

  it("should drop the repeated vertex in the allocating wrapper", () => {
    const rect = new ClipRect(-5, -100, 5, 100);
    const p = clip(apexOnBound, rect);
    expect(p).eql([{ x: 0, y: 0 }, { x: 5, y: 0 }, { x: 5, y: 10 }]);
    expect(isConvex(p), "Wrapper output is not convex.").to.be.true;
    expect(clip(p, rect, { checked: true })).eql(p);

    const reversed = clip(apexOnBound.slice().reverse(), rect);
    expect(reversed).eql([{ x: 5, y: 10 }, { x: 5, y: 0 }, { x: 0, y: 0 }]);
  });

  it("should treat a polygon touching one bound as invisible in the wrapper", () => {
    const rect = new ClipRect(10, 0, 20, 10);
    expect(clipPolygon(square, 4, rect, [], [])).eql(4);
    expect(clip(square, rect)).eql([]);
  });
});
