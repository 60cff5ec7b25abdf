import { describe, expect, it } from 'vitest';

import { CollisionGrid, rectContains, toCollider, type CellRect } from './collision-grid';

const T = true;
const F = false;

function coverage(grid: CollisionGrid, rects: CellRect[]): void {
  const { min, max } = grid.bounds;
  for (let y = min.y; y < max.y; y += 1) {
    for (let x = min.x; x < max.x; x += 1) {
      const covering = rects.filter((rect) => rectContains(rect, { x, y })).length;
      expect(covering).toBe(grid.get({ x, y }) ? 1 : 0);
    }
  }
}

describe('collision-grid', () => {
  it('reduces a staircase into two strips', () => {
    const grid = CollisionGrid.fromGrid({ x: 3, y: 2 }, [T, T, F, F, T, T]);
    const rects = grid.build();

    expect(rects).toHaveLength(2);
    expect(rects).toContainEqual({ min: { x: 0, y: 0 }, max: { x: 2, y: 1 } });
    expect(rects).toContainEqual({ min: { x: 1, y: 1 }, max: { x: 3, y: 2 } });
  });

  it('reduces a full grid to its bounds', () => {
    expect(CollisionGrid.fromGrid({ x: 2, y: 2 }, [T, T, T, T]).build()).toEqual([
      { min: { x: 0, y: 0 }, max: { x: 2, y: 2 } },
    ]);
  });

  it('reduces an empty grid to nothing', () => {
    expect(CollisionGrid.fromGrid({ x: 3, y: 3 }, new Array<boolean>(9).fill(false)).build()).toEqual([]);
  });

  it('keeps single rows one cell high', () => {
    const rects = CollisionGrid.fromGrid({ x: 5, y: 1 }, [T, F, T, T, F]).build();
    expect(rects).toEqual([
      { min: { x: 2, y: 0 }, max: { x: 4, y: 1 } },
      { min: { x: 0, y: 0 }, max: { x: 1, y: 1 } },
    ]);
  });

  it('merges equal strips downward and splits where they differ', () => {
    // Rows listed bottom (y = 0) first.
    const grid = CollisionGrid.fromGrid(
      { x: 4, y: 4 },
      [
        T, T, F, T,
        T, T, F, T,
        T, T, T, T,
        F, T, T, F,
      ],
    );
    const rects = grid.build();

    expect(rects).toEqual([
      { min: { x: 3, y: 0 }, max: { x: 4, y: 2 } },
      { min: { x: 0, y: 0 }, max: { x: 2, y: 2 } },
      { min: { x: 0, y: 2 }, max: { x: 4, y: 3 } },
      { min: { x: 1, y: 3 }, max: { x: 3, y: 4 } },
    ]);
    coverage(grid, rects);
  });

  it('covers every solid cell exactly once on an irregular grid', () => {
    const size = { x: 7, y: 5 };
    const cells = Array.from({ length: size.x * size.y }, (_, i) => (i * 7 + (i % 3)) % 5 < 3);
    const grid = CollisionGrid.fromGrid(size, cells);
    const rects = grid.build();

    coverage(grid, rects);
    for (const rect of rects) {
      expect(rect.max.x).toBeGreaterThan(rect.min.x);
      expect(rect.max.y).toBeGreaterThan(rect.min.y);
    }
  });

  it('works in absolute coordinates and builds relative to the minimum', () => {
    const bounds = { min: { x: -2, y: 3 }, max: { x: 1, y: 5 } };
    const grid = CollisionGrid.empty(bounds).setMany([
      [{ x: -2, y: 3 }, true],
      [{ x: -1, y: 3 }, true],
      [{ x: 40, y: 40 }, true],
    ]);

    expect(grid.get({ x: -1, y: 3 })).toBe(true);
    expect(grid.get({ x: 40, y: 40 })).toBe(false);
    expect(grid.reduce()).toEqual([{ min: { x: -2, y: 3 }, max: { x: 0, y: 4 } }]);
    expect(grid.build()).toEqual([{ min: { x: 0, y: 0 }, max: { x: 2, y: 1 } }]);
    expect(CollisionGrid.filled(bounds).build()).toEqual([{ min: { x: 0, y: 0 }, max: { x: 3, y: 2 } }]);
  });

  it('rejects cell arrays that do not match the size', () => {
    expect(() => CollisionGrid.fromGrid({ x: 2, y: 2 }, [T, T, T])).toThrow(RangeError);
  });

  it('turns a rectangle into a centred collider', () => {
    expect(toCollider({ min: { x: 1, y: 2 }, max: { x: 4, y: 3 } }, 2)).toEqual({
      shape: { kind: 'rectangle', width: 6, height: 2 },
      translation: { x: 5, y: 5 },
    });
  });
});
