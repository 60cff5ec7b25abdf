import type { RectangleShape } from './physics/shapes';
import { vec2, type Vec2 } from './math';

/** Integer cell coordinate. */
export interface Cell {
  readonly x: number;
  readonly y: number;
}

/** Axis-aligned cell rectangle, `min` inclusive and `max` exclusive. */
export interface CellRect {
  readonly min: Cell;
  readonly max: Cell;
}

/** A non-empty terrain rectangle in level-local cell coordinates. */
export type LevelRect = CellRect;

export interface LevelCollider {
  shape: RectangleShape;
  /** Translation of the collider's center, in world units. */
  translation: Vec2;
}

/** Horizontal run of solid cells in one row, both ends inclusive. */
type Strip = readonly [left: number, right: number];

export function rectSize(rect: CellRect): Cell {
  return { x: rect.max.x - rect.min.x, y: rect.max.y - rect.min.y };
}

export function rectCenter(rect: CellRect): Vec2 {
  return vec2((rect.min.x + rect.max.x) / 2, (rect.min.y + rect.max.y) / 2);
}

export function rectContains(rect: CellRect, cell: Cell): boolean {
  return cell.x >= rect.min.x && cell.x < rect.max.x && cell.y >= rect.min.y && cell.y < rect.max.y;
}

/** Collider and center translation for `rect`, with one cell spanning `tileSize` world units. */
export function toCollider(rect: LevelRect, tileSize: number): LevelCollider {
  const size = rectSize(rect);
  const center = rectCenter(rect);
  return {
    shape: { kind: 'rectangle', width: size.x * tileSize, height: size.y * tileSize },
    translation: vec2(center.x * tileSize, center.y * tileSize),
  };
}

/**
 * Boolean occupancy grid over `bounds`, stored row-major with `y` increasing.
 * Reads outside the bounds are `false`.
 */
export class CollisionGrid {
  readonly bounds: CellRect;
  private readonly width: number;
  private readonly cells: boolean[];

  private constructor(bounds: CellRect, cells: boolean[]) {
    this.bounds = bounds;
    this.width = bounds.max.x - bounds.min.x;
    this.cells = cells;
  }

  static fromGrid(size: Cell, cells: readonly boolean[]): CollisionGrid {
    if (size.x * size.y !== cells.length) {
      throw new RangeError(
        `collision grid of ${size.x}x${size.y} needs ${size.x * size.y} cells, got ${cells.length}`,
      );
    }
    return new CollisionGrid({ min: { x: 0, y: 0 }, max: size }, [...cells]);
  }

  static empty(bounds: CellRect): CollisionGrid {
    return CollisionGrid.withDefault(bounds, false);
  }

  static filled(bounds: CellRect): CollisionGrid {
    return CollisionGrid.withDefault(bounds, true);
  }

  private static withDefault(bounds: CellRect, solid: boolean): CollisionGrid {
    const size = rectSize(bounds);
    const area = Math.max(0, size.x) * Math.max(0, size.y);
    return new CollisionGrid(bounds, new Array<boolean>(area).fill(solid));
  }

  get(cell: Cell): boolean {
    const index = this.linearize(cell);
    return index === null ? false : this.cells[index];
  }

  /** Cells outside the bounds are ignored. */
  set(cell: Cell, solid: boolean): this {
    const index = this.linearize(cell);
    if (index !== null) {
      this.cells[index] = solid;
    }
    return this;
  }

  setMany(entries: Iterable<readonly [Cell, boolean]>): this {
    for (const [cell, solid] of entries) {
      this.set(cell, solid);
    }
    return this;
  }

  /**
   * Reduces the grid to rectangles in absolute cell coordinates: one-cell-high
   * strips per row, then equal strips in consecutive rows merged downward.
   * Strips are consumed in stack order.
   */
  reduce(): CellRect[] {
    const { min, max } = this.bounds;
    const strips: Strip[][] = [];

    for (let y = min.y; y < max.y; y += 1) {
      const row: Strip[] = [];
      let stripStart: number | null = null;

      // The column one past the right edge is always empty, closing any open strip.
      for (let x = min.x; x <= max.x; x += 1) {
        const solid = this.get({ x, y });
        if (stripStart === null && solid) {
          stripStart = x;
        } else if (stripStart !== null && !solid) {
          row.push([stripStart, x - 1]);
          stripStart = null;
        }
      }

      strips.push(row);
    }

    // Empty sentinel row so every strip terminates.
    strips.push([]);

    const rects: CellRect[] = [];
    for (let row = 0; row < strips.length; row += 1) {
      const head = strips[row];
      let strip = head.pop();

      while (strip !== undefined) {
        const [left, right] = strip;
        for (let dy = 0; row + 1 + dy < strips.length; dy += 1) {
          const next = strips[row + 1 + dy];
          const match = next.findIndex((candidate) => candidate[0] === left && candidate[1] === right);
          if (match >= 0) {
            next.splice(match, 1);
            continue;
          }

          const y0 = min.y + row;
          rects.push({
            min: { x: left, y: y0 },
            max: { x: right + 1, y: y0 + dy + 1 },
          });
          break;
        }
        strip = head.pop();
      }
    }

    return rects;
  }

  /** Reduced rectangles relative to `bounds.min`. */
  build(): LevelRect[] {
    const { min } = this.bounds;
    return this.reduce().map((rect) => ({
      min: { x: rect.min.x - min.x, y: rect.min.y - min.y },
      max: { x: rect.max.x - min.x, y: rect.max.y - min.y },
    }));
  }

  private linearize(cell: Cell): number | null {
    const { min, max } = this.bounds;
    if (cell.x < min.x || cell.y < min.y || cell.x >= max.x || cell.y >= max.y) {
      return null;
    }
    return cell.x - min.x + this.width * (cell.y - min.y);
  }
}
