/** A cell position on the circuit grid. y grows downward (south). */
export interface Coords {
  readonly x: number;
  readonly y: number;
}

/** An offset between two cells */
export interface CoordsDelta {
  readonly x: number;
  readonly y: number;
}

/** Width and height in cells */
export interface CoordsSize {
  readonly width: number;
  readonly height: number;
}

/** A rectangle of cells, anchored at its top-left cell */
export interface CoordsRect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

// =============================================================================
// Construction
// =============================================================================

export function coords(x: number, y: number): Coords {
  return { x, y };
}

export function size(width: number, height: number): CoordsSize {
  return { width, height };
}

export function rect(x: number, y: number, width: number, height: number): CoordsRect {
  return { x, y, width, height };
}

export function rectWithSize(topLeft: Coords, rectSize: CoordsSize): CoordsRect {
  return { x: topLeft.x, y: topLeft.y, width: rectSize.width, height: rectSize.height };
}

// =============================================================================
// Arithmetic
// =============================================================================

export function addDelta(c: Coords, delta: CoordsDelta): Coords {
  return { x: c.x + delta.x, y: c.y + delta.y };
}

export function scaleDelta(delta: CoordsDelta, factor: number): CoordsDelta {
  return { x: delta.x * factor, y: delta.y * factor };
}

export function deltaBetween(from: Coords, to: Coords): CoordsDelta {
  return { x: to.x - from.x, y: to.y - from.y };
}

export function coordsEqual(a: Coords, b: Coords): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Stable string key for using coords in Maps and Sets */
export function coordsKey(c: Coords): string {
  return `${c.x},${c.y}`;
}

/** Row-major ordering: by y, then by x */
export function compareCoords(a: Coords, b: Coords): number {
  return a.y !== b.y ? a.y - b.y : a.x - b.x;
}

// =============================================================================
// Rectangles
// =============================================================================

export function rectContains(r: CoordsRect, c: Coords): boolean {
  return c.x >= r.x && c.y >= r.y && c.x < r.x + r.width && c.y < r.y + r.height;
}

export function rectContainsRect(outer: CoordsRect, inner: CoordsRect): boolean {
  return (
    inner.x >= outer.x &&
    inner.y >= outer.y &&
    inner.x + inner.width <= outer.x + outer.width &&
    inner.y + inner.height <= outer.y + outer.height
  );
}

export function rectsIntersect(a: CoordsRect, b: CoordsRect): boolean {
  return (
    a.x < b.x + b.width &&
    b.x < a.x + a.width &&
    a.y < b.y + b.height &&
    b.y < a.y + a.height
  );
}

export function rectsEqual(a: CoordsRect, b: CoordsRect): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

export function rectTopLeft(r: CoordsRect): Coords {
  return { x: r.x, y: r.y };
}

export function rectSize(r: CoordsRect): CoordsSize {
  return { width: r.width, height: r.height };
}

/** All cells of the rectangle in row-major order */
export function rectCells(r: CoordsRect): Coords[] {
  const cells: Coords[] = [];
  for (let y = r.y; y < r.y + r.height; y++) {
    for (let x = r.x; x < r.x + r.width; x++) {
      cells.push({ x, y });
    }
  }
  return cells;
}
