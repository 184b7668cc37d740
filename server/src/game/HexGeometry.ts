/**
 * HexGeometry
 * Valid-cell set, adjacency and direction algebra for the hexagonal board
 *
 * Coordinate system:
 *   - Rows: a (0) at the bottom to i (8) at the top
 *   - Cols: 1 (left) to 9 (right)
 *   - Row r spans columns 1..5+r below the middle and r-3..9 above it
 *
 *            i5 .. i9
 *          h4 .. .. h9
 *        .. .. .. .. ..
 *      e1 .. .. e5 .. .. e9
 *        .. .. .. .. ..
 *          b1 .. .. b6
 *            a1 .. a5
 */

import type { Direction, DirectionName, Position } from './types.js';
import { BOARD_RADIUS, CENTER, DIRECTION_BY_NAME, DIRECTIONS, POSITIVE_DIRECTIONS, ROW_COUNT, ROW_LETTERS } from './constants.js';

const GRID_WIDTH = 10; // columns 0..9, column 0 is never on the board

function columnRange(row: number): { min: number; max: number } {
  if (row <= BOARD_RADIUS) {
    return { min: 1, max: 5 + row };
  }
  return { min: row - 3, max: 9 };
}

function buildPositions(): Position[] {
  const positions: Position[] = [];
  for (let row = 0; row < ROW_COUNT; row++) {
    const { min, max } = columnRange(row);
    for (let col = min; col <= max; col++) {
      positions.push({ row, col });
    }
  }
  return positions;
}

/**
 * Every on-board cell, sorted by (row, col). A cell's index in this list is
 * its slot in Board's flat cell array.
 */
export const ALL_POSITIONS: readonly Position[] = buildPositions();

export const CELL_COUNT = ALL_POSITIONS.length;

const INDEX_GRID: Int16Array = (() => {
  const grid = new Int16Array(ROW_COUNT * GRID_WIDTH).fill(-1);
  ALL_POSITIONS.forEach((pos, index) => {
    grid[pos.row * GRID_WIDTH + pos.col] = index;
  });
  return grid;
})();

/**
 * Flat index of a position, or -1 when it is off the board
 */
export function positionIndex(pos: Position): number {
  if (pos.row < 0 || pos.row >= ROW_COUNT || pos.col < 1 || pos.col >= GRID_WIDTH) {
    return -1;
  }
  return INDEX_GRID[pos.row * GRID_WIDTH + pos.col];
}

export function isValidPosition(pos: Position): boolean {
  return positionIndex(pos) >= 0;
}

export function neighbor(pos: Position, dir: Direction): Position {
  return { row: pos.row + dir.dRow, col: pos.col + dir.dCol };
}

/**
 * Look up the canonical direction for a delta. Anything that is not one of
 * the six unit vectors yields null.
 */
export function directionFromVector(dRow: number, dCol: number): Direction | null {
  return DIRECTIONS.find(d => d.dRow === dRow && d.dCol === dCol) ?? null;
}

function isDirectionName(text: string): text is DirectionName {
  return Object.hasOwn(DIRECTION_BY_NAME, text);
}

export function directionByName(name: string): Direction | null {
  const key = name.trim().toUpperCase();
  return isDirectionName(key) ? DIRECTION_BY_NAME[key] : null;
}

export function oppositeDirection(dir: Direction): Direction {
  const opposite = directionFromVector(-dir.dRow, -dir.dCol);
  if (!opposite) {
    throw new Error(`Not a canonical direction: (${dir.dRow}, ${dir.dCol})`);
  }
  return opposite;
}

export function sameDirection(a: Direction, b: Direction): boolean {
  return a.dRow === b.dRow && a.dCol === b.dCol;
}

/**
 * True when b lies along a's axis, in either sense
 */
export function isParallel(a: Direction, b: Direction): boolean {
  return sameDirection(a, b) || (a.dRow === -b.dRow && a.dCol === -b.dCol);
}

export function samePosition(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}

export function comparePositions(a: Position, b: Position): number {
  return a.row !== b.row ? a.row - b.row : a.col - b.col;
}

export function sortPositions(positions: readonly Position[]): Position[] {
  return [...positions].sort(comparePositions);
}

/**
 * Scalar projection onto a direction; larger means further along it
 */
export function projection(pos: Position, dir: Direction): number {
  return pos.row * dir.dRow + pos.col * dir.dCol;
}

export function centerDistance(pos: Position): number {
  return Math.abs(pos.row - CENTER.row) + Math.abs(pos.col - CENTER.col);
}

export function formatPosition(pos: Position): string {
  return `${ROW_LETTERS[pos.row] ?? '?'}${pos.col}`;
}

/**
 * Parse "e5"-style coordinates. Only checks syntax; callers decide whether an
 * off-board cell is acceptable.
 */
export function parsePosition(text: string): Position | null {
  const match = /^([a-i])([0-9])$/.exec(text.trim().toLowerCase());
  if (!match) return null;
  return { row: ROW_LETTERS.indexOf(match[1]), col: Number(match[2]) };
}

export type LineShape =
  | { kind: 'line'; axis: Direction | null } // axis is null for a single marble
  | { kind: 'off-axis' }
  | { kind: 'gapped'; axis: Direction };

/**
 * Classify a lexicographically sorted marble list: a contiguous line along one
 * positive axis, colinear but with gaps, or not on a common axis at all.
 */
export function lineShape(sorted: readonly Position[]): LineShape {
  if (sorted.length <= 1) {
    return { kind: 'line', axis: null };
  }

  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  const dRow = last.row - first.row;
  const dCol = last.col - first.col;

  for (const axis of POSITIVE_DIRECTIONS) {
    const steps = axis.dRow !== 0 ? dRow / axis.dRow : dCol / axis.dCol;
    if (!Number.isInteger(steps) || steps < 1) continue;
    if (steps * axis.dRow !== dRow || steps * axis.dCol !== dCol) continue;

    // Every marble must sit on the axis through the first one
    const onAxis = sorted.every(pos => {
      const k = axis.dRow !== 0 ? (pos.row - first.row) / axis.dRow : (pos.col - first.col) / axis.dCol;
      return Number.isInteger(k) && k * axis.dRow === pos.row - first.row && k * axis.dCol === pos.col - first.col;
    });
    if (!onAxis) return { kind: 'off-axis' };

    const contiguous = sorted.every((pos, i) =>
      pos.row === first.row + i * axis.dRow && pos.col === first.col + i * axis.dCol
    );
    return contiguous ? { kind: 'line', axis } : { kind: 'gapped', axis };
  }

  return { kind: 'off-axis' };
}
