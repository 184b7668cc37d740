/**
 * Game Constants
 * Shared constants used across all game modules
 */

import type { Direction, DirectionName } from './types.js';

// Board dimensions
export const ROW_LETTERS = 'abcdefghi';
export const ROW_COUNT = 9;
export const BOARD_RADIUS = 4;
export const CENTER = { row: 4, col: 5 } as const; // e5

// Game rules
export const WIN_SCORE = 6;           // marbles pushed off to win
export const STARTING_MARBLES = 14;   // per side in every built-in layout
export const MAX_LINE_LENGTH = 3;     // marbles moved at once

// The six hex directions as (row, col) deltas
export const EAST: Direction = { name: 'E', dRow: 0, dCol: 1 };
export const WEST: Direction = { name: 'W', dRow: 0, dCol: -1 };
export const NORTH_WEST: Direction = { name: 'NW', dRow: 1, dCol: 0 };
export const SOUTH_EAST: Direction = { name: 'SE', dRow: -1, dCol: 0 };
export const NORTH_EAST: Direction = { name: 'NE', dRow: 1, dCol: 1 };
export const SOUTH_WEST: Direction = { name: 'SW', dRow: -1, dCol: -1 };

export const DIRECTIONS: readonly Direction[] = [
  EAST,
  WEST,
  NORTH_WEST,
  SOUTH_EAST,
  NORTH_EAST,
  SOUTH_WEST
];

// One direction per axis; lines are always anchored on their lowest marble
export const POSITIVE_DIRECTIONS: readonly Direction[] = [EAST, NORTH_WEST, NORTH_EAST];

export const DIRECTION_BY_NAME: Readonly<Record<DirectionName, Direction>> = {
  E: EAST,
  W: WEST,
  NW: NORTH_WEST,
  SE: SOUTH_EAST,
  NE: NORTH_EAST,
  SW: SOUTH_WEST
};
