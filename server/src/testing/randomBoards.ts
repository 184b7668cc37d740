/**
 * Seeded random positions for tests that sweep many boards
 */

import { Board } from '../game/Board.js';
import { ALL_POSITIONS, CELL_COUNT } from '../game/HexGeometry.js';

export type Random = () => number;

/**
 * mulberry32: small deterministic generator returning values in [0, 1)
 */
export function seededRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(random: Random, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Board with between min and max marbles per side on distinct random cells
 */
export function randomBoard(random: Random, min: number, max: number): Board {
  const order = Array.from({ length: CELL_COUNT }, (_, i) => i);
  for (let i = order.length - 1; i > 0; i--) {
    const j = randomInt(random, 0, i);
    [order[i], order[j]] = [order[j], order[i]];
  }

  const blackCount = randomInt(random, min, max);
  const whiteCount = randomInt(random, min, max);
  const board = Board.empty();
  order.slice(0, blackCount).forEach(i => board.set(ALL_POSITIONS[i], 'black'));
  order.slice(blackCount, blackCount + whiteCount).forEach(i => board.set(ALL_POSITIONS[i], 'white'));
  return board;
}

export function randomBoards(seed: number, count: number, min: number, max: number): Board[] {
  const random = seededRandom(seed);
  return Array.from({ length: count }, () => randomBoard(random, min, max));
}
