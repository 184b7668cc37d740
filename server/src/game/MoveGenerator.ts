/**
 * MoveGenerator
 * Enumerates every distinct legal move for a side.
 *
 * Lines are only grown forward along the three positive axes and only through
 * the side's own marbles, so each line is built once from its lowest member
 * instead of filtering the raw 14 x 60 shape space.
 */

import type { Position, Side } from './types.js';
import type { Board } from './Board.js';
import { DIRECTIONS, POSITIVE_DIRECTIONS } from './constants.js';
import { neighbor } from './HexGeometry.js';
import { Move } from './Move.js';
import { rulesEngine, type RulesEngine } from './RulesEngine.js';

export type MoveCategories = {
  singleInline: Move[];
  doubleInline: Move[];
  doubleBroadside: Move[];
  tripleInline: Move[];
  tripleBroadside: Move[];
};

export class MoveGenerator {
  private rules: RulesEngine;

  constructor(rules: RulesEngine = rulesEngine) {
    this.rules = rules;
  }

  /**
   * Legal moves in insertion order: by marble, then axis, then direction.
   * Callers that need a stable order must sort.
   */
  generateLegalMoves(board: Board, side: Side): Move[] {
    const moves: Move[] = [];
    const seen = new Set<string>();

    const tryLine = (line: Position[]) => {
      for (const direction of DIRECTIONS) {
        const move = Move.of(line, direction);
        if (seen.has(move.key)) continue;
        seen.add(move.key);
        if (this.rules.isLegal(board, move, side)) {
          moves.push(move);
        }
      }
    };

    for (const marble of board.marblesOf(side)) {
      tryLine([marble]);

      for (const axis of POSITIVE_DIRECTIONS) {
        const second = neighbor(marble, axis);
        if (board.get(second) !== side) continue;
        tryLine([marble, second]);

        const third = neighbor(second, axis);
        if (board.get(third) !== side) continue;
        tryLine([marble, second, third]);
      }
    }

    return moves;
  }

  countLegalMoves(board: Board, side: Side): number {
    return this.generateLegalMoves(board, side).length;
  }
}

export function categorizeMoves(moves: readonly Move[]): MoveCategories {
  const categories: MoveCategories = {
    singleInline: [],
    doubleInline: [],
    doubleBroadside: [],
    tripleInline: [],
    tripleBroadside: []
  };

  for (const move of moves) {
    if (move.count === 1) {
      categories.singleInline.push(move);
    } else if (move.count === 2) {
      (move.isInline ? categories.doubleInline : categories.doubleBroadside).push(move);
    } else {
      (move.isInline ? categories.tripleInline : categories.tripleBroadside).push(move);
    }
  }

  return categories;
}

export const moveGenerator = new MoveGenerator();
