/**
 * AIStrategy Interface
 * Defines the contract for all move-choosing strategies
 */

import type { Board } from '../../game/Board.js';
import type { Move } from '../../game/Move.js';
import type { SearchConfig, Side } from '../../game/types.js';

export type SearchResult = {
  move: Move | null;  // null when the side has no legal move
  score: number;      // from the mover's perspective
  nodes: number;
  elapsedMs: number;
  depth: number;
};

export interface AIStrategy {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly config: SearchConfig;

  /**
   * Choose a move for `side`. Synchronous: depth is the only bound on work.
   */
  chooseMove(board: Board, side: Side): SearchResult;
}
