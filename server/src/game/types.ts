/**
 * Game Types
 * Centralized type definitions for the Abalone engine and its front ends
 */

// ============================================================================
// Board Geometry Types
// ============================================================================

/**
 * A cell on the hex board. Rows 0..8 are labeled a..i, columns run 1..9.
 */
export type Position = {
  readonly row: number;
  readonly col: number;
};

export type DirectionName = 'E' | 'W' | 'NW' | 'SE' | 'NE' | 'SW';

/**
 * One of the six canonical unit vectors. Only the values exported from
 * constants.ts are directions; compare against those, never build one by hand.
 */
export type Direction = {
  readonly name: DirectionName;
  readonly dRow: number;
  readonly dCol: number;
};

// ============================================================================
// Players & Cells
// ============================================================================

export type Side = 'black' | 'white';

export type CellState = 'empty' | Side;

export type Scores = Record<Side, number>;

export type Controller = 'human' | 'ai';

// ============================================================================
// Move Results
// ============================================================================

export type LegalityCheck =
  | { legal: true; kind: 'inline' | 'broadside'; pushes: number }
  | { legal: false; reason: string };

/**
 * What happened to the opponent when a move was applied
 */
export type ApplyResult = {
  pushed: Position[];   // opponent marbles displaced, nearest first (positions before the move)
  pushedOff: boolean;
  captured: Position | null; // the marble that left the board, if any
};

export type MoveOutcome =
  | { ok: true; result: ApplyResult }
  | { ok: false; reason: string };

// ============================================================================
// Search Types
// ============================================================================

export type SearchConfig = {
  readonly depth: number;
  readonly heuristic: string;
  readonly tieBreak: string;
};

export type SearchSummary = {
  notation: string | null;
  score: number;
  nodes: number;
  elapsedMs: number;
  depth: number;
};
