/**
 * ScoreEvaluator - Centralized position scoring for the search
 *
 * A weighted sum of four symmetric terms, each "ours minus theirs":
 * - score:    marbles pushed off the board
 * - material: marbles still on the board
 * - center:   closeness to e5 (their summed distance minus ours)
 * - mobility: number of legal moves
 */

import type { Side } from './types.js';
import type { Board } from './Board.js';
import { opponentOf } from './Board.js';
import { centerDistance } from './HexGeometry.js';
import { moveGenerator } from './MoveGenerator.js';

export type HeuristicWeights = {
  score: number;
  material: number;
  center: number;
  mobility: number;
};

export const DEFAULT_PRESET = 'balanced';

export const HEURISTIC_PRESETS: Readonly<Record<string, HeuristicWeights>> = {
  // Material and captures dominate; center and mobility nudge quiet positions
  balanced: { score: 1400, material: 40, center: 4, mobility: 1 },
  // Ignores position entirely
  material: { score: 1800, material: 50, center: 0, mobility: 0 }
};

/**
 * Weighted contribution of each term, plus their sum
 */
export type ScoreBreakdown = {
  preset: string;
  total: number;
  score: number;
  material: number;
  center: number;
  mobility: number;
};

/**
 * Resolve a preset name; unknown names fall back to the balanced preset
 */
export function resolvePreset(name: string): { name: string; weights: HeuristicWeights } {
  if (Object.hasOwn(HEURISTIC_PRESETS, name)) {
    return { name, weights: HEURISTIC_PRESETS[name] };
  }
  return { name: DEFAULT_PRESET, weights: HEURISTIC_PRESETS[DEFAULT_PRESET] };
}

export function scoreAdvantage(board: Board, side: Side): number {
  return board.getScore(side) - board.getScore(opponentOf(side));
}

export function materialAdvantage(board: Board, side: Side): number {
  return board.marbleCount(side) - board.marbleCount(opponentOf(side));
}

export function centerControl(board: Board, side: Side): number {
  const distanceSum = (s: Side) =>
    board.marblesOf(s).reduce((sum, pos) => sum + centerDistance(pos), 0);
  return distanceSum(opponentOf(side)) - distanceSum(side);
}

export function mobility(board: Board, side: Side): number {
  return moveGenerator.countLegalMoves(board, side) - moveGenerator.countLegalMoves(board, opponentOf(side));
}

/**
 * Evaluate a board from one side's perspective. Higher is better for that side.
 * Terms with zero weight are skipped, which matters for mobility: it runs the
 * move generator for both sides.
 */
export function evaluateBreakdown(board: Board, side: Side, preset: string = DEFAULT_PRESET): ScoreBreakdown {
  const { name, weights } = resolvePreset(preset);

  const breakdown: ScoreBreakdown = {
    preset: name,
    total: 0,
    score: weights.score === 0 ? 0 : weights.score * scoreAdvantage(board, side),
    material: weights.material === 0 ? 0 : weights.material * materialAdvantage(board, side),
    center: weights.center === 0 ? 0 : weights.center * centerControl(board, side),
    mobility: weights.mobility === 0 ? 0 : weights.mobility * mobility(board, side)
  };

  breakdown.total = breakdown.score + breakdown.material + breakdown.center + breakdown.mobility;
  return breakdown;
}

/**
 * Quick evaluation - returns just the total score
 */
export function evaluateBoard(board: Board, side: Side, preset: string = DEFAULT_PRESET): number {
  return evaluateBreakdown(board, side, preset).total;
}
