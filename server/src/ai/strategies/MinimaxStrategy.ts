/**
 * MinimaxStrategy - Game tree search with alpha-beta pruning
 *
 * Single-perspective minimax: every leaf is scored for the ROOT side, root
 * nodes maximize and opponent nodes minimize (no negamax sign flipping).
 * Each child is searched on its own board clone.
 */

import type { AIStrategy, SearchResult } from './AIStrategy.js';
import type { Board } from '../../game/Board.js';
import type { Move } from '../../game/Move.js';
import type { SearchConfig, SearchSummary, Side } from '../../game/types.js';
import { opponentOf } from '../../game/Board.js';
import { moveGenerator } from '../../game/MoveGenerator.js';
import { rulesEngine } from '../../game/RulesEngine.js';
import { DEFAULT_PRESET, evaluateBoard } from '../../game/ScoreEvaluator.js';

// ============================================================================
// Configuration
// ============================================================================

export const MIN_SEARCH_DEPTH = 1;
export const MAX_SEARCH_DEPTH = 5;

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  depth: 2,
  heuristic: DEFAULT_PRESET,
  tieBreak: 'lexicographic'
};

/**
 * Decides whether a candidate whose value exactly equals the current best
 * should replace it. Never consulted for strictly worse candidates.
 */
type TieBreakPolicy = (candidate: Move, incumbent: Move | null) => boolean;

export const TIE_BREAK_POLICIES: Readonly<Record<string, TieBreakPolicy>> = {
  // Earlier notation wins
  lexicographic: (candidate, incumbent) =>
    incumbent === null || candidate.toNotation() < incumbent.toNotation(),
  // First move reaching the value under the search ordering wins
  first: (_candidate, incumbent) => incumbent === null
};

function resolveTieBreak(name: string): TieBreakPolicy {
  return Object.hasOwn(TIE_BREAK_POLICIES, name) ? TIE_BREAK_POLICIES[name] : TIE_BREAK_POLICIES.first;
}

export type SearchOptions = {
  /** Disable alpha-beta cutoffs; same result, more nodes */
  pruning?: boolean;
};

// ============================================================================
// Move Ordering
// ============================================================================

/**
 * Pushes first, then longer lines, then notation ascending. Only changes how
 * much gets pruned, never the value found.
 */
export function orderMoves(board: Board, side: Side, moves: readonly Move[]): Move[] {
  const keyed = moves.map(move => ({
    move,
    push: rulesEngine.wouldPush(board, move, side) ? 0 : 1,
    notation: move.toNotation()
  }));

  keyed.sort((a, b) => {
    if (a.push !== b.push) return a.push - b.push;
    if (a.move.count !== b.move.count) return b.move.count - a.move.count;
    if (a.notation < b.notation) return -1;
    if (a.notation > b.notation) return 1;
    return 0;
  });

  return keyed.map(k => k.move);
}

// ============================================================================
// Minimax Core
// ============================================================================

type SearchContext = {
  rootSide: Side;
  heuristic: string;
  preferOnTie: TieBreakPolicy;
  pruning: boolean;
  nodes: number;
};

type NodeValue = {
  value: number;
  move: Move | null;
};

function minimax(
  board: Board,
  toMove: Side,
  pliesLeft: number,
  alpha: number,
  beta: number,
  ctx: SearchContext
): NodeValue {
  ctx.nodes++;

  if (pliesLeft === 0 || board.isGameOver()) {
    return { value: evaluateBoard(board, ctx.rootSide, ctx.heuristic), move: null };
  }

  const legalMoves = moveGenerator.generateLegalMoves(board, toMove);
  if (legalMoves.length === 0) {
    return { value: evaluateBoard(board, ctx.rootSide, ctx.heuristic), move: null };
  }

  const maximizing = toMove === ctx.rootSide;
  const next = opponentOf(toMove);
  let bestValue = maximizing ? -Infinity : Infinity;
  let bestMove: Move | null = null;

  for (const move of orderMoves(board, toMove, legalMoves)) {
    const child = board.clone();
    rulesEngine.executeMove(child, move, toMove);

    const { value } = minimax(child, next, pliesLeft - 1, alpha, beta, ctx);

    const improves = maximizing ? value > bestValue : value < bestValue;
    if (improves || (value === bestValue && ctx.preferOnTie(move, bestMove))) {
      bestValue = value;
      bestMove = move;
    }

    if (maximizing) {
      alpha = Math.max(alpha, bestValue);
    } else {
      beta = Math.min(beta, bestValue);
    }
    // Cut only once [alpha, beta] is empty; a child that merely touches the
    // window then returns its exact value, so ties resolve as without pruning
    if (ctx.pruning && beta < alpha) {
      break;
    }
  }

  return { value: bestValue, move: bestMove };
}

/**
 * Pick the best move for `side` within `config.depth` plies.
 * A null move means the side has no legal move; the score is then the static
 * evaluation of the position.
 */
export function searchBestMove(
  board: Board,
  side: Side,
  config: SearchConfig = DEFAULT_SEARCH_CONFIG,
  options: SearchOptions = {}
): SearchResult {
  if (!Number.isInteger(config.depth) || config.depth < MIN_SEARCH_DEPTH || config.depth > MAX_SEARCH_DEPTH) {
    throw new RangeError(`Search depth must be an integer from ${MIN_SEARCH_DEPTH} to ${MAX_SEARCH_DEPTH}, got ${config.depth}`);
  }

  const ctx: SearchContext = {
    rootSide: side,
    heuristic: config.heuristic,
    preferOnTie: resolveTieBreak(config.tieBreak),
    pruning: options.pruning ?? true,
    nodes: 0
  };

  const startTime = performance.now();
  const { value, move } = minimax(board, side, config.depth, -Infinity, Infinity, ctx);
  const elapsedMs = performance.now() - startTime;

  return {
    move,
    score: value,
    nodes: ctx.nodes,
    elapsedMs,
    depth: config.depth
  };
}

export function summarizeSearch(result: SearchResult): SearchSummary {
  return {
    notation: result.move ? result.move.toNotation() : null,
    score: result.score,
    nodes: result.nodes,
    elapsedMs: Math.round(result.elapsedMs * 1000) / 1000,
    depth: result.depth
  };
}

// ============================================================================
// MinimaxStrategy Implementation
// ============================================================================

export class MinimaxStrategy implements AIStrategy {
  readonly name = 'minimax';
  readonly version = 'v1-alphabeta';
  readonly description = 'Depth-limited minimax with alpha-beta pruning, push-first move ordering and deterministic tie-breaking';
  readonly config: SearchConfig;

  constructor(config: Partial<SearchConfig> = {}) {
    this.config = { ...DEFAULT_SEARCH_CONFIG, ...config };
  }

  chooseMove(board: Board, side: Side): SearchResult {
    return searchBestMove(board, side, this.config);
  }
}
