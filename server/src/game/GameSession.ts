/**
 * GameSession
 * One game in progress: board, side to move, move history and configuration.
 * Shared by the WebSocket rooms and the MCP tool server; nothing here is
 * process-wide, so any number of sessions can run side by side.
 */

import type { ApplyResult, CellState, Controller, Scores, SearchConfig, SearchSummary, Side } from './types.js';
import type { GameConfig } from './GameConfig.js';
import type { Move } from './Move.js';
import { Board, opponentOf } from './Board.js';
import { DEFAULT_GAME_CONFIG, controllersFor, mergeConfig } from './GameConfig.js';
import { EngineInvariantError } from './errors.js';
import { formatPosition } from './HexGeometry.js';
import { buildMoveFromPayload } from './MovePayload.js';
import { moveGenerator } from './MoveGenerator.js';
import { rulesEngine } from './RulesEngine.js';
import { searchBestMove, summarizeSearch } from '../ai/strategies/MinimaxStrategy.js';

// ============================================================================
// Session Types
// ============================================================================

export type GameOverReason = 'score' | 'resign' | 'maxMoves';

export type GameStatus = {
  gameOver: boolean;
  winner: Side | null;   // null while playing, or for a drawn move-cap game
  reason: GameOverReason | null;
};

type HistoryEntry = {
  move: Move;
  side: Side;
  source: Controller;
  result: ApplyResult;
  search: SearchSummary | null;
  before: Board;
};

export type LegalMoveView = {
  marbles: string[];
  direction: [number, number];
  notation: string;
  isInline: boolean;
};

export type HistoryView = {
  notation: string;
  side: Side;
  source: Controller;
  pushedOff: boolean;
  captured: string | null;
  search: SearchSummary | null;
};

export type MoveReport = {
  side: Side;
  notation: string;
  source: Controller;
  pushed: string[];
  pushedOff: boolean;
  captured: string | null;
  search: SearchSummary | null;
};

export type SessionSnapshot = {
  cells: Record<string, CellState>;
  toMove: Side;
  controller: Controller;
  controllers: Record<Side, Controller>;
  config: GameConfig;
  scores: Scores;
  marbleCounts: Scores;
  status: GameStatus;
  legalMoves: LegalMoveView[];
  history: HistoryView[];
};

export type SessionResult<T> =
  | ({ ok: true } & T)
  | { ok: false; reason: string };

// ============================================================================
// GameSession
// ============================================================================

export class GameSession {
  private board: Board;
  private toMove: Side = 'black';
  private history: HistoryEntry[] = [];
  private resignedBy: Side | null = null;
  private config: GameConfig;

  constructor(config: GameConfig = DEFAULT_GAME_CONFIG) {
    this.config = config;
    this.board = Board.fromLayout(config.boardLayout);
  }

  get currentSide(): Side {
    return this.toMove;
  }

  get currentController(): Controller {
    return controllersFor(this.config)[this.toMove];
  }

  get moveCount(): number {
    return this.history.length;
  }

  get currentConfig(): GameConfig {
    return this.config;
  }

  /**
   * Copy of the live board; mutating it does not affect the game
   */
  getBoard(): Board {
    return this.board.clone();
  }

  status(): GameStatus {
    if (this.resignedBy) {
      return { gameOver: true, winner: opponentOf(this.resignedBy), reason: 'resign' };
    }

    const winner = this.board.winner();
    if (winner) {
      return { gameOver: true, winner, reason: 'score' };
    }

    if (this.config.maxMoves > 0 && this.history.length >= this.config.maxMoves) {
      const black = this.board.getScore('black');
      const white = this.board.getScore('white');
      const leader = black > white ? 'black' : white > black ? 'white' : null;
      return { gameOver: true, winner: leader, reason: 'maxMoves' };
    }

    return { gameOver: false, winner: null, reason: null };
  }

  legalMoves(): Move[] {
    return moveGenerator.generateLegalMoves(this.board, this.toMove);
  }

  // ============================================================================
  // Moves
  // ============================================================================

  applyHumanMove(payload: unknown): SessionResult<{ move: MoveReport }> {
    const blocked = this.turnBlocked('human');
    if (blocked) return { ok: false, reason: blocked };

    const built = buildMoveFromPayload(payload);
    if (!built.ok) return { ok: false, reason: built.reason };

    const check = rulesEngine.checkMove(this.board, built.move, this.toMove);
    if (!check.legal) return { ok: false, reason: check.reason };

    return { ok: true, move: this.commit(built.move, 'human', null) };
  }

  /**
   * Let the search play the side to move. Throws EngineInvariantError if the
   * search returns a move the rules reject.
   */
  applyAgentMove(): SessionResult<{ move: MoveReport }> {
    const blocked = this.turnBlocked('ai');
    if (blocked) return { ok: false, reason: blocked };

    const result = searchBestMove(this.board, this.toMove, this.searchConfig());
    if (!result.move) {
      return { ok: false, reason: `No legal moves for ${this.toMove}.` };
    }

    const check = rulesEngine.checkMove(this.board, result.move, this.toMove);
    if (!check.legal) {
      throw new EngineInvariantError(`Agent produced invalid move: ${check.reason}`, result.move.toNotation());
    }

    return { ok: true, move: this.commit(result.move, 'ai', summarizeSearch(result)) };
  }

  /**
   * Run the search for the side to move without playing anything
   */
  suggestMove(): SessionResult<{ search: SearchSummary }> {
    if (this.status().gameOver) return { ok: false, reason: 'Game is over' };
    return { ok: true, search: summarizeSearch(searchBestMove(this.board, this.toMove, this.searchConfig())) };
  }

  private turnBlocked(source: Controller): string | null {
    if (this.status().gameOver) return 'Game is over';
    if (this.currentController !== source) {
      return source === 'human' ? 'It is an AI-controlled turn.' : 'It is a human-controlled turn.';
    }
    return null;
  }

  private searchConfig(): SearchConfig {
    return {
      depth: this.config.aiDepth,
      heuristic: this.config.heuristic,
      tieBreak: this.config.tieBreak
    };
  }

  private commit(move: Move, source: Controller, search: SearchSummary | null): MoveReport {
    const side = this.toMove;
    const before = this.board.clone();
    const result = rulesEngine.executeMove(this.board, move, side);

    this.history.push({ move, side, source, result, search, before });
    this.toMove = opponentOf(side);

    const notation = move.toNotation(result.pushed.length > 0);
    console.log(`${source === 'ai' ? '🤖' : '👤'} ${side} played ${notation}${result.pushedOff ? ' (push-off!)' : ''}`);

    return {
      side,
      notation,
      source,
      pushed: result.pushed.map(formatPosition),
      pushedOff: result.pushedOff,
      captured: result.captured ? formatPosition(result.captured) : null,
      search
    };
  }

  // ============================================================================
  // Game Control
  // ============================================================================

  undo(): SessionResult<{ notation: string }> {
    const entry = this.history.pop();
    if (!entry) return { ok: false, reason: 'Nothing to undo' };

    this.board = entry.before;
    this.toMove = entry.side;
    this.resignedBy = null;
    return { ok: true, notation: entry.move.toNotation(entry.result.pushed.length > 0) };
  }

  reset(): SessionResult<{}> {
    this.board = Board.fromLayout(this.config.boardLayout);
    this.toMove = 'black';
    this.history = [];
    this.resignedBy = null;
    return { ok: true };
  }

  /**
   * The side to move resigns; the opponent wins
   */
  resign(): SessionResult<{ winner: Side }> {
    if (this.status().gameOver) return { ok: false, reason: 'Game is already over' };
    this.resignedBy = this.toMove;
    return { ok: true, winner: opponentOf(this.toMove) };
  }

  /**
   * Update the configuration. A layout change takes effect on the next reset.
   */
  configure(payload: unknown): SessionResult<{ config: GameConfig }> {
    const merged = mergeConfig(this.config, payload);
    if (!merged.ok) return merged;
    this.config = merged.config;
    return { ok: true, config: this.config };
  }

  // ============================================================================
  // Serialization
  // ============================================================================

  snapshot(): SessionSnapshot {
    const status = this.status();
    const controllers = controllersFor(this.config);

    const legalMoves = !status.gameOver && controllers[this.toMove] === 'human'
      ? this.legalMoves().map((move): LegalMoveView => ({
          marbles: move.marbles.map(formatPosition),
          direction: [move.direction.dRow, move.direction.dCol],
          notation: move.toNotation(),
          isInline: move.isInline
        }))
      : [];

    return {
      cells: this.board.toCellMap(),
      toMove: this.toMove,
      controller: controllers[this.toMove],
      controllers,
      config: this.config,
      scores: this.board.scores(),
      marbleCounts: {
        black: this.board.marbleCount('black'),
        white: this.board.marbleCount('white')
      },
      status,
      legalMoves,
      history: this.history.map(entry => ({
        notation: entry.move.toNotation(entry.result.pushed.length > 0),
        side: entry.side,
        source: entry.source,
        pushedOff: entry.result.pushedOff,
        captured: entry.result.captured ? formatPosition(entry.result.captured) : null,
        search: entry.search
      }))
    };
  }
}
