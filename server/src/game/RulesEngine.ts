/**
 * RulesEngine
 * Decides whether a move is legal for a side and applies it to a board
 * (sumito pushes, push-offs and scoring included)
 */

import type { ApplyResult, LegalityCheck, MoveOutcome, Position, Side } from './types.js';
import type { Move } from './Move.js';
import type { Board } from './Board.js';
import { opponentOf } from './Board.js';
import { formatPosition, isValidPosition, lineShape, neighbor, projection } from './HexGeometry.js';

export class RulesEngine {
  /**
   * Check a move against the board. Rules are tried in order: ownership,
   * line shape, then the inline or broadside rule.
   */
  checkMove(board: Board, move: Move, side: Side): LegalityCheck {
    for (const marble of move.marbles) {
      if (board.get(marble) !== side) {
        return { legal: false, reason: `No ${side} marble at ${formatPosition(marble)}.` };
      }
    }

    if (lineShape(move.sorted).kind !== 'line') {
      return { legal: false, reason: 'Marbles do not form a contiguous line.' };
    }

    return move.isInline
      ? this.checkInline(board, move, side)
      : this.checkBroadside(board, move);
  }

  isLegal(board: Board, move: Move, side: Side): boolean {
    return this.checkMove(board, move, side).legal;
  }

  /**
   * Validate, then apply. A rejected move leaves the board untouched.
   */
  applyMove(board: Board, move: Move, side: Side): MoveOutcome {
    const check = this.checkMove(board, move, side);
    if (!check.legal) {
      return { ok: false, reason: check.reason };
    }
    return { ok: true, result: this.executeMove(board, move, side) };
  }

  /**
   * Apply a move already known to be legal, mutating the board
   */
  executeMove(board: Board, move: Move, side: Side): ApplyResult {
    return move.isInline
      ? this.executeInline(board, move, side)
      : this.executeBroadside(board, move, side);
  }

  /**
   * True for an inline move of two or more marbles with an opposing marble
   * directly ahead of the leading one
   */
  wouldPush(board: Board, move: Move, side: Side): boolean {
    if (!move.isInline || move.count < 2) return false;
    return board.get(neighbor(move.leading, move.direction)) === opponentOf(side);
  }

  // ============================================================================
  // Legality
  // ============================================================================

  private checkInline(board: Board, move: Move, side: Side): LegalityCheck {
    const dir = move.direction;
    const ahead = neighbor(move.leading, dir);
    const aheadCell = board.get(ahead);

    if (aheadCell === null) {
      return { legal: false, reason: 'Cannot move own marble off the board.' };
    }
    if (aheadCell === 'empty') {
      return { legal: true, kind: 'inline', pushes: 0 };
    }
    if (aheadCell === side) {
      return { legal: false, reason: 'Cannot push own marble.' };
    }

    const opponent = opponentOf(side);
    let pushedCount = 0;
    let pos = ahead;
    while (board.get(pos) === opponent) {
      pushedCount++;
      pos = neighbor(pos, dir);
    }

    if (pushedCount >= move.count) {
      return {
        legal: false,
        reason: `Cannot push ${pushedCount} opposing marble${pushedCount === 1 ? '' : 's'} with ${move.count}; the pushing line must be longer.`
      };
    }

    // pos is now the first cell past the opposing chain
    const beyond = board.get(pos);
    if (beyond !== null && beyond !== 'empty') {
      return { legal: false, reason: `Cannot push: ${formatPosition(pos)} behind the pushed marbles is occupied.` };
    }

    return { legal: true, kind: 'inline', pushes: pushedCount };
  }

  private checkBroadside(board: Board, move: Move): LegalityCheck {
    for (const marble of move.marbles) {
      const dest = neighbor(marble, move.direction);
      const cell = board.get(dest);
      if (cell === null) {
        return { legal: false, reason: `Broadside destination ${formatPosition(dest)} is off the board.` };
      }
      if (cell !== 'empty') {
        return { legal: false, reason: `Broadside destination ${formatPosition(dest)} is occupied.` };
      }
    }
    return { legal: true, kind: 'broadside', pushes: 0 };
  }

  // ============================================================================
  // Application
  // ============================================================================

  private executeInline(board: Board, move: Move, side: Side): ApplyResult {
    const dir = move.direction;
    const opponent = opponentOf(side);

    const pushed: Position[] = [];
    let pos = neighbor(move.leading, dir);
    while (board.get(pos) === opponent) {
      pushed.push(pos);
      pos = neighbor(pos, dir);
    }

    const pushedOff = pushed.length > 0 && !isValidPosition(pos);
    const captured = pushedOff ? pushed[pushed.length - 1] : null;
    if (pushedOff) {
      board.recordCapture(side);
    }

    // Farthest first so no marble lands on one that has not moved yet
    for (let i = pushed.length - 1; i >= 0; i--) {
      const dest = neighbor(pushed[i], dir);
      if (isValidPosition(dest)) {
        board.set(dest, opponent);
      }
      board.set(pushed[i], 'empty');
    }

    // Own line, leading marble first
    const ownOrder = [...move.marbles].sort((a, b) => projection(b, dir) - projection(a, dir));
    for (const marble of ownOrder) {
      board.set(neighbor(marble, dir), side);
      board.set(marble, 'empty');
    }

    return { pushed, pushedOff, captured };
  }

  private executeBroadside(board: Board, move: Move, side: Side): ApplyResult {
    // Every destination is empty, so clearing first makes the order irrelevant
    for (const marble of move.marbles) {
      board.set(marble, 'empty');
    }
    for (const marble of move.marbles) {
      board.set(neighbor(marble, move.direction), side);
    }
    return { pushed: [], pushedOff: false, captured: null };
  }
}

/**
 * Shared stateless instance
 */
export const rulesEngine = new RulesEngine();
