/**
 * Move
 * Immutable value describing 1-3 marbles and the direction they travel in.
 * Everything derived from the marbles (classification, leading/trailing
 * marble, identity key) is computed once at construction.
 */

import type { Direction, Position } from './types.js';
import { MAX_LINE_LENGTH } from './constants.js';
import {
  formatPosition,
  isParallel,
  lineShape,
  neighbor,
  projection,
  samePosition,
  sortPositions
} from './HexGeometry.js';
import { MalformedMoveError } from './errors.js';

export type MoveBuildResult =
  | { ok: true; move: Move }
  | { ok: false; reason: string };

export class Move {
  readonly marbles: readonly Position[];
  readonly direction: Direction;
  readonly count: number;
  /** Marbles in (row, col) order */
  readonly sorted: readonly Position[];
  /** Axis the marbles lie on; null for a single marble */
  readonly lineAxis: Direction | null;
  readonly isInline: boolean;
  readonly trailing: Position;
  readonly leading: Position;
  /** Identity: sorted marbles plus direction, independent of input order */
  readonly key: string;

  private constructor(marbles: readonly Position[], direction: Direction, lineAxis: Direction | null) {
    this.marbles = Object.freeze([...marbles]);
    this.direction = direction;
    this.count = marbles.length;
    this.sorted = Object.freeze(sortPositions(marbles));
    this.lineAxis = lineAxis;
    this.isInline = lineAxis === null || isParallel(lineAxis, direction);

    // Stable sort: broadside marbles share a projection and keep input order
    const alongDirection = [...marbles].sort((a, b) => projection(a, direction) - projection(b, direction));
    this.trailing = alongDirection[0];
    this.leading = alongDirection[alongDirection.length - 1];

    this.key = `${this.sorted.map(formatPosition).join(',')}>${direction.name}`;
  }

  /**
   * Validate the marble shape and build a move. Rejections name the violated rule.
   */
  static create(marbles: readonly Position[], direction: Direction): MoveBuildResult {
    if (marbles.length < 1 || marbles.length > MAX_LINE_LENGTH) {
      return { ok: false, reason: `Move must contain between 1 and ${MAX_LINE_LENGTH} marbles.` };
    }

    for (let i = 0; i < marbles.length; i++) {
      for (let j = i + 1; j < marbles.length; j++) {
        if (samePosition(marbles[i], marbles[j])) {
          return { ok: false, reason: 'Move contains duplicate marbles.' };
        }
      }
    }

    const shape = lineShape(sortPositions(marbles));
    if (shape.kind === 'off-axis') {
      return { ok: false, reason: 'Marbles must lie on a single line.' };
    }
    if (shape.kind === 'gapped') {
      return { ok: false, reason: 'Marbles must be adjacent, with no gaps.' };
    }

    return { ok: true, move: new Move(marbles, direction, shape.axis) };
  }

  /**
   * Build a move whose shape is known to be valid; throws otherwise
   */
  static of(marbles: readonly Position[], direction: Direction): Move {
    const built = Move.create(marbles, direction);
    if (!built.ok) {
      throw new MalformedMoveError(built.reason);
    }
    return built.move;
  }

  /**
   * Canonical notation.
   *   inline:    {count}:{trailing}{goal}     e.g. 3:c3c6, 1:e5e6
   *   broadside: {count}:{low}-{high}>{DIR}  e.g. 2:a1-a2>NW
   * A trailing '*' marks a push; it is not part of the move's identity.
   */
  toNotation(pushed = false): string {
    if (this.isInline) {
      const goal = neighbor(this.leading, this.direction);
      return `${this.count}:${formatPosition(this.trailing)}${formatPosition(goal)}${pushed ? '*' : ''}`;
    }

    const low = this.sorted[0];
    const high = this.sorted[this.sorted.length - 1];
    return `${this.count}:${formatPosition(low)}-${formatPosition(high)}>${this.direction.name}`;
  }

  equals(other: Move): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return this.toNotation();
  }
}
