/**
 * Board
 * Cell contents for every on-board position plus each side's push-off score.
 *
 * Cells live in a flat array indexed through HexGeometry.positionIndex, so a
 * clone is one array copy. The board is mutated in place by the rules engine;
 * search works on clones.
 */

import type { CellState, Position, Scores, Side } from './types.js';
import { ROW_COUNT, ROW_LETTERS, WIN_SCORE } from './constants.js';
import { ALL_POSITIONS, CELL_COUNT, formatPosition, parsePosition, positionIndex } from './HexGeometry.js';
import { DEFAULT_LAYOUT, getLayout } from './Layouts.js';

export function opponentOf(side: Side): Side {
  return side === 'black' ? 'white' : 'black';
}

export type Placement = {
  black?: readonly string[];
  white?: readonly string[];
};

export class Board {
  private readonly cells: CellState[];
  private readonly score: Scores;

  private constructor(cells: CellState[], score: Scores) {
    this.cells = cells;
    this.score = score;
  }

  static empty(): Board {
    return new Board(new Array<CellState>(CELL_COUNT).fill('empty'), { black: 0, white: 0 });
  }

  static standard(): Board {
    return Board.fromLayout(DEFAULT_LAYOUT);
  }

  static fromLayout(name: string): Board {
    const layout = getLayout(name);
    if (!layout) {
      throw new Error(`Unknown layout: ${name}`);
    }

    const board = Board.empty();
    layout.black.forEach(pos => board.set(pos, 'black'));
    layout.white.forEach(pos => board.set(pos, 'white'));
    return board;
  }

  /**
   * Build a position from coordinate lists, e.g. { black: ['c3', 'c4'], white: ['c6'] }
   */
  static fromPlacement(placement: Placement, score: Partial<Scores> = {}): Board {
    const board = Board.empty();
    const place = (cells: readonly string[] | undefined, side: Side) => {
      for (const text of cells ?? []) {
        const pos = parsePosition(text);
        if (!pos || positionIndex(pos) < 0) {
          throw new RangeError(`Not a board cell: ${text}`);
        }
        board.set(pos, side);
      }
    };
    place(placement.black, 'black');
    place(placement.white, 'white');
    board.score.black = score.black ?? 0;
    board.score.white = score.white ?? 0;
    return board;
  }

  /**
   * Contents of a cell, or null when the position is off the board
   */
  get(pos: Position): CellState | null {
    const index = positionIndex(pos);
    return index < 0 ? null : this.cells[index];
  }

  set(pos: Position, state: CellState): void {
    const index = positionIndex(pos);
    if (index < 0) {
      throw new RangeError(`Cannot set off-board cell ${formatPosition(pos)}`);
    }
    this.cells[index] = state;
  }

  clone(): Board {
    return new Board([...this.cells], { ...this.score });
  }

  marblesOf(side: Side): Position[] {
    const marbles: Position[] = [];
    for (let i = 0; i < CELL_COUNT; i++) {
      if (this.cells[i] === side) marbles.push(ALL_POSITIONS[i]);
    }
    return marbles;
  }

  marbleCount(side: Side): number {
    let count = 0;
    for (const cell of this.cells) {
      if (cell === side) count++;
    }
    return count;
  }

  /**
   * Opponent marbles this side has pushed off the board
   */
  getScore(side: Side): number {
    return this.score[side];
  }

  scores(): Scores {
    return { ...this.score };
  }

  recordCapture(side: Side): void {
    this.score[side]++;
  }

  isGameOver(): boolean {
    return this.score.black >= WIN_SCORE || this.score.white >= WIN_SCORE;
  }

  winner(): Side | null {
    if (this.score.black >= WIN_SCORE) return 'black';
    if (this.score.white >= WIN_SCORE) return 'white';
    return null;
  }

  toCellMap(): Record<string, CellState> {
    const map: Record<string, CellState> = {};
    ALL_POSITIONS.forEach((pos, i) => {
      map[formatPosition(pos)] = this.cells[i];
    });
    return map;
  }

  /**
   * Text diagram, top row first. Empty cells show their coordinate,
   * black marbles are @@ and white marbles OO.
   */
  render(): string {
    const lines = ['', `  Score: Black(@@) ${this.score.black} - ${this.score.white} White(OO)`, ''];

    for (let row = ROW_COUNT - 1; row >= 0; row--) {
      const letter = ROW_LETTERS[row];
      const cells = ALL_POSITIONS
        .filter(pos => pos.row === row)
        .map(pos => {
          const cell = this.get(pos);
          if (cell === 'black') return '@@';
          if (cell === 'white') return 'OO';
          return formatPosition(pos);
        });

      const indent = ' '.repeat(Math.abs(row - 4) * 2);
      lines.push(`  ${indent}${cells.join(' ')}`.padEnd(40) + letter);
    }

    lines.push('');
    return lines.join('\n');
  }
}
