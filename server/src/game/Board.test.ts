/**
 * Board Unit Tests
 * Layouts, cell access, scoring and rendering
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Board, opponentOf } from './Board.js';
import { DEFAULT_LAYOUT, getLayout, listLayouts } from './Layouts.js';
import { parsePosition } from './HexGeometry.js';
import { STARTING_MARBLES } from './constants.js';
import type { Position } from './types.js';

function at(text: string): Position {
  const pos = parsePosition(text);
  assert.ok(pos, `bad test cell ${text}`);
  return pos;
}

// ============================================================================
// Layouts
// ============================================================================

test('Board - Built-in layouts', () => {
  assert.deepStrictEqual(listLayouts(), ['standard', 'belgian_daisy', 'german_daisy']);
  assert.strictEqual(DEFAULT_LAYOUT, 'standard');
  assert.strictEqual(getLayout('hexagon'), null);
});

test('Board - Every layout places 14 marbles per side on distinct cells', () => {
  for (const name of listLayouts()) {
    const board = Board.fromLayout(name);
    assert.strictEqual(board.marbleCount('black'), STARTING_MARBLES, `${name} black`);
    assert.strictEqual(board.marbleCount('white'), STARTING_MARBLES, `${name} white`);
    assert.deepStrictEqual(board.scores(), { black: 0, white: 0 });
  }
});

test('Board - Standard layout cells', () => {
  const board = Board.standard();

  assert.strictEqual(board.get(at('a1')), 'black');
  assert.strictEqual(board.get(at('c5')), 'black');
  assert.strictEqual(board.get(at('c6')), 'empty');
  assert.strictEqual(board.get(at('e5')), 'empty');
  assert.strictEqual(board.get(at('g5')), 'white');
  assert.strictEqual(board.get(at('i9')), 'white');
  assert.strictEqual(board.get(at('c8')), null, 'off-board cells read as null');
});

test('Board - Unknown layout throws', () => {
  assert.throws(() => Board.fromLayout('hexagon'), /Unknown layout: hexagon/);
});

// ============================================================================
// Cell Access
// ============================================================================

test('Board - fromPlacement builds a custom position', () => {
  const board = Board.fromPlacement({ black: ['c3', 'c4'], white: ['C6'] }, { white: 2 });

  assert.deepStrictEqual(board.marblesOf('black'), [at('c3'), at('c4')]);
  assert.deepStrictEqual(board.marblesOf('white'), [at('c6')]);
  assert.deepStrictEqual(board.scores(), { black: 0, white: 2 });
});

test('Board - fromPlacement rejects cells off the board', () => {
  assert.throws(() => Board.fromPlacement({ black: ['c8'] }), RangeError);
  assert.throws(() => Board.fromPlacement({ white: ['z1'] }), RangeError);
});

test('Board - set off the board throws', () => {
  const board = Board.empty();
  assert.throws(() => board.set(at('a6'), 'black'), /Cannot set off-board cell a6/);
});

test('Board - marblesOf returns cells in row, column order', () => {
  const board = Board.fromPlacement({ black: ['e5', 'a3', 'e1', 'b6'] });
  assert.deepStrictEqual(board.marblesOf('black'), [at('a3'), at('b6'), at('e1'), at('e5')]);
});

test('Board - Clones are independent', () => {
  const board = Board.standard();
  const copy = board.clone();

  copy.set(at('e5'), 'black');
  copy.recordCapture('black');

  assert.strictEqual(board.get(at('e5')), 'empty');
  assert.strictEqual(board.getScore('black'), 0);
  assert.strictEqual(copy.get(at('e5')), 'black');
  assert.strictEqual(copy.getScore('black'), 1);
});

test('Board - Cell map covers every cell', () => {
  const cells = Board.standard().toCellMap();
  assert.strictEqual(Object.keys(cells).length, 61);
  assert.strictEqual(cells.a1, 'black');
  assert.strictEqual(cells.e5, 'empty');
  assert.strictEqual(cells.i9, 'white');
});

// ============================================================================
// Scoring
// ============================================================================

test('Board - Game ends when a side has pushed off six', () => {
  const board = Board.fromPlacement({ black: ['e5'], white: ['a1'] }, { black: 5 });
  assert.strictEqual(board.isGameOver(), false);
  assert.strictEqual(board.winner(), null);

  board.recordCapture('black');
  assert.strictEqual(board.isGameOver(), true);
  assert.strictEqual(board.winner(), 'black');
});

test('Board - opponentOf', () => {
  assert.strictEqual(opponentOf('black'), 'white');
  assert.strictEqual(opponentOf('white'), 'black');
});

// ============================================================================
// Rendering
// ============================================================================

test('Board - Render draws the hexagon top row first', () => {
  const lines = Board.standard().render().split('\n');

  assert.strictEqual(lines.length, 13);
  assert.strictEqual(lines[0], '');
  assert.strictEqual(lines[1], '  Score: Black(@@) 0 - 0 White(OO)');
  assert.strictEqual(lines[2], '');
  assert.strictEqual(lines[3], '          OO OO OO OO OO'.padEnd(40) + 'i');
  assert.strictEqual(lines[7], '  e1 e2 e3 e4 e5 e6 e7 e8 e9'.padEnd(40) + 'e');
  assert.strictEqual(lines[9], '      c1 c2 @@ @@ @@ c6 c7'.padEnd(40) + 'c');
  assert.strictEqual(lines[11], '          @@ @@ @@ @@ @@'.padEnd(40) + 'a');
  assert.strictEqual(lines[12], '');
});
