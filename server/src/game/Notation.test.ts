/**
 * Notation Unit Tests
 * Parsing inline and broadside notation back into moves
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { parseNotation } from './Notation.js';
import { Board } from './Board.js';
import { moveGenerator } from './MoveGenerator.js';
import { NORTH_EAST } from './constants.js';

function parsedKey(text: string): string {
  const parsed = parseNotation(text);
  assert.ok(parsed.ok, `expected '${text}' to parse`);
  return parsed.move.key;
}

function parseError(text: string): string {
  const parsed = parseNotation(text);
  assert.ok(!parsed.ok, `expected '${text}' to be rejected`);
  return parsed.reason;
}

// ============================================================================
// Accepted Forms
// ============================================================================

test('Notation - Inline moves', () => {
  assert.strictEqual(parsedKey('3:c3c6'), 'c3,c4,c5>E');
  assert.strictEqual(parsedKey('3:c5c2'), 'c3,c4,c5>W');
  assert.strictEqual(parsedKey('2:b3b5'), 'b3,b4>E');
  assert.strictEqual(parsedKey('1:e5e6'), 'e5>E');
});

test('Notation - Single marble diagonal', () => {
  const parsed = parseNotation('1:e5f6');
  assert.ok(parsed.ok);
  assert.strictEqual(parsed.move.direction, NORTH_EAST);
  assert.strictEqual(parsed.move.key, 'e5>NE');
});

test('Notation - Broadside moves', () => {
  assert.strictEqual(parsedKey('2:a1-a2>NW'), 'a1,a2>NW');
  assert.strictEqual(parsedKey('3:e5-e7>NW'), 'e5,e6,e7>NW');
  assert.strictEqual(parsedKey('2:c3-d3>E'), 'c3,d3>E');
});

test('Notation - Case, whitespace and push marker are ignored', () => {
  assert.strictEqual(parsedKey('2:A1-A2>nw'), 'a1,a2>NW');
  assert.strictEqual(parsedKey(' 3:C3C6 '), 'c3,c4,c5>E');
  assert.strictEqual(parsedKey('3:c3c6*'), 'c3,c4,c5>E');
});

test('Notation - Every opening move parses back to itself', () => {
  const board = Board.standard();
  for (const move of moveGenerator.generateLegalMoves(board, 'black')) {
    assert.strictEqual(parsedKey(move.toNotation()), move.key, move.toNotation());
  }
});

// ============================================================================
// Rejections
// ============================================================================

test('Notation - Unrecognized text', () => {
  assert.strictEqual(parseError('hello'), "Unrecognized move notation 'hello'.");
  assert.strictEqual(parseError('4:c3c7'), "Unrecognized move notation '4:c3c7'.");
  assert.strictEqual(parseError('3:c3-c5'), "Unrecognized move notation '3:c3-c5'.");
});

test('Notation - Inline goal must be count steps along a direction', () => {
  assert.strictEqual(parseError('1:e5e7'), "'1:e5e7': e5 to e7 is not 1 step along one direction.");
  assert.strictEqual(parseError('2:e5f7'), "'2:e5f7': e5 to f7 is not 2 steps along one direction.");
});

test('Notation - Broadside ends must match the count', () => {
  assert.strictEqual(parseError('2:e5-e7>NW'), "'2:e5-e7>NW': the ends must be 1 step apart.");
  assert.strictEqual(parseError('3:e5-e6>NW'), "'3:e5-e6>NW': the ends must be 2 steps apart.");
});

test('Notation - Broadside direction must exist', () => {
  assert.strictEqual(parseError('2:e5-e6>xx'), "Unrecognized direction 'XX'.");
});

test('Notation - Broadside ends off a common line', () => {
  assert.strictEqual(parseError('3:e5-g6>E'), 'Marbles must lie on a single line.');
});
