/**
 * Move Unit Tests
 * Shape validation, classification, identity and notation
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Move } from './Move.js';
import { MalformedMoveError } from './errors.js';
import { EAST, NORTH_EAST, NORTH_WEST, WEST } from './constants.js';
import { formatPosition, parsePosition } from './HexGeometry.js';
import type { Position } from './types.js';

function cells(...texts: string[]): Position[] {
  return texts.map(text => {
    const pos = parsePosition(text);
    assert.ok(pos, `bad test cell ${text}`);
    return pos;
  });
}

function rejection(marbles: Position[]): string {
  const built = Move.create(marbles, EAST);
  assert.ok(!built.ok, 'expected the move to be rejected');
  return built.reason;
}

// ============================================================================
// Shape Validation
// ============================================================================

test('Move - Rejects empty and oversized groups', () => {
  assert.strictEqual(rejection([]), 'Move must contain between 1 and 3 marbles.');
  assert.strictEqual(rejection(cells('e1', 'e2', 'e3', 'e4')), 'Move must contain between 1 and 3 marbles.');
});

test('Move - Rejects duplicate marbles', () => {
  assert.strictEqual(rejection(cells('c3', 'c3')), 'Move contains duplicate marbles.');
});

test('Move - Rejects marbles off a common line', () => {
  assert.strictEqual(rejection(cells('c3', 'd5')), 'Marbles must lie on a single line.');
  assert.strictEqual(rejection(cells('c3', 'c4', 'd4')), 'Marbles must lie on a single line.');
});

test('Move - Rejects gapped lines', () => {
  assert.strictEqual(rejection(cells('c3', 'c5')), 'Marbles must be adjacent, with no gaps.');
});

test('Move - Move.of throws MalformedMoveError on a bad shape', () => {
  assert.throws(() => Move.of(cells('c3', 'c5'), EAST), MalformedMoveError);
});

// ============================================================================
// Classification
// ============================================================================

test('Move - Inline triple along its own axis', () => {
  const move = Move.of(cells('c3', 'c4', 'c5'), EAST);

  assert.strictEqual(move.count, 3);
  assert.strictEqual(move.isInline, true);
  assert.strictEqual(move.lineAxis, EAST);
  assert.strictEqual(formatPosition(move.trailing), 'c3');
  assert.strictEqual(formatPosition(move.leading), 'c5');
});

test('Move - Reverse direction swaps leading and trailing', () => {
  const move = Move.of(cells('c3', 'c4', 'c5'), WEST);

  assert.strictEqual(move.isInline, true);
  assert.strictEqual(formatPosition(move.trailing), 'c5');
  assert.strictEqual(formatPosition(move.leading), 'c3');
  assert.strictEqual(move.toNotation(), '3:c5c2');
});

test('Move - Broadside when the direction crosses the line', () => {
  const move = Move.of(cells('a1', 'a2'), NORTH_WEST);

  assert.strictEqual(move.isInline, false);
  assert.strictEqual(move.lineAxis, EAST);
  assert.strictEqual(move.toNotation(), '2:a1-a2>NW');
});

test('Move - A single marble is always inline', () => {
  const move = Move.of(cells('e5'), NORTH_EAST);

  assert.strictEqual(move.isInline, true);
  assert.strictEqual(move.lineAxis, null);
  assert.strictEqual(move.toNotation(), '1:e5f6');
});

// ============================================================================
// Identity & Notation
// ============================================================================

test('Move - Identity ignores marble order', () => {
  const a = Move.of(cells('c5', 'c3', 'c4'), EAST);
  const b = Move.of(cells('c3', 'c4', 'c5'), EAST);

  assert.strictEqual(a.key, 'c3,c4,c5>E');
  assert.ok(a.equals(b));
  assert.strictEqual(a.toNotation(), b.toNotation());
  assert.ok(!a.equals(Move.of(cells('c3', 'c4', 'c5'), WEST)));
});

test('Move - Push marker only in notation', () => {
  const move = Move.of(cells('c3', 'c4', 'c5'), EAST);

  assert.strictEqual(move.toNotation(), '3:c3c6');
  assert.strictEqual(move.toNotation(true), '3:c3c6*');
  assert.strictEqual(String(move), '3:c3c6');
});

test('Move - Marble list is frozen', () => {
  const move = Move.of(cells('c3', 'c4'), EAST);
  assert.ok(Object.isFrozen(move.marbles));
  assert.ok(Object.isFrozen(move.sorted));
});
