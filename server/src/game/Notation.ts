/**
 * Notation
 * Parses the canonical move notation produced by Move.toNotation
 *
 *   Inline:    {count}:{trailing}{goal}     e.g. 3:h7e7  1:e5e6  2:b3b5
 *   Broadside: {count}:{end1}-{end2}>{DIR}  e.g. 3:e5-e7>NW  2:c3-c4>NW
 *
 *   trailing = back marble (before the move)
 *   goal     = where the front marble ends up (after the move)
 *   DIR      = E, W, NE, NW, SE, SW
 */

import type { Position } from './types.js';
import { Move, type MoveBuildResult } from './Move.js';
import { directionByName, directionFromVector, parsePosition } from './HexGeometry.js';

const INLINE_PATTERN = /^([1-3]):([a-i][0-9])([a-i][0-9])\*?$/;
const BROADSIDE_PATTERN = /^([1-3]):([a-i][0-9])-([a-i][0-9])>([a-z]{1,2})$/;

function invalid(text: string): MoveBuildResult {
  return { ok: false, reason: `Unrecognized move notation '${text}'.` };
}

export function parseNotation(text: string): MoveBuildResult {
  const normalized = text.trim().toLowerCase();

  const broadside = BROADSIDE_PATTERN.exec(normalized);
  if (broadside) {
    return parseBroadside(text, Number(broadside[1]), broadside[2], broadside[3], broadside[4]);
  }

  const inline = INLINE_PATTERN.exec(normalized);
  if (inline) {
    return parseInline(text, Number(inline[1]), inline[2], inline[3]);
  }

  return invalid(text);
}

function parseInline(text: string, count: number, startText: string, goalText: string): MoveBuildResult {
  const start = parsePosition(startText);
  const goal = parsePosition(goalText);
  if (!start || !goal) return invalid(text);

  // The front marble travels `count` steps from the trailing marble's cell
  const dRow = (goal.row - start.row) / count;
  const dCol = (goal.col - start.col) / count;
  const direction = Number.isInteger(dRow) && Number.isInteger(dCol) ? directionFromVector(dRow, dCol) : null;
  if (!direction) {
    return {
      ok: false,
      reason: `'${text}': ${startText} to ${goalText} is not ${count} step${count === 1 ? '' : 's'} along one direction.`
    };
  }

  const marbles: Position[] = [];
  for (let i = 0; i < count; i++) {
    marbles.push({ row: start.row + i * direction.dRow, col: start.col + i * direction.dCol });
  }
  return Move.create(marbles, direction);
}

function parseBroadside(
  text: string,
  count: number,
  firstText: string,
  lastText: string,
  directionText: string
): MoveBuildResult {
  const first = parsePosition(firstText);
  const last = parsePosition(lastText);
  const direction = directionByName(directionText);
  if (!first || !last) return invalid(text);
  if (!direction) {
    return { ok: false, reason: `Unrecognized direction '${directionText.toUpperCase()}'.` };
  }

  const dRow = last.row - first.row;
  const dCol = last.col - first.col;
  const steps = Math.max(Math.abs(dRow), Math.abs(dCol));
  if (steps === 0 || steps !== count - 1) {
    return { ok: false, reason: `'${text}': the ends must be ${count - 1} step${count === 2 ? '' : 's'} apart.` };
  }

  const unit = directionFromVector(dRow / steps, dCol / steps);
  if (!unit) {
    return { ok: false, reason: 'Marbles must lie on a single line.' };
  }

  const marbles: Position[] = [];
  for (let i = 0; i < count; i++) {
    marbles.push({ row: first.row + i * unit.dRow, col: first.col + i * unit.dCol });
  }
  return Move.create(marbles, direction);
}
