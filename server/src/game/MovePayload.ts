/**
 * MovePayload
 * Decodes moves arriving from clients (WebSocket messages, MCP tools).
 *
 * Accepted shapes:
 *   { marbles: ['c3', 'c4'], direction: [0, 1] }   direction as a (row, col) vector
 *   { marbles: ['c3', 'c4'], direction: 'E' }      or as a direction name
 *   { notation: '2:c3c5' }                         canonical notation
 */

import { z } from 'zod';

import type { Position } from './types.js';
import type { MoveBuildResult } from './Move.js';
import { Move } from './Move.js';
import { MAX_LINE_LENGTH } from './constants.js';
import { directionByName, directionFromVector, parsePosition } from './HexGeometry.js';
import { parseNotation } from './Notation.js';

const COUNT_MESSAGE = `Move must contain between 1 and ${MAX_LINE_LENGTH} marbles.`;
const MARBLES_MESSAGE = "'marbles' must be a list of positions.";
const DIRECTION_MESSAGE = "'direction' must be a direction name or a two-item vector.";

const marblesSchema = z
  .array(z.string({ invalid_type_error: MARBLES_MESSAGE }), {
    invalid_type_error: MARBLES_MESSAGE,
    required_error: MARBLES_MESSAGE
  })
  .min(1, COUNT_MESSAGE)
  .max(MAX_LINE_LENGTH, COUNT_MESSAGE)
  .refine(
    cells => new Set(cells.map(c => c.trim().toLowerCase())).size === cells.length,
    'Move contains duplicate marbles.'
  );

const directionSchema = z.union(
  [z.tuple([z.number().int(), z.number().int()]), z.string()],
  { errorMap: () => ({ message: DIRECTION_MESSAGE }) }
);

export const notationPayloadSchema = z.object({
  notation: z.string({ invalid_type_error: "'notation' must be a string." })
});

export const marblesPayloadSchema = z.object({
  marbles: marblesSchema,
  direction: directionSchema
});

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Malformed move payload.';
}

/**
 * Build a Move from an untrusted payload. Shape problems come back as a
 * reason; legality against a board is checked separately.
 */
export function buildMoveFromPayload(payload: unknown): MoveBuildResult {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return { ok: false, reason: 'Move payload must be an object.' };
  }

  if ('notation' in payload) {
    const parsed = notationPayloadSchema.safeParse(payload);
    if (!parsed.success) return { ok: false, reason: firstIssue(parsed.error) };
    return parseNotation(parsed.data.notation);
  }

  const parsed = marblesPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, reason: firstIssue(parsed.error) };
  }

  const marbles: Position[] = [];
  for (const text of parsed.data.marbles) {
    const pos = parsePosition(text);
    if (!pos) {
      return { ok: false, reason: `Unrecognized position '${text}'.` };
    }
    marbles.push(pos);
  }

  const rawDirection = parsed.data.direction;
  const direction = typeof rawDirection === 'string'
    ? directionByName(rawDirection)
    : directionFromVector(rawDirection[0], rawDirection[1]);
  if (!direction) {
    return { ok: false, reason: 'Unrecognized direction.' };
  }

  return Move.create(marbles, direction);
}
