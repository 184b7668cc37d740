/**
 * GameConfig
 * Who controls each side and how the AI searches, with zod-validated updates
 */

import { z } from 'zod';

import type { Controller, Side } from './types.js';
import { DEFAULT_LAYOUT, listLayouts } from './Layouts.js';
import { DEFAULT_PRESET } from './ScoreEvaluator.js';

export const GAME_MODES = ['hvh', 'hva', 'ava'] as const;
export type GameMode = typeof GAME_MODES[number];

export type GameConfig = {
  readonly mode: GameMode;
  readonly humanSide: Side;   // only meaningful in 'hva'
  readonly aiDepth: number;
  readonly heuristic: string;
  readonly tieBreak: string;
  readonly boardLayout: string;
  readonly maxMoves: number;  // 0 = no cap
};

export const DEFAULT_GAME_CONFIG: GameConfig = {
  mode: 'hvh',
  humanSide: 'black',
  aiDepth: 2,
  heuristic: DEFAULT_PRESET,
  tieBreak: 'lexicographic',
  boardLayout: DEFAULT_LAYOUT,
  maxMoves: 0
};

// ============================================================================
// Validation
// ============================================================================

const sideSchema = z
  .union([z.string(), z.number()])
  .transform((value, ctx): Side => {
    const text = String(value).trim().toLowerCase();
    if (text === 'black' || text === 'b' || text === '1') return 'black';
    if (text === 'white' || text === 'w' || text === '2') return 'white';
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported human side '${value}'.` });
    return z.NEVER;
  });

const modeSchema = z
  .string({ invalid_type_error: 'mode must be a string.' })
  .transform((value, ctx): GameMode => {
    const mode = GAME_MODES.find(m => m === value.trim().toLowerCase());
    if (!mode) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported mode '${value}'.` });
      return z.NEVER;
    }
    return mode;
  });

export const configUpdateSchema = z
  .object({
    mode: modeSchema,
    humanSide: sideSchema,
    aiDepth: z.coerce
      .number({ invalid_type_error: 'aiDepth must be an integer.' })
      .int('aiDepth must be an integer.')
      .min(1, 'aiDepth must be between 1 and 5.')
      .max(5, 'aiDepth must be between 1 and 5.'),
    heuristic: z.string({ invalid_type_error: 'heuristic must be a string.' }).min(1, 'heuristic cannot be empty.'),
    tieBreak: z.string({ invalid_type_error: 'tieBreak must be a string.' }).min(1, 'tieBreak cannot be empty.'),
    boardLayout: z
      .string({ invalid_type_error: 'boardLayout must be a string.' })
      .refine(name => listLayouts().includes(name), name => ({ message: `Unknown board layout '${name}'.` })),
    maxMoves: z.coerce
      .number({ invalid_type_error: 'maxMoves must be an integer.' })
      .int('maxMoves must be an integer.')
      .min(0, 'maxMoves cannot be negative.')
  })
  .partial()
  .strict();

export type ConfigUpdate = z.input<typeof configUpdateSchema>;

export type ConfigResult =
  | { ok: true; config: GameConfig }
  | { ok: false; reason: string };

/**
 * Apply a partial update to a configuration. Missing fields keep their
 * current value; an invalid field rejects the whole update.
 */
export function mergeConfig(current: GameConfig, payload: unknown): ConfigResult {
  if (payload === undefined || payload === null) {
    return { ok: true, config: current };
  }

  const parsed = configUpdateSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (issue?.code === z.ZodIssueCode.unrecognized_keys) {
      return { ok: false, reason: `Unknown config field(s): ${issue.keys.join(', ')}.` };
    }
    return { ok: false, reason: issue?.message ?? 'Invalid configuration.' };
  }

  const update = parsed.data;
  return {
    ok: true,
    config: {
      mode: update.mode ?? current.mode,
      humanSide: update.humanSide ?? current.humanSide,
      aiDepth: update.aiDepth ?? current.aiDepth,
      heuristic: update.heuristic ?? current.heuristic,
      tieBreak: update.tieBreak ?? current.tieBreak,
      boardLayout: update.boardLayout ?? current.boardLayout,
      maxMoves: update.maxMoves ?? current.maxMoves
    }
  };
}

export function controllersFor(config: GameConfig): Record<Side, Controller> {
  switch (config.mode) {
    case 'hvh':
      return { black: 'human', white: 'human' };
    case 'ava':
      return { black: 'ai', white: 'ai' };
    case 'hva':
      return config.humanSide === 'black'
        ? { black: 'human', white: 'ai' }
        : { black: 'ai', white: 'human' };
  }
}
