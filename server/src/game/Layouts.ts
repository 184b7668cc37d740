/**
 * Layouts
 * Named starting positions, loaded from server/data/layouts.json
 */

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import type { Position } from './types.js';
import { isValidPosition, parsePosition } from './HexGeometry.js';

// Same hop from server/src/game and from server/dist/game
export const LAYOUTS_RELATIVE_PATH = '../../data/layouts.json';

export const LAYOUTS_FILE = fileURLToPath(new URL(LAYOUTS_RELATIVE_PATH, import.meta.url));

export const DEFAULT_LAYOUT = 'standard';

export type Layout = {
  name: string;
  black: Position[];
  white: Position[];
};

const cellSchema = z.string().transform((text, ctx) => {
  const pos = parsePosition(text);
  if (!pos || !isValidPosition(pos)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${text}' is not a board cell` });
    return z.NEVER;
  }
  return pos;
});

const layoutFileSchema = z.record(
  z.object({
    black: z.array(cellSchema),
    white: z.array(cellSchema)
  })
);

function loadLayouts(): Map<string, Layout> {
  const raw: unknown = JSON.parse(fs.readFileSync(LAYOUTS_FILE, 'utf-8'));
  const parsed = layoutFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid layout file ${LAYOUTS_FILE}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
  }

  const layouts = new Map<string, Layout>();
  for (const [name, sides] of Object.entries(parsed.data)) {
    layouts.set(name, { name, black: sides.black, white: sides.white });
  }
  return layouts;
}

const LAYOUTS = loadLayouts();

export function listLayouts(): string[] {
  return [...LAYOUTS.keys()];
}

export function getLayout(name: string): Layout | null {
  return LAYOUTS.get(name) ?? null;
}
