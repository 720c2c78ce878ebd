import { z } from 'zod';
import type { Coordinate } from '../shared/types/game';

export type CoordinateParseResult =
  | { ok: true; coordinate: Coordinate }
  | { ok: false; error: string };

// "3,4", "-2, 7", "(0,0)", " ( -1 , -1 ) "
const COORDINATE_PATTERN = /^\(?\s*([+-]?\d+)\s*,\s*([+-]?\d+)\s*\)?$/;

const IntegerComponentSchema = z.coerce
  .number()
  .refine(Number.isSafeInteger, { message: 'must be a whole number within the safe integer range' });

const CoordinateSchema = z.object({
  row: IntegerComponentSchema,
  col: IntegerComponentSchema,
});

/**
 * Turn a player's typed input into a coordinate. The engine never sees
 * text; everything it receives has been through this parser.
 */
export function parseCoordinate(input: string): CoordinateParseResult {
  const match = COORDINATE_PATTERN.exec(input.trim());
  if (!match) {
    return { ok: false, error: `Expected "row,col" (for example "3,-2"), got "${input.trim()}"` };
  }

  const parsed = CoordinateSchema.safeParse({ row: match[1], col: match[2] });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') : 'coordinate';
    const message = issue ? issue.message : parsed.error.message;
    return { ok: false, error: `Invalid ${field}: ${message}` };
  }

  return { ok: true, coordinate: parsed.data };
}
