import { z } from 'zod';

import { isSupportedFrameRate } from './timecode';
import { defaultReelNameLength } from './reelName';

export const defaultRate = 24;

export const frameRateSchema = z.number().positive().refine(isSupportedFrameRate, { message: 'Unsupported frame rate' });

export const outputStyleSchema = z.enum(['avid', 'nucoda', 'premiere']);
export type OutputStyle = z.infer<typeof outputStyleSchema>

export const decodeOptionsSchema = z.object({
  rate: frameRateSchema.default(defaultRate),
  // accepted for compatibility, not consulted yet
  ignoreTimecodeMismatch: z.boolean().default(false),
});

export type DecodeOptions = z.infer<typeof decodeOptionsSchema>
export type DecodeOptionsInput = z.input<typeof decodeOptionsSchema>

export const encodeOptionsSchema = z.object({
  rate: frameRateSchema.default(defaultRate),
  // <= 0 means unlimited
  reelNameLength: z.number().int().default(defaultReelNameLength),
  // accepted for compatibility, output is the same for every style
  style: outputStyleSchema.default('avid'),
});

export type EncodeOptions = z.infer<typeof encodeOptionsSchema>
export type EncodeOptionsInput = z.input<typeof encodeOptionsSchema>
