import parseCmx3600 from './cmx3600';
import { decodeOptionsSchema, encodeOptionsSchema } from './config';
import type { DecodeOptionsInput, EncodeOptionsInput } from './config';
import { encodeTimeline } from './edlEncoder';
import { eventsToTimeline } from './edlTimeline';
import type { Timeline } from './otio/types';

export function parseEdlCmx3600(text: string, options: DecodeOptionsInput = {}): Timeline {
  const { rate } = decodeOptionsSchema.parse(options);
  return eventsToTimeline(parseCmx3600(text), rate);
}

export function formatEdlCmx3600(timeline: Timeline | null | undefined, options: EncodeOptionsInput = {}) {
  return encodeTimeline(timeline, encodeOptionsSchema.parse(options));
}

export const isEdlCmx3600 = (text: string) => text.replace(/^\uFEFF/, '').trimStart().startsWith('TITLE:');
