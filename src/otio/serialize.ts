import { OtioError } from '../errors';
import { timelineSchema } from './schema';
import type { Timeline } from './types';

export function parseOtio(json: string): Timeline {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new OtioError(`Invalid OTIO JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = timelineSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new OtioError(`Invalid OTIO timeline: ${issues.join('; ')}`);
  }
  return result.data;
}

export const formatOtio = (timeline: Timeline) => `${JSON.stringify(timeline, null, 2)}\n`;
