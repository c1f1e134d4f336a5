export { parseEdlCmx3600, formatEdlCmx3600, isEdlCmx3600 } from './edlFormats';
export { default as parseCmx3600 } from './cmx3600';
export { eventsToTimeline } from './edlTimeline';
export { encodeTimeline } from './edlEncoder';
export {
  decodeOptionsSchema,
  encodeOptionsSchema,
  frameRateSchema,
  outputStyleSchema,
  defaultRate,
} from './config';
export type { DecodeOptions, DecodeOptionsInput, EncodeOptions, EncodeOptionsInput, OutputStyle } from './config';
export { ParseError, EncodeError, TimecodeError, OtioError } from './errors';
export { sanitizeReelName, defaultReelNameLength } from './reelName';
export {
  framesToTimecode,
  timecodeToFrames,
  fromTimecode,
  toTimecode,
  isDropFrameRate,
  isSupportedFrameRate,
  fractionalFrameRates,
  framesPerDay,
} from './timecode';
export type { EdlDocument, EdlEvent, EdlMarker, ColorDecision, SpeedEffect, TrackType, EditType } from './types';
export * from './otio/time';
export * from './otio/timeline';
export { parseOtio, formatOtio } from './otio/serialize';
export { TransitionType, defaultMediaKey } from './otio/types';
export type * from './otio/types';
