import Timecode from 'smpte-timecode';
import type { FRAMERATE } from 'smpte-timecode';

import { TimecodeError } from './errors';
import { rationalTime, rescaleTime } from './otio/time';
import type { RationalTime } from './otio/types';

export const fractionalFrameRates = [23.976, 29.97, 59.94] as const satisfies readonly FRAMERATE[];

const rateTolerance = 0.01;

const timecodeRegex = /^(\d{2}):(\d{2}):(\d{2})([:;])(\d{2})$/;

export const isDropFrameRate = (rate: number) => (rate > 29.96 && rate < 29.98) || (rate > 59.93 && rate < 59.95);

export function findFrameRate(rate: number): FRAMERATE | undefined {
  if (!Number.isFinite(rate) || rate <= 0) return undefined;
  const fractional = fractionalFrameRates.find((supported) => Math.abs(supported - rate) < rateTolerance);
  if (fractional != null) return fractional;
  const whole = Math.round(rate);
  if (whole < 1 || Math.abs(whole - rate) >= rateTolerance) return undefined;
  // smpte-timecode counts at any whole rate, its typings only list the common ones
  return whole as FRAMERATE;
}

export const isSupportedFrameRate = (rate: number) => findFrameRate(rate) != null;

export function toFrameRate(rate: number): FRAMERATE {
  const frameRate = findFrameRate(rate);
  if (frameRate == null) throw new TimecodeError(`Unsupported frame rate: ${rate}`);
  return frameRate;
}

function createTimecode(input: string | number, frameRate: FRAMERATE, dropFrame: boolean) {
  try {
    return Timecode(input, frameRate, dropFrame);
  } catch (err) {
    throw new TimecodeError(`Invalid timecode ${input} at ${frameRate} fps: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Frame count of a `HH:MM:SS:FF` (or drop-frame `HH:MM:SS;FF`) timecode.
 * The `;` separator only selects drop-frame counting at 29.97 and 59.94.
 */
export function timecodeToFrames(timecode: string, rate: number) {
  const frameRate = toFrameRate(rate);
  const match = timecode.trim().match(timecodeRegex);
  if (!match) throw new TimecodeError(`Invalid timecode format: ${timecode}`);

  const [, hoursStr = '', minutesStr = '', secondsStr = '', separator, framesStr = ''] = match;
  const hours = parseInt(hoursStr, 10);
  const minutes = parseInt(minutesStr, 10);
  const seconds = parseInt(secondsStr, 10);
  const frames = parseInt(framesStr, 10);

  if (hours > 23 || minutes > 59 || seconds > 59 || frames >= Math.round(frameRate)) {
    throw new TimecodeError(`Timecode out of range at ${frameRate} fps: ${timecode}`);
  }

  const dropFrame = separator === ';' && isDropFrameRate(frameRate);
  return createTimecode(`${hoursStr}:${minutesStr}:${secondsStr}${dropFrame ? ';' : ':'}${framesStr}`, frameRate, dropFrame).frameCount;
}

// drop frame skips 2 (29.97) or 4 (59.94) frame numbers in every minute not divisible by 10
export function framesPerDay(rate: number) {
  const nominal = Math.round(rate);
  const droppedPerMinute = isDropFrameRate(rate) ? nominal / 15 : 0;
  return nominal * 24 * 60 * 60 - droppedPerMinute * (24 * 60 - 24 * 6);
}

export function framesToTimecode(frames: number, rate: number) {
  const frameRate = toFrameRate(rate);
  const frameCount = Math.round(frames);
  if (!Number.isFinite(frameCount) || frameCount < 0) throw new TimecodeError(`Cannot express ${frames} frames as a timecode`);
  if (frameCount >= framesPerDay(frameRate)) throw new TimecodeError(`${frameCount} frames exceed 24 hours at ${frameRate} fps`);
  return createTimecode(frameCount, frameRate, isDropFrameRate(frameRate)).toString();
}

export const fromTimecode = (timecode: string, rate: number): RationalTime => rationalTime(timecodeToFrames(timecode, rate), rate);

export const toTimecode = (time: RationalTime, rate: number) => framesToTimecode(rescaleTime(time, rate).value, rate);
