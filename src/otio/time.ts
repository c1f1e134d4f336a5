import type { RationalTime, TimeRange } from './types';

export const rationalTime = (value: number, rate: number): RationalTime => ({ OTIO_SCHEMA: 'RationalTime.1', value, rate });

// rate 0 marks a time that has never been set
export const invalidTime = (): RationalTime => rationalTime(0, 0);

export const isValidTime = (time: RationalTime) => Number.isFinite(time.value) && Number.isFinite(time.rate) && time.rate > 0;

export function rescaleTime(time: RationalTime, rate: number): RationalTime {
  if (time.rate === rate) return rationalTime(time.value, rate);
  return rationalTime((time.value * rate) / time.rate, rate);
}

// results are expressed in the rate of the left operand
export const addTime = (a: RationalTime, b: RationalTime) => rationalTime(a.value + rescaleTime(b, a.rate).value, a.rate);

export const subtractTime = (a: RationalTime, b: RationalTime) => rationalTime(a.value - rescaleTime(b, a.rate).value, a.rate);

export const durationFromStartEnd = (start: RationalTime, end: RationalTime) => subtractTime(end, start);

export const timeRange = (startTime: RationalTime, duration: RationalTime): TimeRange => ({
  OTIO_SCHEMA: 'TimeRange.1',
  start_time: startTime,
  duration,
});

export const timeRangeEnd = (range: TimeRange) => addTime(range.start_time, range.duration);

export const toSeconds = (time: RationalTime) => time.value / time.rate;
