import { describe, expect, it } from 'vitest';

import { addTime, durationFromStartEnd, invalidTime, isValidTime, rationalTime, rescaleTime, subtractTime, timeRange, timeRangeEnd, toSeconds } from './time';
import { appendTrack, audioTracks, clipSourceRange, createClip, createGap, createTimeline, createTrack, generatorReference, itemDuration, videoTracks } from './timeline';

describe('rational time', () => {
  it('rescales between rates', () => {
    expect(rescaleTime(rationalTime(48, 48), 24)).toEqual(rationalTime(24, 24));
    expect(rescaleTime(rationalTime(10, 24), 24)).toEqual(rationalTime(10, 24));
  });

  it('adds and subtracts in the rate of the left operand', () => {
    expect(addTime(rationalTime(24, 24), rationalTime(50, 50))).toEqual(rationalTime(48, 24));
    expect(subtractTime(rationalTime(24, 24), rationalTime(25, 50))).toEqual(rationalTime(12, 24));
    expect(durationFromStartEnd(rationalTime(10, 24), rationalTime(34, 24))).toEqual(rationalTime(24, 24));
  });

  it('treats a zero rate as invalid', () => {
    expect(isValidTime(invalidTime())).toBe(false);
    expect(isValidTime(rationalTime(0, 24))).toBe(true);
  });

  it('computes range ends and seconds', () => {
    expect(timeRangeEnd(timeRange(rationalTime(12, 24), rationalTime(36, 24)))).toEqual(rationalTime(48, 24));
    expect(toSeconds(rationalTime(36, 24))).toBe(1.5);
  });
});

describe('timeline', () => {
  it('separates video and audio tracks in order', () => {
    const timeline = createTimeline('Tracks');
    appendTrack(timeline, createTrack('A1', 'Audio'));
    appendTrack(timeline, createTrack('V', 'Video'));
    appendTrack(timeline, createTrack('A2', 'Audio'));

    expect(videoTracks(timeline).map((track) => track.name)).toEqual(['V']);
    expect(audioTracks(timeline).map((track) => track.name)).toEqual(['A1', 'A2']);
  });

  it('falls back to the available range of the active media', () => {
    const available = timeRange(rationalTime(0, 24), rationalTime(48, 24));
    const clip = createClip({ name: 'Bars', mediaReference: generatorReference('SMPTEBars', available) });

    expect(clipSourceRange(clip)).toEqual(available);
    expect(itemDuration(clip)).toEqual(rationalTime(48, 24));
    expect(clipSourceRange(createClip({ name: 'Empty' }))).toBeUndefined();
  });

  it('gives gaps a range starting at zero', () => {
    const gap = createGap(rationalTime(12, 25));
    expect(gap.source_range).toEqual(timeRange(rationalTime(0, 25), rationalTime(12, 25)));
    expect(itemDuration(gap)).toEqual(rationalTime(12, 25));
  });
});
