import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { formatEdlCmx3600, isEdlCmx3600, parseEdlCmx3600 } from './edlFormats';
import { EncodeError, ParseError } from './errors';
import { rationalTime, timeRange } from './otio/time';
import { appendTrack, createTimeline, createTrack, itemDuration } from './otio/timeline';
import type { Timeline } from './otio/types';
import { readFixture } from './test/util';

const summarize = (timeline: Timeline) => timeline.tracks.children.map((track) => ({
  kind: track.kind,
  children: track.children.map((child) => [child.OTIO_SCHEMA, child.name, child.OTIO_SCHEMA === 'Transition.1' ? child.out_offset.value : itemDuration(child)?.value]),
}));

describe('parseEdlCmx3600', () => {
  it('decodes a cut with gaps, generators, dissolves and color decisions', async () => {
    const timeline = parseEdlCmx3600(await readFixture('edl/basic.edl'));

    expect(timeline.name).toBe('Test Cut');
    expect(summarize(timeline)).toEqual([
      {
        kind: 'Video',
        children: [
          ['Clip.2', 'Opening', 48],
          ['Clip.2', 'BL', 24],
          ['Gap.1', '', 24],
          ['Transition.1', '', 12],
          ['Clip.2', 'REEL_B', 72],
        ],
      },
      { kind: 'Audio', children: [['Clip.2', 'REEL_C', 168]] },
    ]);

    const [video] = timeline.tracks.children;
    expect(video?.children[1]).toMatchObject({ media_references: { DEFAULT_MEDIA: { OTIO_SCHEMA: 'GeneratorReference.1', generator_kind: 'black' } } });
    expect(video?.children[4]).toMatchObject({
      media_references: { DEFAULT_MEDIA: { OTIO_SCHEMA: 'ExternalReference.1', target_url: '/media/reel_b.mov' } },
      metadata: { cdl: { slope: [1.1, 1, 0.9], offset: [0.01, 0, -0.02], power: [1, 1, 1], saturation: 0.8 } },
    });
  });

  it('decodes speed, wipe and freeze frame events', async () => {
    const timeline = parseEdlCmx3600(await readFixture('edl/effects.edl'));
    const [video] = timeline.tracks.children;

    expect(video?.children.map((child) => child.OTIO_SCHEMA)).toEqual(['Clip.2', 'Transition.1', 'Clip.2', 'Clip.2']);
    expect(video?.children[0]).toMatchObject({ name: 'Fast Shot', effects: [{ OTIO_SCHEMA: 'LinearTimeWarp.1', time_scalar: 47.6 / 24 }] });
    expect(video?.children[1]).toMatchObject({ name: 'W001', transition_type: 'Custom_Transition', out_offset: rationalTime(30, 24) });
    expect(video?.children[2]).toMatchObject({ name: 'Hold', effects: [{ OTIO_SCHEMA: 'FreezeFrame.1' }] });
    expect(video?.children[3]).toMatchObject({ name: 'bars', media_references: { DEFAULT_MEDIA: { generator_kind: 'SMPTEBars' } } });
  });

  it('decodes at the configured rate', () => {
    const timeline = parseEdlCmx3600('001  AX       V     C\n     00:00:01:00 00:00:02:00 00:00:00:00 00:00:01:00\n', { rate: 25 });
    const [video] = timeline.tracks.children;

    expect(video?.children[0]).toMatchObject({ source_range: timeRange(rationalTime(25, 25), rationalTime(25, 25)) });
  });

  it('reports the line of an invalid timecode', () => {
    const edl = [
      'TITLE: Bad Timecode',
      '',
      '001  AX       V     C',
      '     00:00:00:00 00:00:01:00 00:00:00:00 00:00:01:00',
      '002  AX       V     C',
      '     00:00:01:00 00:00:02:00 00:00:01:00 00:00:61:00',
    ].join('\n');

    let error: unknown;
    try {
      parseEdlCmx3600(edl);
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ line: 6 });
  });

  it('rejects unsupported rates', () => {
    expect(() => parseEdlCmx3600('', { rate: 12.5 })).toThrow(ZodError);
  });

  it('decodes at any whole rate', () => {
    const timeline = parseEdlCmx3600('001  AX       V     C\n     00:00:01:00 00:00:02:00 00:00:00:00 00:00:01:00\n', { rate: 48 });
    const [video] = timeline.tracks.children;

    expect(video?.children[0]).toMatchObject({ source_range: timeRange(rationalTime(48, 48), rationalTime(48, 48)) });
  });

  it('captures a drop frame header without applying it', () => {
    const events = [
      '001  AX       V     C',
      '     00:00:10:00 00:00:11:00 00:00:00:00 00:00:01:00',
      '002  AX       V     C',
      '     00:01:00;02 00:01:01;02 00:00:01:00 00:00:02:00',
    ];
    const plain = parseEdlCmx3600(events.join('\n'), { rate: 29.97 });
    const dropFrame = parseEdlCmx3600(['TITLE: DF', 'FCM: DROP FRAME', '', ...events].join('\n'), { rate: 29.97 });

    expect(dropFrame.metadata).toEqual({ cmx_3600: { fcm: 'DROP FRAME' } });
    expect(dropFrame.tracks.children).toEqual(plain.tracks.children);

    const [video] = dropFrame.tracks.children;
    expect(video?.children.map((child) => (child.OTIO_SCHEMA === 'Clip.2' ? child.source_range : undefined))).toEqual([
      timeRange(rationalTime(300, 29.97), rationalTime(30, 29.97)),
      timeRange(rationalTime(1800, 29.97), rationalTime(30, 29.97)),
    ]);
  });
});

describe('formatEdlCmx3600', () => {
  it('re-encodes a decoded EDL', () => {
    const edl = [
      'TITLE: Round Trip',
      'FCM: NON-DROP FRAME',
      '',
      '001  REEL_A   V     C',
      '     00:00:10:00 00:00:12:00 00:00:00:00 00:00:02:00',
      '* FROM CLIP NAME: Opening',
      '',
      '002  REEL_B   V     C',
      '     00:01:00:00 00:01:01:00 00:00:03:00 00:00:04:00',
      '* FROM CLIP NAME: Closing',
      '',
      '003  REEL_C   A     C',
      '     00:00:20:00 00:00:24:00 00:00:00:00 00:00:04:00',
    ].join('\n');

    expect(formatEdlCmx3600(parseEdlCmx3600(edl))).toBe([
      'TITLE: Round Trip',
      'FCM: NON-DROP FRAME',
      '',
      '001  REEL_A   V    C ',
      '     00:00:10:00 00:00:12:00 00:00:00:00 00:00:02:00',
      '* FROM CLIP NAME: Opening',
      '',
      '002  REEL_B   V    C ',
      '     00:01:00:00 00:01:01:00 00:00:03:00 00:00:04:00',
      '* FROM CLIP NAME: Closing',
      '',
      '003  REEL_C   A1    C ',
      '     00:00:20:00 00:00:24:00 00:00:00:00 00:00:04:00',
      '* FROM CLIP NAME: REEL_C',
      '',
      '',
    ].join('\n'));
  });

  it('keeps clip names, durations and track kinds through decode, encode and decode', () => {
    const edl = 'TITLE: Single\n\n001  REEL_A   V     C\n     00:00:03:00 00:00:08:00 00:00:00:00 00:00:05:00\n* FROM CLIP NAME: Only Shot\n';
    const once = parseEdlCmx3600(edl);
    const twice = parseEdlCmx3600(formatEdlCmx3600(once));

    expect(summarize(twice)).toEqual(summarize(once));
    expect(summarize(twice)).toEqual([{ kind: 'Video', children: [['Clip.2', 'Only Shot', 120]] }]);
  });

  it('writes the header for an empty timeline', () => {
    expect(formatEdlCmx3600(createTimeline())).toBe('TITLE: Timeline\nFCM: NON-DROP FRAME\n\n');
  });

  it('fails for two video tracks', () => {
    const timeline = createTimeline('Two Video');
    appendTrack(timeline, createTrack('V1', 'Video'));
    appendTrack(timeline, createTrack('V2', 'Video'));

    expect(() => formatEdlCmx3600(timeline)).toThrow(EncodeError);
  });

  it('validates options', () => {
    expect(() => formatEdlCmx3600(createTimeline(), { rate: 23.9 })).toThrow(ZodError);
    expect(formatEdlCmx3600(createTimeline('Styled'), { style: 'premiere', rate: 25 })).toBe('TITLE: Styled\nFCM: NON-DROP FRAME\n\n');
  });
});

describe('isEdlCmx3600', () => {
  it('detects the title header', () => {
    expect(isEdlCmx3600('\uFEFF\nTITLE: x\n')).toBe(true);
    expect(isEdlCmx3600('001  AX V C\n')).toBe(false);
  });
});
