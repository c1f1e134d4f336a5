import groupBy from 'lodash/groupBy';
import minBy from 'lodash/minBy';
import sortBy from 'lodash/sortBy';
import invariant from 'tiny-invariant';

import { stripFreezeFrameSuffix } from './cmx3600Grammar';
import { ParseError, TimecodeError } from './errors';
import logger from './logger';
import { durationFromStartEnd, invalidTime, isValidTime, rationalTime, subtractTime, timeRange } from './otio/time';
import {
  appendChild,
  appendTrack,
  createClip,
  createGap,
  createMarker,
  createTimeline,
  createTrack,
  createTransition,
  externalReference,
  freezeFrame,
  generatorReference,
  linearTimeWarp,
} from './otio/timeline';
import { TransitionType } from './otio/types';
import type { Effect, Marker, MediaReference, Metadata, RationalTime, TimeRange, Timeline, Track } from './otio/types';
import { fromTimecode } from './timecode';
import { isVideoTrackType } from './types';
import type { EdlDocument, EdlEvent, EventTimecodes, TrackType } from './types';

const timecodeFieldLabels: Record<keyof EventTimecodes, string> = {
  sourceIn: 'source in',
  sourceOut: 'source out',
  recordIn: 'record in',
  recordOut: 'record out',
};

function eventTime(event: EdlEvent, field: keyof EventTimecodes, rate: number) {
  const value = event[field];
  try {
    return fromTimecode(value, rate);
  } catch (err) {
    if (err instanceof TimecodeError) {
      throw new ParseError(event.line, `invalid ${timecodeFieldLabels[field]} timecode '${value}': ${err.message}`);
    }
    throw err;
  }
}

export function getMediaReferenceForEvent(event: EdlEvent, sourceRange: TimeRange): MediaReference {
  const reel = event.reelName.toUpperCase();
  if (reel === 'BLACK' || reel === 'BL') return generatorReference('black', sourceRange);
  if (reel === 'BARS') return generatorReference('SMPTEBars', sourceRange);
  return externalReference(event.filePath || event.reelName, sourceRange);
}

export const getClipName = (event: EdlEvent) => stripFreezeFrameSuffix(event.clipName || event.reelName, event.freezeFrame);

function getEffects(event: EdlEvent, rate: number) {
  const effects: Effect[] = [];
  if (event.speedEffect) effects.push(linearTimeWarp(event.speedEffect.speed / rate));
  if (event.freezeFrame) effects.push(freezeFrame());
  return effects;
}

function getMarkers(event: EdlEvent, rate: number) {
  return event.markers.flatMap((marker): Marker[] => {
    let markerTime: RationalTime;
    try {
      markerTime = fromTimecode(marker.timecode, rate);
    } catch (err) {
      if (!(err instanceof TimecodeError)) throw err;
      logger.warn('Skipping locator with invalid timecode %s on event %d: %s', marker.timecode, event.eventNumber, err.message);
      return [];
    }
    return [createMarker({
      name: marker.comment,
      markedRange: timeRange(markerTime, rationalTime(0, rate)),
      color: marker.color,
      comment: marker.comment,
      metadata: marker.color ? { cmx_3600: { color: marker.color } } : {},
    })];
  });
}

function getClipMetadata(event: EdlEvent): Metadata {
  const metadata: Metadata = {
    cmx_3600: {
      reel: event.reelName,
      event: event.eventNumber,
      ...(event.comment != null ? { comments: event.comment.split('\n') } : {}),
      ...(event.wipeCode != null ? { wipe_code: event.wipeCode } : {}),
    },
  };
  if (event.colorDecision) {
    const { slope, offset, power, saturation } = event.colorDecision;
    metadata['cdl'] = { slope, offset, power, saturation };
  }
  return metadata;
}

function getTransition(event: EdlEvent, rate: number) {
  if ((event.editType !== 'D' && event.editType !== 'W') || event.transitionDuration <= 0) return undefined;

  const isWipe = event.editType === 'W';
  return createTransition({
    name: isWipe ? (event.wipeCode ?? 'SMPTE_Wipe') : '',
    transitionType: isWipe ? TransitionType.Custom : TransitionType.SMPTE_Dissolve,
    inOffset: rationalTime(0, rate),
    outOffset: rationalTime(event.transitionDuration, rate),
  });
}

export function buildTrack(trackType: TrackType, events: readonly EdlEvent[], rate: number): Track {
  const track = createTrack(trackType, isVideoTrackType(trackType) ? 'Video' : 'Audio');

  let lastRecordOut = invalidTime();

  for (const event of sortBy(events, (e) => e.eventNumber)) {
    const sourceIn = eventTime(event, 'sourceIn', rate);
    const sourceOut = eventTime(event, 'sourceOut', rate);
    const recordIn = eventTime(event, 'recordIn', rate);
    const recordOut = eventTime(event, 'recordOut', rate);

    if (isValidTime(lastRecordOut)) {
      const gap = subtractTime(recordIn, lastRecordOut);
      // half a frame of slack for rounding
      if (gap.value > 0.5) appendChild(track, createGap(gap));
    }

    const sourceRange = timeRange(sourceIn, durationFromStartEnd(sourceIn, sourceOut));

    const clip = createClip({
      name: getClipName(event),
      mediaReference: getMediaReferenceForEvent(event, sourceRange),
      sourceRange,
      metadata: getClipMetadata(event),
      effects: getEffects(event, rate),
      markers: getMarkers(event, rate),
    });

    const transition = getTransition(event, rate);
    if (transition) appendChild(track, transition);
    appendChild(track, clip);

    lastRecordOut = recordOut;
  }

  return track;
}

// ordered by the lowest event number on each track identifier
export const groupEventsByTrack = (events: readonly EdlEvent[]) => sortBy(
  Object.values(groupBy(events, (event) => event.trackType)),
  (group) => minBy(group, (event) => event.eventNumber)?.eventNumber,
);

/**
 * Builds one track per track identifier, in the order of `groupEventsByTrack`.
 */
export function eventsToTimeline({ title, fcm, events }: EdlDocument, rate: number): Timeline {
  const timeline = createTimeline(title ?? '', fcm != null ? { cmx_3600: { fcm } } : {});

  for (const group of groupEventsByTrack(events)) {
    const [first] = group;
    invariant(first != null, 'Empty track group');
    appendTrack(timeline, buildTrack(first.trackType, group, rate));
  }

  return timeline;
}
