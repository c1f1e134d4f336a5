import padStart from 'lodash/padStart';
import padEnd from 'lodash/padEnd';

import { EncodeError, TimecodeError } from './errors';
import logger from './logger';
import { addTime, rationalTime, rescaleTime } from './otio/time';
import { audioTracks, clipSourceRange, getMediaReference, videoTracks } from './otio/timeline';
import { TransitionType } from './otio/types';
import type { Clip, Composable, RationalTime, Timeline, Track } from './otio/types';
import type { EncodeOptions } from './config';
import { sanitizeReelName } from './reelName';
import { isDropFrameRate, toTimecode } from './timecode';
import type { EventTimecodes, TrackType } from './types';

export interface EncodedEvent extends EventTimecodes {
  eventNumber: number;
  reelName: string;
  trackType: TrackType;
  editType: 'C' | 'D';
  transitionDuration: number;
  clipName: string;
}

const audioTrackTypes = ['A1', 'A2', 'A3', 'A4'] as const;

const singleLine = (str: string) => str.replaceAll(/[\r\n]+/g, ' ');

export function formatTimecode(time: RationalTime, rate: number) {
  let timecode: string;
  try {
    timecode = toTimecode(time, rate);
  } catch (err) {
    if (err instanceof TimecodeError) throw new EncodeError(err.message);
    throw err;
  }
  // EDL uses the colon separator unless the rate can be drop frame
  return isDropFrameRate(rate) ? timecode : timecode.replaceAll(';', ':');
}

export function getReelName(clip: Clip) {
  const mediaReference = getMediaReference(clip);
  if (mediaReference == null) return 'AX';
  if (mediaReference.name) return mediaReference.name;
  if (mediaReference.OTIO_SCHEMA === 'ExternalReference.1' && mediaReference.target_url) return mediaReference.target_url;
  return 'AX';
}

export function formatEvent(event: EncodedEvent) {
  let header = `${padStart(String(event.eventNumber), 3, '0')}  ${padEnd(event.reelName, 8)} ${event.trackType}    ${padEnd(event.editType, 2)}`;
  if (event.editType === 'D' && event.transitionDuration > 0) {
    header += `   ${padStart(String(event.transitionDuration), 3, '0')}`;
  }

  return [
    header,
    `     ${event.sourceIn} ${event.sourceOut} ${event.recordIn} ${event.recordOut}`,
    ...(event.clipName ? [`* FROM CLIP NAME: ${singleLine(event.clipName)}`] : []),
    '',
  ];
}

function getTransitionAfter(children: Composable[], index: number) {
  const next = children[index + 1];
  return next?.OTIO_SCHEMA === 'Transition.1' ? next : undefined;
}

/**
 * Derives the events of one track. Gaps only move the record position; a
 * dissolve placed right after a clip turns that clip into a `D` event.
 */
export function getTrackEvents(track: Track, trackType: TrackType, firstEventNumber: number, { rate, reelNameLength }: Pick<EncodeOptions, 'rate' | 'reelNameLength'>) {
  const events: EncodedEvent[] = [];
  let recordTime = rationalTime(0, rate);

  const { children } = track;
  for (let i = 0; i < children.length; i += 1) {
    const child = children[i];
    if (child == null) break;

    if (child.OTIO_SCHEMA === 'Gap.1') {
      recordTime = addTime(recordTime, child.source_range.duration);
      continue;
    }

    if (child.OTIO_SCHEMA !== 'Clip.2') {
      logger.debug('Skipping %s in track %s', child.OTIO_SCHEMA, track.name);
      continue;
    }

    const sourceRange = clipSourceRange(child);
    if (sourceRange == null) throw new EncodeError(`clip '${child.name}' has no source range or available range`);

    const { duration } = sourceRange;
    const sourceIn = sourceRange.start_time;
    const sourceOut = addTime(sourceIn, duration);
    const recordIn = recordTime;
    const recordOut = addTime(recordTime, duration);

    let editType: EncodedEvent['editType'] = 'C';
    let transitionDuration = 0;
    const transition = getTransitionAfter(children, i);
    if (transition) {
      if (transition.transition_type === TransitionType.SMPTE_Dissolve) {
        editType = 'D';
        transitionDuration = Math.round(rescaleTime(transition.out_offset, rate).value);
      } else {
        logger.debug('Transition type %s cannot be written to an EDL, writing a cut', transition.transition_type);
      }
      i += 1;
    }

    events.push({
      eventNumber: firstEventNumber + events.length,
      reelName: sanitizeReelName(getReelName(child), reelNameLength),
      trackType,
      editType,
      transitionDuration,
      sourceIn: formatTimecode(sourceIn, rate),
      sourceOut: formatTimecode(sourceOut, rate),
      recordIn: formatTimecode(recordIn, rate),
      recordOut: formatTimecode(recordOut, rate),
      clipName: child.name,
    });

    recordTime = recordOut;
  }

  return events;
}

export function encodeTimeline(timeline: Timeline | null | undefined, options: EncodeOptions) {
  if (timeline == null) throw new EncodeError('timeline is nil');

  const video = videoTracks(timeline);
  if (video.length > 1) throw new EncodeError('EDL format supports only one video track');

  const tracks: [Track, TrackType][] = [
    ...video.map((track): [Track, TrackType] => [track, 'V']),
    ...audioTracks(timeline).map((track, i): [Track, TrackType] => [track, audioTrackTypes[i] ?? 'A']),
  ];

  const lines = [
    `TITLE: ${singleLine(timeline.name) || 'Timeline'}`,
    'FCM: NON-DROP FRAME',
    '',
  ];

  let eventNumber = 1;
  for (const [track, trackType] of tracks) {
    const events = getTrackEvents(track, trackType, eventNumber, options);
    eventNumber += events.length;
    lines.push(...events.flatMap((event) => formatEvent(event)));
  }

  return lines.map((line) => `${line}\n`).join('');
}
