import { rationalTime, timeRange } from './time';
import { defaultMediaKey } from './types';
import type {
  Clip,
  Composable,
  Effect,
  ExternalReference,
  FreezeFrame,
  Gap,
  GeneratorReference,
  LinearTimeWarp,
  Marker,
  MediaReference,
  Metadata,
  RationalTime,
  TimeRange,
  Timeline,
  Track,
  TrackKind,
  Transition,
} from './types';

export function createTimeline(name = '', metadata: Metadata = {}): Timeline {
  return {
    OTIO_SCHEMA: 'Timeline.1',
    name,
    global_start_time: null,
    tracks: {
      OTIO_SCHEMA: 'Stack.1',
      name: 'tracks',
      children: [],
      source_range: null,
      effects: [],
      markers: [],
      enabled: true,
      metadata: {},
    },
    metadata,
  };
}

export function createTrack(name: string, kind: TrackKind): Track {
  return {
    OTIO_SCHEMA: 'Track.1',
    name,
    kind,
    children: [],
    source_range: null,
    effects: [],
    markers: [],
    enabled: true,
    metadata: {},
  };
}

export function createClip({ name, mediaReference, sourceRange, metadata = {}, effects = [], markers = [] }: {
  name: string,
  mediaReference?: MediaReference | undefined,
  sourceRange?: TimeRange | undefined,
  metadata?: Metadata,
  effects?: Effect[],
  markers?: Marker[],
}): Clip {
  return {
    OTIO_SCHEMA: 'Clip.2',
    name,
    source_range: sourceRange ?? null,
    media_references: mediaReference ? { [defaultMediaKey]: mediaReference } : {},
    active_media_reference_key: defaultMediaKey,
    effects,
    markers,
    enabled: true,
    metadata,
  };
}

export function createGap(duration: RationalTime): Gap {
  return {
    OTIO_SCHEMA: 'Gap.1',
    name: '',
    source_range: timeRange(rationalTime(0, duration.rate), duration),
    effects: [],
    markers: [],
    enabled: true,
    metadata: {},
  };
}

export function createTransition({ name = '', transitionType, inOffset, outOffset, metadata = {} }: {
  name?: string,
  transitionType: string,
  inOffset: RationalTime,
  outOffset: RationalTime,
  metadata?: Metadata,
}): Transition {
  return {
    OTIO_SCHEMA: 'Transition.1',
    name,
    transition_type: transitionType,
    in_offset: inOffset,
    out_offset: outOffset,
    metadata,
  };
}

export function createMarker({ name, markedRange, color = '', comment = '', metadata = {} }: {
  name: string,
  markedRange: TimeRange,
  color?: string,
  comment?: string,
  metadata?: Metadata,
}): Marker {
  return {
    OTIO_SCHEMA: 'Marker.2',
    name,
    marked_range: markedRange,
    color,
    comment,
    metadata,
  };
}

export const externalReference = (targetUrl: string, availableRange: TimeRange | null, name = targetUrl): ExternalReference => ({
  OTIO_SCHEMA: 'ExternalReference.1',
  name,
  target_url: targetUrl,
  available_range: availableRange,
  metadata: {},
});

export const generatorReference = (generatorKind: string, availableRange: TimeRange | null, name = generatorKind): GeneratorReference => ({
  OTIO_SCHEMA: 'GeneratorReference.1',
  name,
  generator_kind: generatorKind,
  available_range: availableRange,
  parameters: {},
  metadata: {},
});

export const linearTimeWarp = (timeScalar: number): LinearTimeWarp => ({
  OTIO_SCHEMA: 'LinearTimeWarp.1',
  name: '',
  effect_name: 'LinearTimeWarp',
  time_scalar: timeScalar,
  metadata: {},
});

export const freezeFrame = (): FreezeFrame => ({
  OTIO_SCHEMA: 'FreezeFrame.1',
  name: '',
  effect_name: 'FreezeFrame',
  time_scalar: 0,
  metadata: {},
});

export function appendTrack(timeline: Timeline, track: Track) {
  timeline.tracks.children.push(track);
}

export function appendChild(track: Track, child: Composable) {
  track.children.push(child);
}

export const videoTracks = (timeline: Timeline) => timeline.tracks.children.filter((track) => track.kind === 'Video');

export const audioTracks = (timeline: Timeline) => timeline.tracks.children.filter((track) => track.kind === 'Audio');

export const getMediaReference = (clip: Clip): MediaReference | undefined => clip.media_references[clip.active_media_reference_key];

// a clip without its own source range plays the whole available range of its media
export const clipSourceRange = (clip: Clip): TimeRange | undefined => clip.source_range ?? getMediaReference(clip)?.available_range ?? undefined;

export function itemDuration(item: Clip | Gap): RationalTime | undefined {
  if (item.OTIO_SCHEMA === 'Gap.1') return item.source_range.duration;
  return clipSourceRange(item)?.duration;
}
