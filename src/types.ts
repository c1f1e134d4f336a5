export const trackTypes = ['V', 'A', 'A1', 'A2', 'A3', 'A4'] as const;
export type TrackType = typeof trackTypes[number];

export const isVideoTrackType = (trackType: TrackType) => trackType === 'V';

export const editTypes = ['C', 'D', 'W', 'KB', 'K'] as const;
export type EditType = typeof editTypes[number];

export interface SpeedEffect {
  name: string;
  // frames per second at the new rate, not a time scalar
  speed: number;
  timecode: string;
}

export interface EdlMarker {
  timecode: string;
  color: string;
  comment: string;
}

export type Triple = [number, number, number];

export interface ColorDecision {
  slope: Triple;
  offset: Triple;
  power: Triple;
  saturation: number;
}

export const identityColorDecision = (): ColorDecision => ({
  slope: [1, 1, 1],
  offset: [0, 0, 0],
  power: [1, 1, 1],
  saturation: 1,
});

export interface EventTimecodes {
  sourceIn: string;
  sourceOut: string;
  recordIn: string;
  recordOut: string;
}

export interface EventHeader {
  eventNumber: number;
  reelName: string;
  trackType: TrackType;
  editType: EditType;
  // frames, 0 when absent
  transitionDuration: number;
  wipeCode?: string | undefined;
}

export interface EdlEvent extends EventHeader, EventTimecodes {
  // physical line of the timecode line, for error reporting
  line: number;
  clipName?: string | undefined;
  filePath?: string | undefined;
  freezeFrame: boolean;
  speedEffect?: SpeedEffect | undefined;
  markers: EdlMarker[];
  colorDecision?: ColorDecision | undefined;
  comment?: string | undefined;
}

export interface EdlDocument {
  title?: string | undefined;
  fcm?: string | undefined;
  events: readonly EdlEvent[];
}
