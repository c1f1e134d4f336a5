import type { EdlMarker, EventHeader, EventTimecodes, SpeedEffect, TrackType, Triple, EditType } from './types';
import { trackTypes, editTypes } from './types';

const tc = String.raw`\d{2}:\d{2}:\d{2}[:;]\d{2}`;
const num = String.raw`[-+]?[\d.]+`;
const triple = String.raw`\(\s*(${num})[,\s]+(${num})[,\s]+(${num})\s*\)`;

// EVENT# REEL TRACK EDIT [TRANSITION_DURATION]
const eventHeaderRegex = /^\s*(\d+)\s+(\S+)\s+(V|A[1-4]?)\s+(C|D|W\d{3}|KB|K)\s*(\d+)?/;
const timecodeLineRegex = new RegExp(`^\\s*(${tc})\\s+(${tc})\\s+(${tc})\\s+(${tc})`);
// M2 REEL SPEED TIMECODE
const speedLineRegex = new RegExp(`^M2\\s+(\\S+)\\s+(-?[0-9.]+)\\s+(${tc})`);
// * LOC: TIMECODE COLOR COMMENT
const locatorRegex = new RegExp(`^\\*\\s*LOC:\\s+(${tc})\\s+(\\w*)(?:\\s+|$)(.*)`);
const ascSopRegex = new RegExp(`ASC_SOP\\s*${triple}\\s*${triple}\\s*${triple}`);
const ascSatRegex = new RegExp(`ASC_SAT\\s+(${num})`);

const toTrackType = (str: string): TrackType | undefined => trackTypes.find((trackType) => trackType === str);
const toEditType = (str: string): EditType | undefined => editTypes.find((editType) => editType === str);

function parseNumbers(strs: (string | undefined)[]) {
  const numbers = strs.map((str) => (str != null ? parseFloat(str) : Number.NaN));
  return numbers.every((n) => Number.isFinite(n)) ? numbers : undefined;
}

export function parseEventHeader(line: string): EventHeader | undefined {
  const match = line.match(eventHeaderRegex);
  if (!match) return undefined;
  const [, eventNumberStr = '', reelName = '', trackTypeStr = '', editStr = '', durationStr] = match;

  const trackType = toTrackType(trackTypeStr);
  // W### carries the wipe code in the edit field
  const isWipe = /^W\d{3}$/.test(editStr);
  const editType = isWipe ? 'W' : toEditType(editStr);
  if (trackType == null || editType == null) return undefined;

  return {
    eventNumber: parseInt(eventNumberStr, 10),
    reelName,
    trackType,
    editType,
    transitionDuration: durationStr != null ? parseInt(durationStr, 10) : 0,
    wipeCode: isWipe ? editStr : undefined,
  };
}

export function parseTimecodeLine(line: string): EventTimecodes | undefined {
  const match = line.match(timecodeLineRegex);
  if (!match) return undefined;
  const [, sourceIn = '', sourceOut = '', recordIn = '', recordOut = ''] = match;
  return { sourceIn, sourceOut, recordIn, recordOut };
}

export function parseSpeedLine(line: string): SpeedEffect | undefined {
  const match = line.trim().match(speedLineRegex);
  if (!match) return undefined;
  const [, name = '', speedStr = '', timecode = ''] = match;
  const speed = parseFloat(speedStr);
  if (!Number.isFinite(speed)) return undefined;
  return { name, speed, timecode };
}

export function parseLocator(line: string): EdlMarker | undefined {
  const match = line.trim().match(locatorRegex);
  if (!match) return undefined;
  const [, timecode = '', color = '', comment = ''] = match;
  return { timecode, color, comment: comment.trim() };
}

export function parseAscSop(line: string): { slope: Triple, offset: Triple, power: Triple } | undefined {
  const match = line.match(ascSopRegex);
  if (!match) return undefined;
  const numbers = parseNumbers(match.slice(1, 10));
  if (numbers == null) return undefined;
  const [s0 = 1, s1 = 1, s2 = 1, o0 = 0, o1 = 0, o2 = 0, p0 = 1, p1 = 1, p2 = 1] = numbers;
  return { slope: [s0, s1, s2], offset: [o0, o1, o2], power: [p0, p1, p2] };
}

export function parseAscSat(line: string): number | undefined {
  const match = line.match(ascSatRegex);
  if (!match) return undefined;
  const saturation = parseFloat(match[1] ?? '');
  return Number.isFinite(saturation) ? saturation : undefined;
}

/**
 * Value of a `* KEYWORD: value` comment, with or without a space after the asterisk.
 */
export function parseCommentValue(line: string, keyword: string) {
  const trimmed = line.trim();
  for (const prefix of [`*${keyword}:`, `* ${keyword}:`]) {
    if (trimmed.startsWith(prefix)) return trimmed.slice(prefix.length).trim();
  }
  return undefined;
}

export const isFreezeFrameLine = (line: string) => {
  const trimmed = line.trim();
  return /^\*\s*FREEZE FRAME/.test(trimmed) || trimmed.endsWith(' FF');
};

export function stripFreezeFrameSuffix(name: string, freezeFrame: boolean) {
  if (freezeFrame && name.endsWith(' FF')) return name.slice(0, -' FF'.length);
  return name;
}

export type CommentLine =
  | { kind: 'clipName', clipName: string }
  | { kind: 'filePath', filePath: string }
  | { kind: 'freezeFrame' }
  | { kind: 'locator', marker: EdlMarker }
  | { kind: 'ascSop', slope: Triple, offset: Triple, power: Triple }
  | { kind: 'ascSat', saturation: number }
  | { kind: 'text', text: string };

export function classifyComment(line: string): CommentLine {
  const clipName = parseCommentValue(line, 'FROM CLIP NAME');
  if (clipName != null) return { kind: 'clipName', clipName };

  // Avid style
  const avidPath = parseCommentValue(line, 'FROM CLIP');
  if (avidPath != null) return { kind: 'filePath', filePath: avidPath };

  // Nucoda style
  const nucodaPath = parseCommentValue(line, 'FROM FILE');
  if (nucodaPath != null) return { kind: 'filePath', filePath: nucodaPath };

  if (isFreezeFrameLine(line)) return { kind: 'freezeFrame' };

  const marker = parseLocator(line);
  if (marker) return { kind: 'locator', marker };

  const sop = parseAscSop(line);
  if (sop) return { kind: 'ascSop', ...sop };

  const saturation = parseAscSat(line);
  if (saturation != null) return { kind: 'ascSat', saturation };

  return { kind: 'text', text: line.trim() };
}

export type EdlLine =
  | { kind: 'blank' }
  | { kind: 'title', title: string }
  | { kind: 'fcm', fcm: string }
  | { kind: 'event', header: EventHeader }
  | { kind: 'speed', speedEffect: SpeedEffect | undefined }
  | { kind: 'comment', comment: CommentLine }
  | { kind: 'other' };

export function classifyLine(line: string): EdlLine {
  const trimmed = line.trim();
  if (trimmed === '') return { kind: 'blank' };
  if (trimmed.startsWith('TITLE:')) return { kind: 'title', title: trimmed.slice('TITLE:'.length).trim() };
  if (trimmed.startsWith('FCM:')) return { kind: 'fcm', fcm: trimmed.slice('FCM:'.length).trim() };

  const header = parseEventHeader(line);
  if (header) return { kind: 'event', header };

  if (trimmed.startsWith('M2')) return { kind: 'speed', speedEffect: parseSpeedLine(line) };
  if (trimmed.startsWith('*')) return { kind: 'comment', comment: classifyComment(line) };
  return { kind: 'other' };
}
