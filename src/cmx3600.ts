import { classifyLine, parseTimecodeLine } from './cmx3600Grammar';
import type { CommentLine } from './cmx3600Grammar';
import { ParseError } from './errors';
import logger from './logger';
import { identityColorDecision } from './types';
import type { EdlDocument, EdlEvent } from './types';

type AccumulatorState =
  | { kind: 'idle' }
  | { kind: 'accumulating', event: EdlEvent };

function applyComment(event: EdlEvent, comment: CommentLine) {
  /* eslint-disable no-param-reassign */
  switch (comment.kind) {
    case 'clipName': {
      event.clipName = comment.clipName;
      break;
    }
    case 'filePath': {
      event.filePath = comment.filePath;
      break;
    }
    case 'freezeFrame': {
      event.freezeFrame = true;
      break;
    }
    case 'locator': {
      event.markers.push(comment.marker);
      break;
    }
    case 'ascSop': {
      const { slope, offset, power } = comment;
      event.colorDecision = { ...(event.colorDecision ?? identityColorDecision()), slope, offset, power };
      break;
    }
    case 'ascSat': {
      event.colorDecision = { ...(event.colorDecision ?? identityColorDecision()), saturation: comment.saturation };
      break;
    }
    case 'text': {
      event.comment = event.comment != null ? `${event.comment}\n${comment.text}` : comment.text;
      break;
    }
    default: {
      const exhaustive: never = comment;
      throw new Error(`Unhandled comment ${JSON.stringify(exhaustive)}`);
    }
  }
  /* eslint-enable no-param-reassign */
}

/**
 * Reads CMX 3600 text into events. An event opens on its header line and
 * collects the comment and M2 lines that follow until the next header.
 */
export default function parseCmx3600(edlContent: string): EdlDocument {
  // strip BOM
  const lines = edlContent.replace(/^\uFEFF/, '').split(/\r?\n/);
  const events: EdlEvent[] = [];
  let title: string | undefined;
  let fcm: string | undefined;

  // working state
  let state: AccumulatorState = { kind: 'idle' };

  const flush = () => {
    if (state.kind === 'accumulating') events.push(state.event);
    state = { kind: 'idle' };
  };

  for (let i = 0; i < lines.length; i += 1) {
    const lineNumber = i + 1;
    const line = lines[i] ?? '';
    const parsed = classifyLine(line);

    switch (parsed.kind) {
      case 'title': {
        title = parsed.title;
        break;
      }
      case 'fcm': {
        // captured only, timecodes are interpreted from the decode rate
        fcm = parsed.fcm;
        break;
      }
      case 'event': {
        flush();
        const timecodeLineNumber = lineNumber + 1;
        const timecodeLine = lines[i + 1];
        const timecodes = timecodeLine != null ? parseTimecodeLine(timecodeLine) : undefined;
        if (timecodes == null) throw new ParseError(timecodeLineNumber, 'expected timecode line after event');
        i += 1;
        state = {
          kind: 'accumulating',
          event: { ...parsed.header, ...timecodes, line: timecodeLineNumber, freezeFrame: false, markers: [] },
        };
        break;
      }
      case 'speed': {
        if (state.kind !== 'accumulating') break;
        if (parsed.speedEffect == null) {
          logger.debug('Ignoring malformed M2 line %d: %s', lineNumber, line.trim());
          break;
        }
        state.event.speedEffect = parsed.speedEffect;
        break;
      }
      case 'comment': {
        if (state.kind === 'accumulating') applyComment(state.event, parsed.comment);
        break;
      }
      default: {
        // blank and unrecognized lines
        break;
      }
    }
  }

  flush();

  return { title, fcm, events };
}
