import { expect, it } from 'vitest';

import { sanitizeReelName } from './reelName';

it('replaces characters outside letters, digits and underscore', () => {
  expect(sanitizeReelName('My Clip')).toBe('My_Clip');
  expect(sanitizeReelName('a.b-c')).toBe('a_b_c');
});

it('truncates to the maximum length', () => {
  expect(sanitizeReelName('VeryLongClipName')).toBe('VeryLong');
  expect(sanitizeReelName('VeryLongClipName', 4)).toBe('Very');
});

it('does not truncate when the maximum is zero or negative', () => {
  expect(sanitizeReelName('VeryLongClipName', 0)).toBe('VeryLongClipName');
  expect(sanitizeReelName('/media/shot one.mov', -1)).toBe('_media_shot_one_mov');
});

it('falls back to AX', () => {
  expect(sanitizeReelName('')).toBe('AX');
});
