import { describe, expect, it } from 'vitest';
import { formatScanOutput, parseScanOutput } from '../../src/result/scan-output.js';

describe('formatScanOutput', () => {
  it('returns plain text for a whole-image scan without a debug image', () => {
    expect(formatScanOutput({ text: 'Hello\nWorld' }, { regionUsed: false })).toBe('Hello\nWorld');
  });

  it('returns JSON with a file URI when a debug image exists', () => {
    const output = formatScanOutput(
      { text: '42.50', debugImagePath: '/tmp/processed_1_0.jpg' },
      { regionUsed: true },
    );
    expect(output).toBe('{"text":"42.50","croppedImagePath":"file:///tmp/processed_1_0.jpg"}');
  });

  it('returns JSON with an empty path for a region scan without a debug image', () => {
    expect(formatScanOutput({ text: 'x' }, { regionUsed: true })).toBe('{"text":"x","croppedImagePath":""}');
  });

  it('percent-encodes spaces in the path', () => {
    const output = formatScanOutput({ text: '', debugImagePath: '/tmp/my scans/a.jpg' }, { regionUsed: false });
    expect(JSON.parse(output)).toEqual({ text: '', croppedImagePath: 'file:///tmp/my%20scans/a.jpg' });
  });
});

describe('parseScanOutput', () => {
  it('reads the JSON form', () => {
    expect(parseScanOutput('{"text":"42.50","croppedImagePath":"file:///tmp/a.jpg"}')).toEqual({
      text: '42.50',
      croppedImagePath: 'file:///tmp/a.jpg',
    });
  });

  it('treats anything else as plain text', () => {
    expect(parseScanOutput('Hello')).toEqual({ text: 'Hello', croppedImagePath: '' });
    expect(parseScanOutput('42')).toEqual({ text: '42', croppedImagePath: '' });
    expect(parseScanOutput('{"text":1}')).toEqual({ text: '{"text":1}', croppedImagePath: '' });
  });
});
