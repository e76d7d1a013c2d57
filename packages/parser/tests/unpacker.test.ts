import { describe, it, expect } from 'vitest';
import { isMainBugreportFile, isTextLogFile, selectPrimaryLog } from '../src/unpacker.js';

describe('isTextLogFile', () => {
  it('should accept .txt and .log entries', () => {
    expect(isTextLogFile('crash.log')).toBe(true);
    expect(isTextLogFile('FS/data/misc/logd/logcat.TXT')).toBe(true);
    expect(isTextLogFile('FS/data/tombstones/tombstone_00.pb')).toBe(false);
  });
});

describe('isMainBugreportFile', () => {
  it('should match the main bugreport text at any depth', () => {
    expect(isMainBugreportFile('bugreport-raven-2026-01-15.txt')).toBe(true);
    expect(isMainBugreportFile('dir/bugreport.txt')).toBe(true);
    expect(isMainBugreportFile('bugreport-mini.txt')).toBe(false);
    expect(isMainBugreportFile('main_entry.txt')).toBe(false);
  });
});

describe('selectPrimaryLog', () => {
  it('should prefer the main bugreport file', () => {
    const log = selectPrimaryLog({
      entries: [
        { fileName: 'version.txt', content: '2.0' },
        { fileName: 'bugreport-raven-2026-01-15.txt', content: 'main content' },
      ],
    });
    expect(log).toBe('main content');
  });

  it('should join all entries in archive order otherwise', () => {
    const log = selectPrimaryLog({
      entries: [
        { fileName: 'logcat-1.log', content: 'first' },
        { fileName: 'logcat-2.log', content: 'second' },
      ],
    });
    expect(log).toBe('first\nsecond');
  });
});
