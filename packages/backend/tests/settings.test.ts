import { describe, it, expect } from 'vitest';
import { parseSettingsUpdate } from '../src/routes/settings.js';

describe('parseSettingsUpdate', () => {
  it('should accept positive integers', () => {
    expect(parseSettingsUpdate({ hexDumpBytes: 64, minStringLength: 5 })).toEqual({
      ok: true,
      updates: { hexDumpBytes: 64, minStringLength: 5 },
    });
  });

  it('should accept a partial update and ignore unknown keys', () => {
    expect(parseSettingsUpdate({ minStringLength: 6, colour: 'red' })).toEqual({
      ok: true,
      updates: { minStringLength: 6 },
    });
  });

  it('should reject non-integer or non-positive values', () => {
    expect(parseSettingsUpdate({ hexDumpBytes: 0 })).toEqual({
      ok: false,
      error: 'hexDumpBytes must be a positive integer',
    });
    expect(parseSettingsUpdate({ minStringLength: '4' })).toEqual({
      ok: false,
      error: 'minStringLength must be a positive integer',
    });
  });

  it('should reject a non-object body', () => {
    expect(parseSettingsUpdate('hexDumpBytes=64')).toEqual({ ok: false, error: 'Body must be a JSON object' });
  });
});
