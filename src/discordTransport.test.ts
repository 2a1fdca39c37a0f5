import { describe, expect, it } from 'vitest';
import { buildButtonRows } from './discordTransport.ts';

describe('buildButtonRows', () => {
  it('puts at most five buttons on a row', () => {
    const buttons = Array.from({ length: 7 }, (_, i) => ({ label: `B${i}`, action: `trivia:test:${i}` }));
    const rows = buildButtonRows(buttons);
    expect(rows.map((r) => r.components.length)).toEqual([5, 2]);
    expect(rows[1].components[1].toJSON()).toMatchObject({ custom_id: 'trivia:test:6', label: 'B6' });
  });

  it('sends no rows without buttons', () => {
    expect(buildButtonRows([])).toEqual([]);
  });
});
