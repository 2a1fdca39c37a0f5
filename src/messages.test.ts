import { describe, expect, it } from 'vitest';
import { parseAction } from './commands.ts';
import { menuButtons, messages, modeButtons } from './messages.ts';

describe('mode buttons', () => {
  it('offers one button per mode', () => {
    expect(modeButtons()).toEqual([
      { label: '🧠 Normal (60s)', action: 'trivia:mode:normal' },
      { label: '⚡ Pe viteză (30s)', action: 'trivia:mode:speed' },
      { label: '🔕 Fără indicii (50s)', action: 'trivia:mode:no_hints' },
    ]);
  });

  it('fits the menu on a single row of parseable actions', () => {
    const buttons = menuButtons();
    expect(buttons.map((b) => b.action)).toEqual([
      'trivia:new',
      'trivia:rating',
      'trivia:mode:normal',
      'trivia:mode:speed',
      'trivia:mode:no_hints',
    ]);
    expect(buttons.map((b) => parseAction(b.action)?.kind)).toEqual(['new', 'rating', 'mode', 'mode', 'mode']);
  });

  it('names the current mode in the menu text', () => {
    expect(messages.menu('speed')).toBe('🎯 Trivia contra cronometru. Modul tău: ⚡ Pe viteză (30s)\nAlege o acțiune:');
  });
});
