import { describe, expect, it } from 'vitest';

import { redactPii } from './redact.js';

describe('redactPii', () => {
  it('replaces email addresses', () => {
    expect(redactPii('write to jane.doe@example.com today')).toBe('write to [EMAIL] today');
  });

  it('replaces runs of capitalised words', () => {
    expect(redactPii('I met John Smith yesterday')).toBe('I met [NAME] yesterday');
    expect(redactPii('Mary Jane Watson called')).toBe('[NAME] called');
  });

  it('leaves single capitalised words and plain text untouched', () => {
    expect(redactPii('Paris is lovely in spring')).toBe('Paris is lovely in spring');
    expect(redactPii('how do I save more?')).toBe('how do I save more?');
  });

  it('handles both kinds in one message', () => {
    expect(redactPii('please ask Anna Lee at anna@lee.dev')).toBe(
      'please ask [NAME] at [EMAIL]',
    );
  });

  it('replaces names with accented letters', () => {
    expect(redactPii('I met José García today')).toBe('I met [NAME] today');
    expect(redactPii('ask Ana José')).toBe('ask [NAME]');
    expect(redactPii('Élodie Dubois called')).toBe('[NAME] called');
  });
});
