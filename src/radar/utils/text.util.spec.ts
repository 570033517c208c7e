import {
  cleanText,
  containsKeyword,
  contentTokens,
  hostnameOf,
  slugify,
} from './text.util';

describe('text util', () => {
  it('strips markup and entities from feed text', () => {
    expect(cleanText('<![CDATA[<b>Fed</b> &amp; ECB]]>')).toBe('Fed & ECB');
  });

  it('decodes entities that were encoded more than once', () => {
    const once = cleanText(
      'AT&amp;amp;T &amp;lt;b&amp;gt;wins&amp;lt;/b&amp;gt;',
    );

    expect(once).toBe('AT&T wins');
    expect(cleanText(once)).toBe(once);
  });

  it('keeps content tokens only', () => {
    expect([...contentTokens('The 2026 ECB rate and Basel rules')]).toEqual([
      'ecb',
      'rate',
      'basel',
      'rules',
    ]);
  });

  it('slugifies theme names', () => {
    expect(slugify('Identity, Privacy & Cryptography')).toBe(
      'identity-privacy-and-cryptography',
    );
  });

  it('matches keywords on word boundaries', () => {
    expect(containsKeyword('AI agent rollout', 'agent')).toBe(true);
    expect(containsKeyword('Agentic AI rollout', 'agent')).toBe(false);
    expect(containsKeyword('New post-trade rules', 'post-trade')).toBe(true);
  });

  it('reads hostnames without www', () => {
    expect(hostnameOf('https://www.Reuters.com/markets')).toBe('reuters.com');
    expect(hostnameOf('not a url')).toBe('');
  });
});
