import { describe, it, expect } from 'vitest';
import { sha1 } from '../../shared/utils.js';
import { articleKey, draftContentHash, eventKey, normalizeUrl, slugify, wrestlerKey, type EntityDraft } from '../draft.js';

describe('normalizeUrl', () => {
  it('lowercases host, drops www, tracking params, fragment and trailing slash', () => {
    expect(normalizeUrl('https://WWW.News.Example.com/story/?utm_source=x&b=2&a=1#top')).toBe(
      'https://news.example.com/story?a=1&b=2',
    );
  });

  it('drops ref exactly but keeps parameters that only start with it', () => {
    expect(normalizeUrl('https://example.com/story?ref=home&reference=7&refid=3&fbclid=x&mc_cid=y')).toBe(
      'https://example.com/story?reference=7&refid=3',
    );
  });

  it('returns unparseable input trimmed', () => {
    expect(normalizeUrl('  not a url ')).toBe('not a url');
  });
});

describe('slugify', () => {
  it('strips accents and punctuation', () => {
    expect(slugify('Rey Mysterio Jr.')).toBe('rey-mysterio-jr');
    expect(slugify('Místico')).toBe('mistico');
    expect(slugify("Owen's Return!")).toBe('owens-return');
  });

  it('falls back to a hash for text without Latin letters or digits', () => {
    expect(slugify('力道山')).toBe(sha1('力道山').slice(0, 12));
    expect(slugify(' 力道山 ')).toBe(slugify('力道山'));
    expect(slugify('ジャイアント馬場')).not.toBe(slugify('力道山'));
    expect(slugify('   ')).toBe('');
  });
});

describe('natural keys', () => {
  it('builds keys per kind', () => {
    expect(wrestlerKey('John Doe')).toBe('wrestler:john-doe');
    expect(wrestlerKey('力道山')).toMatch(/^wrestler:[a-f0-9]{12}$/);
    expect(eventKey('Autumn Clash', '2026-10-12')).toBe('event:autumn-clash:2026-10-12');
    expect(articleKey('https://www.example.com/a/?utm_medium=rss')).toBe('article:https://example.com/a');
  });
});

describe('draftContentHash', () => {
  const base: EntityDraft = {
    kind: 'wrestler',
    natural_key: 'wrestler:john-doe',
    fields: { name: 'John Doe', debut_year: 1998 },
    provenance: { source: 'wiki', url: 'https://example.org/a' },
  };

  it('ignores field order and provenance', () => {
    const reordered: EntityDraft = {
      ...base,
      fields: { debut_year: 1998, name: 'John Doe' },
      provenance: { source: 'other', url: 'https://example.org/b' },
    };
    expect(draftContentHash(reordered)).toBe(draftContentHash(base));
  });

  it('changes when a field changes', () => {
    expect(draftContentHash({ ...base, fields: { name: 'John Doe', debut_year: 1999 } })).not.toBe(
      draftContentHash(base),
    );
  });
});
