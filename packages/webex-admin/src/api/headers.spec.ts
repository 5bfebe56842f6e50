import {
  cookieHeader,
  DEFAULT_RETRY_AFTER_SECONDS,
  headerValue,
  mergeSetCookie,
  nextLink,
  parseLinkHeader,
  parseRetryAfter,
} from './headers';

describe('parseRetryAfter', () => {
  it('reads delta-seconds', () => {
    expect(parseRetryAfter('3')).toBe(3);
    expect(parseRetryAfter(5)).toBe(5);
    expect(parseRetryAfter(['7'])).toBe(7);
  });

  it('falls back to the default when the header is missing or unreadable', () => {
    expect(DEFAULT_RETRY_AFTER_SECONDS).toBe(15);
    expect(parseRetryAfter(undefined)).toBe(15);
    expect(parseRetryAfter('')).toBe(15);
    expect(parseRetryAfter('soon')).toBe(15);
  });

  it('converts an HTTP-date into seconds from now', () => {
    const now = Date.parse('Wed, 21 Oct 2015 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:30 GMT', now)).toBe(30);
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:27:00 GMT', now)).toBe(0);
  });
});

describe('parseLinkHeader', () => {
  it('splits comma separated entries and their parameters', () => {
    const entries = parseLinkHeader('<https://a.test/p?x=2>; rel="next", <https://a.test/p?x=9>; rel="last"');

    expect(entries).toEqual([
      { url: 'https://a.test/p?x=2', rel: ['next'], params: { rel: 'next' } },
      { url: 'https://a.test/p?x=9', rel: ['last'], params: { rel: 'last' } },
    ]);
  });

  it('returns nothing for a missing header', () => {
    expect(parseLinkHeader(undefined)).toEqual([]);
  });
});

describe('nextLink', () => {
  it('finds the next relation among several', () => {
    expect(nextLink('<https://a.test/1>; rel="prev", <https://a.test/3>; rel="next"')).toBe('https://a.test/3');
  });

  it('accepts a space separated relation list', () => {
    expect(nextLink('<https://a.test/3>; rel="next last"')).toBe('https://a.test/3');
  });

  it('is null without a next relation', () => {
    expect(nextLink('<https://a.test/1>; rel="prev"')).toBeNull();
    expect(nextLink(undefined)).toBeNull();
  });
});

describe('headerValue', () => {
  it('looks names up case-insensitively', () => {
    expect(headerValue({ 'Retry-After': '4' }, 'retry-after')).toBe('4');
    expect(headerValue({}, 'link')).toBeUndefined();
  });
});

describe('cookies', () => {
  it('merges Set-Cookie values, replacing cookies with the same name', () => {
    const jar = new Map([['seed', 's']]);

    mergeSetCookie(jar, ['a=1; Path=/; HttpOnly', 'b=2']);
    mergeSetCookie(jar, 'a=3; Secure');

    expect(cookieHeader(jar)).toBe('seed=s; a=3; b=2');
  });

  it('ignores values without a name', () => {
    const jar = new Map<string, string>();
    mergeSetCookie(jar, ['=nameless', 'novalue', undefined]);
    expect(cookieHeader(jar)).toBeNull();
  });
});
