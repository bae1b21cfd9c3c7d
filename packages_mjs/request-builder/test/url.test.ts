/**
 * Tests for URL assembly helpers.
 */
import { appendPathSegments, applyQuery, parseURL } from '../src/core/url.js';

describe('parseURL', () => {
    test('parses absolute URLs', () => {
        expect(parseURL('https://api.test/v1')?.href).toBe('https://api.test/v1');
    });

    test('returns undefined for relative or malformed input', () => {
        expect(parseURL('/relative/path')).toBeUndefined();
        expect(parseURL('')).toBeUndefined();
        expect(parseURL('http://')).toBeUndefined();
    });
});

describe('appendPathSegments', () => {
    test('does not modify the base URL', () => {
        const base = new URL('https://api.test/v1');
        const result = appendPathSegments(base, ['users']);

        expect(result.href).toBe('https://api.test/v1/users');
        expect(base.href).toBe('https://api.test/v1');
    });

    test('returns an equal copy when there are no segments', () => {
        const base = new URL('https://api.test/v1?x=1');
        const result = appendPathSegments(base, []);

        expect(result).not.toBe(base);
        expect(result.href).toBe(base.href);
    });

    test('an empty segment leaves a trailing slash', () => {
        expect(appendPathSegments(new URL('https://api.test/v1'), ['']).href).toBe('https://api.test/v1/');
    });

    test('resolves dot segments instead of keeping them literally', () => {
        const base = new URL('https://x.test/api/v1');

        expect(appendPathSegments(base, ['..', 'admin']).href).toBe('https://x.test/api/admin');
        expect(appendPathSegments(base, ['.', 'users']).href).toBe('https://x.test/api/v1/users');
    });

    test('encodes ? and # inside a segment', () => {
        expect(appendPathSegments(new URL('https://api.test'), ['a?b#c']).href).toBe('https://api.test/a%3Fb%23c');
    });
});

describe('applyQuery', () => {
    test('returns the same URL when there are no pairs', () => {
        const url = new URL('https://api.test/?keep=1');
        expect(applyQuery(url, [])).toBe(url);
    });

    test('serialises pairs in order', () => {
        const url = applyQuery(new URL('https://api.test/'), [
            ['b', '2'],
            ['a', '1'],
            ['b', '3']
        ]);
        expect(url.search).toBe('?b=2&a=1&b=3');
    });

    test('falls back to the URL without the query when construction fails', () => {
        const setter = jest.spyOn(URL.prototype, 'search', 'set').mockImplementation(() => {
            throw new Error('search rejected');
        });
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        try {
            const url = new URL('https://api.test/users');
            const result = applyQuery(url, [['q', '1']]);

            expect(result).toBe(url);
            expect(result.href).toBe('https://api.test/users');
            expect(warn).toHaveBeenCalledTimes(1);
        } finally {
            setter.mockRestore();
            warn.mockRestore();
        }
    });
});
