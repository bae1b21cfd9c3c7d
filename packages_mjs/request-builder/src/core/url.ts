/**
 * URL assembly: base URL + path segments + ordered query pairs.
 */
import { getLogger } from '../logger.js';
import { QueryPair } from '../types.js';

const logger = getLogger();

/**
 * Parse an absolute URL. Returns undefined instead of throwing.
 */
export function parseURL(input: string): URL | undefined {
    try {
        return new URL(input);
    } catch {
        return undefined;
    }
}

/**
 * Append segments to a copy of `base`'s path, one '/' between each.
 * Leading slashes on a segment are dropped so the join never doubles up.
 *
 * The result goes through URL path normalisation: '.' and '..' segments are
 * resolved, not kept literally, so `['..', 'admin']` on `/api/v1` gives
 * `/api/admin`. Segments from untrusted input can therefore move the target
 * path; validate them before appending.
 */
export function appendPathSegments(base: URL, segments: readonly string[]): URL {
    const url = new URL(base.href);
    if (segments.length === 0) {
        return url;
    }

    let path = url.pathname;
    for (const segment of segments) {
        if (!path.endsWith('/')) {
            path += '/';
        }
        path += segment.replace(/^\/+/, '');
    }
    url.pathname = path;
    return url;
}

/**
 * Replace the query of `url` with the given pairs, in order.
 * Falls back to `url` unchanged if the query cannot be built.
 */
export function applyQuery(url: URL, pairs: readonly QueryPair[]): URL {
    if (pairs.length === 0) {
        return url;
    }

    try {
        const withQuery = new URL(url.href);
        withQuery.search = new URLSearchParams(pairs.map(([name, value]): [string, string] => [name, value])).toString();
        return withQuery;
    } catch (error) {
        logger.warn(`Could not build query for ${url.href}, sending without it`, error);
        return url;
    }
}
