/**
 * Hand-off from a finished request to undici's request options.
 */
import type { Dispatcher } from 'undici';
import { FinishedRequest } from './types.js';

export function toDispatchOptions(request: FinishedRequest): Dispatcher.RequestOptions {
    const url = new URL(request.url);
    const timeoutMs = request.timeoutSeconds * 1000;

    return {
        origin: url.origin,
        path: `${url.pathname}${url.search}`,
        method: request.method,
        headers: { ...request.headers },
        ...(request.body ? { body: Buffer.from(request.body) } : {}),
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs
    };
}
