/**
 * Fluent request builder.
 *
 * Configuration calls are chainable and never throw; `build()` is the only
 * call that can fail. One instance serves one call site: concurrent use of
 * the same instance is undefined unless synchronized by the caller.
 */
import { v4 as uuidv4 } from 'uuid';
import { BuilderConfigOptions, resolveBuilderConfig } from '../config.js';
import { InvalidURLError } from '../errors.js';
import { getLogger } from '../logger.js';
import { FinishedRequest, HttpMethod, MultipartPart, QueryPair, QueryValue } from '../types.js';
import { encodeMultipart, multipartContentType } from './multipart.js';
import { appendPathSegments, applyQuery, parseURL } from './url.js';

const logger = getLogger();

export const JSON_CONTENT_TYPE = 'application/json';

export class RequestBuilder {
    private base?: URL;
    private baseInput?: string;
    private pathSegments: string[] = [];
    private method: HttpMethod = 'GET';
    private headers: Record<string, string>;
    private queryParams: QueryPair[] = [];
    private body?: Buffer;
    private timeoutSeconds: number;
    private readonly multipartBoundary: string = `Boundary-${uuidv4().toUpperCase()}`;

    constructor(options: BuilderConfigOptions = {}) {
        const config = resolveBuilderConfig(options);
        this.headers = { ...config.headers };
        this.timeoutSeconds = config.timeoutSeconds;
        if (config.baseUrl !== undefined) {
            this.setBaseURL(config.baseUrl);
        }
    }

    setBaseURL(urlString: string): this {
        this.baseInput = urlString;
        this.base = parseURL(urlString);
        if (!this.base) {
            logger.debug(`Base URL '${urlString}' is not a valid absolute URL`);
        }
        return this;
    }

    /**
     * Same as `setBaseURL`; reads better at call sites that hold a finished URL.
     */
    setFullURL(urlString: string): this {
        return this.setBaseURL(urlString);
    }

    addPath(segment: string): this {
        this.pathSegments.push(segment);
        return this;
    }

    addPathSegments(segments: readonly string[]): this {
        this.pathSegments.push(...segments);
        return this;
    }

    setMethod(method: HttpMethod): this {
        this.method = method;
        return this;
    }

    addHeader(name: string, value: string): this {
        this.headers[name] = value;
        return this;
    }

    /**
     * Replace every header. Use `addHeader` to merge.
     */
    setHeaders(headers: Record<string, string>): this {
        this.headers = { ...headers };
        return this;
    }

    /**
     * The value is passed through to the transport unchecked, as with the
     * `timeoutSeconds` constructor option.
     */
    setTimeout(seconds: number): this {
        this.timeoutSeconds = seconds;
        return this;
    }

    addQueryParameter(name: string, value: QueryValue): this {
        if (value === null || value === undefined) {
            return this;
        }
        this.queryParams.push([name, value]);
        return this;
    }

    /**
     * Add each entry as a query parameter. Entry order follows object key
     * order, so call `addQueryParameter` in sequence when order matters.
     */
    addQueryParameters(params: Record<string, QueryValue>): this {
        for (const [name, value] of Object.entries(params)) {
            this.addQueryParameter(name, value);
        }
        return this;
    }

    /**
     * Set the body to the JSON encoding of `value` and the Content-Type to
     * application/json. Values JSON cannot encode leave the builder untouched.
     */
    setJSONBody(value: unknown): this {
        let encoded: string | undefined;
        try {
            encoded = JSON.stringify(value);
        } catch (error) {
            logger.debug('JSON body encoding failed, keeping previous body', error);
            return this;
        }

        if (encoded === undefined) {
            logger.debug(`JSON body encoding produced nothing for a ${typeof value}, keeping previous body`);
            return this;
        }

        this.body = Buffer.from(encoded, 'utf8');
        return this.addHeader('Content-Type', JSON_CONTENT_TYPE);
    }

    /**
     * Set raw body. Strings are UTF-8 encoded; null clears the body.
     */
    setBody(data: Uint8Array | string | null): this {
        if (data === null) {
            this.body = undefined;
        } else {
            this.body = typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
        }
        return this;
    }

    setMultipartBody(parts: readonly MultipartPart[]): this {
        this.body = encodeMultipart(parts, this.multipartBoundary);
        return this.addHeader('Content-Type', multipartContentType(this.multipartBoundary));
    }

    getMultipartBoundary(): string {
        return this.multipartBoundary;
    }

    build(): FinishedRequest {
        if (!this.base) {
            const error = new InvalidURLError(this.baseInput);
            logger.debug(error.message);
            throw error;
        }

        const url = applyQuery(appendPathSegments(this.base, this.pathSegments), this.queryParams);

        const request: FinishedRequest = {
            url: url.href,
            method: this.method,
            headers: Object.freeze({ ...this.headers }),
            ...(this.body ? { body: Buffer.from(this.body) } : {}),
            timeoutSeconds: this.timeoutSeconds
        };

        logger.trace(`Built ${request.method} ${request.url}`);
        return Object.freeze(request);
    }
}
