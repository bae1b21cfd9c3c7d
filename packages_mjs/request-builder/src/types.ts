/**
 * Core type definitions for request-builder.
 */

export type HttpMethod = 'GET' | 'POST';

export type QueryValue = string | null | undefined;

export type QueryPair = readonly [name: string, value: string];

/**
 * Immutable request description produced by `RequestBuilder.build()`.
 */
export interface FinishedRequest {
    readonly url: string; // Absolute URL with path and query merged in
    readonly method: HttpMethod;
    readonly headers: Readonly<Record<string, string>>;
    readonly body?: Uint8Array;
    readonly timeoutSeconds: number;
}

export interface MultipartField {
    name: string;
    value: string;
}

export interface MultipartFile {
    name: string;
    filename: string;
    content: Uint8Array | string;
    contentType?: string;
}

export type MultipartPart = MultipartField | MultipartFile;
