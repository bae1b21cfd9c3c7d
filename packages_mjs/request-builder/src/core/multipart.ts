/**
 * multipart/form-data encoding (RFC 7578).
 */
import { MultipartFile, MultipartPart } from '../types.js';

const CRLF = '\r\n';

export const DEFAULT_PART_CONTENT_TYPE = 'application/octet-stream';

export function isMultipartFile(part: MultipartPart): part is MultipartFile {
    return 'filename' in part;
}

function escapeQuoted(value: string): string {
    return value.replace(/"/g, '%22').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}

function toBuffer(content: Uint8Array | string): Buffer {
    return typeof content === 'string' ? Buffer.from(content, 'utf8') : Buffer.from(content);
}

export function multipartContentType(boundary: string): string {
    return `multipart/form-data; boundary=${boundary}`;
}

export function encodeMultipart(parts: readonly MultipartPart[], boundary: string): Buffer {
    const chunks: Buffer[] = [];

    for (const part of parts) {
        let head = `--${boundary}${CRLF}Content-Disposition: form-data; name="${escapeQuoted(part.name)}"`;
        let content: Buffer;

        if (isMultipartFile(part)) {
            head += `; filename="${escapeQuoted(part.filename)}"${CRLF}`;
            head += `Content-Type: ${part.contentType ?? DEFAULT_PART_CONTENT_TYPE}${CRLF}`;
            content = toBuffer(part.content);
        } else {
            content = toBuffer(part.value);
            head += CRLF;
        }

        chunks.push(Buffer.from(head + CRLF, 'utf8'), content, Buffer.from(CRLF, 'utf8'));
    }

    chunks.push(Buffer.from(`--${boundary}--${CRLF}`, 'utf8'));
    return Buffer.concat(chunks);
}
