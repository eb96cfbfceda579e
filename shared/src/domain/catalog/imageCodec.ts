/**
 * Image Codec - Pure Functions
 *
 * The source store keeps image blobs either as raw bytes, as hex text
 * (varbinary dumps, optionally 0x-prefixed) or already base64-encoded.
 * The remote platform wants base64 attachments. No I/O happens here.
 */

import { DecodeError } from '../../errors/catalog.js';
import type { ImagePayload } from '../../types/index.js';

// ============================================
// CONSTANTS
// ============================================

const HEX_PATTERN = /^[0-9a-fA-F]+$/;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const DATA_URI_PATTERN = /^data:([^;,]*);base64,(.*)$/s;

export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp' | 'application/octet-stream';

const MIME_EXTENSIONS: Record<ImageMimeType, string> = {
    'image/png': 'png',
    'image/jpeg': 'jpg',
    'image/gif': 'gif',
    'image/webp': 'webp',
    'application/octet-stream': 'bin',
};

// ============================================
// HELPERS
// ============================================

function isHex(text: string): boolean {
    return text.length % 2 === 0 && HEX_PATTERN.test(text);
}

function isBase64(text: string): boolean {
    return text.length % 4 === 0 && BASE64_PATTERN.test(text);
}

// ============================================
// CORE FUNCTIONS
// ============================================

/**
 * Convert an image payload to base64.
 *
 * A string consisting only of hex digits (even length) is read as hex, so
 * hex and base64 inputs for the same bytes converge on the same output.
 *
 * @throws DecodeError when the payload is empty or matches neither form
 */
export function encodeImage(payload: ImagePayload): string {
    if (payload instanceof Uint8Array) {
        if (payload.length === 0) throw new DecodeError('Image payload is empty');
        return Buffer.from(payload).toString('base64');
    }

    let text = payload.trim();

    const dataUri = DATA_URI_PATTERN.exec(text);
    if (dataUri) text = dataUri[2];

    if (text.startsWith('0x') || text.startsWith('0X')) {
        const hex = text.slice(2).replace(/\s+/g, '');
        if (!isHex(hex)) throw new DecodeError('0x-prefixed payload is not valid hex', payload);
        return Buffer.from(hex, 'hex').toString('base64');
    }

    const compact = text.replace(/\s+/g, '');
    if (compact === '') throw new DecodeError('Image payload is empty');

    if (isHex(compact)) return Buffer.from(compact, 'hex').toString('base64');
    if (isBase64(compact)) return compact;

    throw new DecodeError('Image payload is neither hex nor base64', payload);
}

/**
 * Sniff the image type from its magic bytes.
 */
export function detectImageMime(base64: string): ImageMimeType {
    // 16 base64 chars = 12 bytes, enough for every signature below
    const head = Buffer.from(base64.slice(0, 16), 'base64');

    if (head.length >= 4 && head[0] === 0x89 && head[1] === 0x50 && head[2] === 0x4e && head[3] === 0x47) {
        return 'image/png';
    }
    if (head.length >= 3 && head[0] === 0xff && head[1] === 0xd8 && head[2] === 0xff) {
        return 'image/jpeg';
    }
    if (head.length >= 4 && head.toString('ascii', 0, 4) === 'GIF8') {
        return 'image/gif';
    }
    if (head.length >= 12 && head.toString('ascii', 0, 4) === 'RIFF' && head.toString('ascii', 8, 12) === 'WEBP') {
        return 'image/webp';
    }
    return 'application/octet-stream';
}

export function imageExtension(base64: string): string {
    return MIME_EXTENSIONS[detectImageMime(base64)];
}

/** `data:` URI form, as used for previews */
export function toDataUri(base64: string): string {
    return `data:${detectImageMime(base64)};base64,${base64}`;
}
