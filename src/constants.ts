/**
 * Well-known header values
 * Centralizes media types and the grammar constants the parsers share
 */

import { ContentType } from './core/content-type.js';

// Media types
export const APPLICATION_JSON = new ContentType('application', 'json');
export const APPLICATION_OCTET_STREAM = new ContentType('application', 'octet-stream');
export const APPLICATION_PROBLEM_JSON = new ContentType('application', 'problem', {}, 'json'); // RFC 9457
export const APPLICATION_XML = new ContentType('application', 'xml');
export const TEXT_HTML = new ContentType('text', 'html', { charset: 'UTF-8' });
export const TEXT_JAVASCRIPT = new ContentType('text', 'javascript'); // RFC 9239
export const TEXT_MARKDOWN = new ContentType('text', 'markdown');
export const TEXT_PLAIN = new ContentType('text', 'plain');

// Qualities below this are rejections
export const SMALLEST_QUALITY = 0.001;

// RFC 9111 section 1.2.2: larger delta-seconds are read as this value
export const MAX_DELTA_SECONDS = 2147483648;

// RFC 7239 section 5
export const STANDARD_FORWARDED_PARAMETERS = ['by', 'for', 'host', 'proto'] as const;

// RFC 8288 section 3: only the first occurrence counts
export const SINGULAR_LINK_PARAMETERS = ['rel', 'media', 'type', 'title', 'title*'] as const;
