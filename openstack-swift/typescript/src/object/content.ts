/**
 * Upload content handling
 */

import { createHash, type Hash } from 'node:crypto';
import type { RequestBody } from '../transport/index.js';

/**
 * Content accepted by uploads. Byte arrays and strings have a known length;
 * everything else is streamed.
 */
export type UploadContent =
  | Uint8Array
  | string
  | AsyncIterable<Uint8Array>
  | null
  | undefined;

/**
 * Content with a known length, ready to be sent as-is.
 */
export interface BufferedContent {
  kind: 'buffered';
  bytes: Uint8Array;
}

/**
 * Content that can only be read once, front to back.
 */
export interface StreamedContent {
  kind: 'streamed';
  stream: AsyncIterable<Uint8Array>;
}

export type PreparedContent = BufferedContent | StreamedContent;

/**
 * Classifies upload content. `null` and `undefined` become an empty buffer.
 */
export function prepareContent(content: UploadContent): PreparedContent {
  if (content === null || content === undefined) {
    return { kind: 'buffered', bytes: new Uint8Array(0) };
  }
  if (typeof content === 'string') {
    return { kind: 'buffered', bytes: Buffer.from(content, 'utf8') };
  }
  if (content instanceof Uint8Array) {
    return { kind: 'buffered', bytes: content };
  }
  return { kind: 'streamed', stream: content };
}

/**
 * Returns the request body for prepared content.
 */
export function toRequestBody(content: PreparedContent): RequestBody {
  return content.kind === 'buffered' ? content.bytes : content.stream;
}

/**
 * Hex-encoded MD5 digest, the format Swift uses for Etags.
 */
export function md5Hex(bytes: Uint8Array): string {
  return createHash('md5').update(bytes).digest('hex');
}

/**
 * Passes chunks through while feeding them into `hash`.
 */
export async function* hashingStream(
  source: AsyncIterable<Uint8Array>,
  hash: Hash
): AsyncGenerator<Uint8Array> {
  for await (const chunk of source) {
    hash.update(chunk);
    yield chunk;
  }
}

/**
 * Removes surrounding double quotes from an Etag.
 */
export function unquoteEtag(etag: string): string {
  return etag.length >= 2 && etag.startsWith('"') && etag.endsWith('"')
    ? etag.slice(1, -1)
    : etag;
}
