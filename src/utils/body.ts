/**
 * Response body decoding. axios hands back parsed JSON, strings, binary
 * buffers or streams depending on the requested responseType.
 */

import { Readable } from 'stream';

export function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(new Uint8Array(data));
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf8');
  }
  if (data === undefined || data === null) {
    return Buffer.alloc(0);
  }
  return Buffer.from(JSON.stringify(data), 'utf8');
}

export async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(toBuffer(chunk));
  }
  return Buffer.concat(chunks);
}

export interface DecodedBody {
  /** Parsed JSON, or the text itself when it is not JSON */
  value: unknown;
  text: string;
}

export function decodeJSON(data: unknown): DecodedBody {
  if (typeof data !== 'string' && !Buffer.isBuffer(data) && !(data instanceof ArrayBuffer) && !ArrayBuffer.isView(data)) {
    return { value: data, text: data === undefined ? '' : JSON.stringify(data) };
  }

  const text = toBuffer(data).toString('utf8');
  if (text.trim() === '') {
    return { value: undefined, text };
  }
  try {
    return { value: JSON.parse(text), text };
  } catch {
    return { value: text, text };
  }
}

/**
 * Decode any response payload, draining it first when it is a stream
 */
export async function decodeBody(data: unknown): Promise<DecodedBody> {
  return decodeJSON(data instanceof Readable ? await readStream(data) : data);
}
