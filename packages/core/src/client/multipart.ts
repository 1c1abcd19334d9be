/**
 * Streaming multipart/form-data encoder for single-file uploads.
 */

import * as path from 'node:path';
import { randomBytes } from 'node:crypto';

export type ByteSource = AsyncIterable<Uint8Array | string> | Iterable<Uint8Array | string>;

export interface MultipartUpload {
  /** Path relative to the client's base URL. */
  path: string;
  fieldName: string;
  /** Already-open byte stream; the encoder never touches the filesystem. */
  stream: ByteSource;
  /** Only the base name is sent, in the Content-Disposition header. */
  fileName: string;
}

export interface SourceFailure {
  cause: unknown;
}

export interface MultipartBody {
  contentType: string;
  body: AsyncIterable<Uint8Array>;
  /** Set once `upload.stream` has thrown while being read. */
  failure(): SourceFailure | undefined;
}

const CRLF = '\r\n';
const encoder = new TextEncoder();

export function createBoundary(): string {
  return `----ClickUpCliBoundary${randomBytes(12).toString('hex')}`;
}

// Line breaks would end the header line early
function quote(value: string): string {
  return value.replace(/[\r\n]/g, '').replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function toBytes(chunk: Uint8Array | string): Uint8Array {
  return typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
}

async function* encodeParts(
  boundary: string,
  fieldName: string,
  fileName: string,
  stream: ByteSource,
  onFailure: (failure: SourceFailure) => void
): AsyncGenerator<Uint8Array> {
  const head = [
    `--${boundary}`,
    `Content-Disposition: form-data; name="${quote(fieldName)}"; filename="${quote(path.basename(fileName))}"`,
    'Content-Type: application/octet-stream',
    '',
    '',
  ].join(CRLF);

  yield encoder.encode(head);

  try {
    for await (const chunk of stream) {
      yield toBytes(chunk);
    }
  } catch (error) {
    onFailure({ cause: error });
    throw error;
  }

  yield encoder.encode(`${CRLF}--${boundary}--${CRLF}`);
}

/**
 * Build a multipart body with one file part. The part content is pulled from
 * `upload.stream` chunk by chunk as the request is sent.
 */
export function encodeMultipart(upload: MultipartUpload, boundary: string = createBoundary()): MultipartBody {
  let failure: SourceFailure | undefined;
  return {
    contentType: `multipart/form-data; boundary=${boundary}`,
    body: encodeParts(boundary, upload.fieldName, upload.fileName, upload.stream, (recorded) => {
      failure = recorded;
    }),
    failure: () => failure,
  };
}
