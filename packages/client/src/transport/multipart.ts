/**
 * Streaming multipart/form-data body
 *
 * Plain fields come first, then the file part. The file part is produced
 * chunk by chunk from the caller's iterable, so the consumer pulling the next
 * chunk means the previous one was handed on.
 */

import { randomUUID } from 'node:crypto';

export interface MultipartFile {
  fieldName: string;
  fileName: string;
  contentType: string;
  content: AsyncIterable<Uint8Array>;
}

export function createBoundary(): string {
  return `----fireside-${randomUUID().replace(/-/g, '')}`;
}

function escapeQuoted(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/[\r\n]/g, ' ');
}

export function multipartContentType(boundary: string): string {
  return `multipart/form-data; boundary=${boundary}`;
}

export function fieldPart(boundary: string, name: string, value: string): Uint8Array {
  return Buffer.from(
    `--${boundary}\r\n` + `Content-Disposition: form-data; name="${escapeQuoted(name)}"\r\n\r\n` + `${value}\r\n`,
    'utf8'
  );
}

/**
 * Bytes before the file content
 */
export function partHeader(boundary: string, file: Omit<MultipartFile, 'content'>): Uint8Array {
  return Buffer.from(
    `--${boundary}\r\n` +
      `Content-Disposition: form-data; name="${escapeQuoted(file.fieldName)}"; filename="${escapeQuoted(file.fileName)}"\r\n` +
      `Content-Type: ${file.contentType}\r\n\r\n`,
    'utf8'
  );
}

export function closingDelimiter(boundary: string): Uint8Array {
  return Buffer.from(`\r\n--${boundary}--\r\n`, 'utf8');
}

export async function* multipartBody(
  boundary: string,
  file: MultipartFile,
  fields: Readonly<Record<string, string>> = {}
): AsyncGenerator<Uint8Array, void, undefined> {
  for (const [name, value] of Object.entries(fields)) {
    yield fieldPart(boundary, name, value);
  }
  yield partHeader(boundary, file);
  for await (const chunk of file.content) {
    yield chunk;
  }
  yield closingDelimiter(boundary);
}
