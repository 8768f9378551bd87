/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Cut a buffer to at most `maxBytes` without splitting a UTF-8 sequence.
 */
export function truncateUtf8(buffer: Buffer, maxBytes: number): Buffer {
  if (buffer.length <= maxBytes) {
    return buffer;
  }
  let end = Math.max(0, maxBytes);
  // back off continuation bytes (10xxxxxx) to the start of the sequence
  while (end > 0 && (buffer[end] & 0xc0) === 0x80) {
    end--;
  }
  return buffer.subarray(0, end);
}

export function stripTrailingNewlines(text: string): string {
  return text.replace(/[\r\n]+$/, '');
}

export function splitLines(text: string): string[] {
  const trimmed = stripTrailingNewlines(text);
  return trimmed.length === 0 ? [] : trimmed.split(/\r?\n/);
}
