/**
 * Raw query text addressed by UTF-8 byte offsets.
 *
 * The combinator library reports positions in bytes, so CST spans are byte
 * offsets and every slice of the original text goes through this class.
 */

import type { Span } from '../types/index.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export class SourceText {
  readonly text: string;
  private readonly bytes: Uint8Array;

  constructor(text: string) {
    this.text = text;
    this.bytes = encoder.encode(text);
  }

  get byteLength(): number {
    return this.bytes.length;
  }

  slice(span: Span): string {
    return decoder.decode(this.bytes.subarray(span.start, span.end));
  }

  sliceFrom(offset: number): string {
    return decoder.decode(this.bytes.subarray(offset));
  }
}
