import Debug from 'debug'
import { UnsupportedFormatError } from '../errors.js'
import type { FormatOptions } from '../format.js'

const debug = Debug('codecRegistry')

/**
 * Converts settings records to file content and back. Implementations throw on failure;
 * the store turns those throws into EncodingError / DecodingError.
 */
export interface Codec {
  encode(record: unknown, options?: FormatOptions): Buffer
  decode(data: Buffer): unknown
}

/** Table-like formats (TOML, INI) can only hold an object at the top level. */
export function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Maps a format tag to the codec that implements it. */
export class CodecRegistry {
  private codecs = new Map<string, Codec>()

  register(tag: string, codec: Codec): this {
    if (this.codecs.has(tag)) debug('replacing codec for ' + tag)
    this.codecs.set(tag, codec)
    return this
  }

  get(tag: string): Codec {
    const codec = this.codecs.get(tag)
    if (!codec) throw new UnsupportedFormatError(tag, this.tags())
    return codec
  }

  has(tag: string): boolean {
    return this.codecs.has(tag)
  }

  tags(): string[] {
    return Array.from(this.codecs.keys())
  }
}
