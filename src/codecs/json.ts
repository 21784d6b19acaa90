import type { FormatOptions } from '../format.js'
import type { Codec } from './codec.js'

function indentOf(options?: FormatOptions): string | number | undefined {
  if (options?.indent === undefined) return undefined
  return options.indent === 'tab' ? '\t' : options.indent
}

export const jsonCodec: Codec = {
  encode(record: unknown, options?: FormatOptions): Buffer {
    const text: string | undefined = JSON.stringify(record, null, indentOf(options))
    // JSON.stringify answers undefined for values it has no representation for
    if (text === undefined) throw new TypeError(`value of type ${typeof record} has no JSON representation`)
    return Buffer.from(text, 'utf8')
  },

  decode(data: Buffer): unknown {
    const parsed: unknown = JSON.parse(data.toString('utf8'))
    return parsed
  },
}
