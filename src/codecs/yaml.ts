import { parse, stringify } from 'yaml'
import type { Codec } from './codec.js'

export const yamlCodec: Codec = {
  encode(record: unknown): Buffer {
    return Buffer.from(stringify(record), 'utf8')
  },

  decode(data: Buffer): unknown {
    const parsed: unknown = parse(data.toString('utf8'))
    return parsed
  },
}
