import { parse, stringify } from 'smol-toml'
import { isTable } from './codec.js'
import type { Codec } from './codec.js'

export const tomlCodec: Codec = {
  encode(record: unknown): Buffer {
    if (!isTable(record)) throw new TypeError('TOML settings must be a table')
    return Buffer.from(stringify(record), 'utf8')
  },

  decode(data: Buffer): unknown {
    return parse(data.toString('utf8'))
  },
}
