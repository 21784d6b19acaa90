import ini from 'ini'
import { isTable } from './codec.js'
import type { Codec } from './codec.js'

// INI only knows sections of key=value pairs
export const iniCodec: Codec = {
  encode(record: unknown): Buffer {
    if (!isTable(record)) throw new TypeError('INI settings must be an object of keys and sections')
    return Buffer.from(ini.stringify(record), 'utf8')
  },

  decode(data: Buffer): unknown {
    return ini.parse(data.toString('utf8'))
  },
}
