import { CodecRegistry } from './codec.js'
import { iniCodec } from './ini.js'
import { jsonCodec } from './json.js'
import { pickleCodec } from './pickle.js'
import { tomlCodec } from './toml.js'
import { yamlCodec } from './yaml.js'

export { CodecRegistry } from './codec.js'
export type { Codec } from './codec.js'
export { iniCodec, jsonCodec, pickleCodec, tomlCodec, yamlCodec }

/** Registry with json, yaml, toml, ini and pickle. */
export function createDefaultCodecRegistry(): CodecRegistry {
  return new CodecRegistry()
    .register('json', jsonCodec)
    .register('yaml', yamlCodec)
    .register('toml', tomlCodec)
    .register('ini', iniCodec)
    .register('pickle', pickleCodec)
}
