import { describe, it, expect } from 'vitest'
import { CodecRegistry } from '../../src/codecs/codec.js'
import { createDefaultCodecRegistry, yamlCodec } from '../../src/codecs/index.js'
import { UnsupportedFormatError } from '../../src/errors.js'

describe('CodecRegistry', () => {
  it('default registry knows the five built-in formats', () => {
    expect(createDefaultCodecRegistry().tags()).toEqual(['json', 'yaml', 'toml', 'ini', 'pickle'])
  })

  it('fails for tags nobody registered', () => {
    const registry = createDefaultCodecRegistry()
    expect(registry.has('xml')).toBe(false)
    expect(() => registry.get('xml')).toThrow(UnsupportedFormatError)
    expect(() => registry.get('xml')).toThrow("no codec registered for format 'xml'. Available: json, yaml, toml, ini, pickle")
  })

  it('register adds or replaces a codec', () => {
    const registry = new CodecRegistry().register('yml', yamlCodec)
    expect(registry.get('yml')).toBe(yamlCodec)
    expect(registry.tags()).toEqual(['yml'])
  })
})
