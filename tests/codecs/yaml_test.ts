import { describe, it, expect } from 'vitest'
import { yamlCodec } from '../../src/codecs/yaml.js'

describe('yamlCodec', () => {
  it('writes block style YAML', () => {
    const text = yamlCodec.encode({ name: 'demo', size: 3, tags: ['a', 'b'] }).toString('utf8')
    expect(text).toBe('name: demo\nsize: 3\ntags:\n  - a\n  - b\n')
  })

  it('decodes nested maps and sequences', () => {
    const record = {
      theme: 'dark',
      window: { width: 1024, height: 768, maximized: true },
      recent: ['/tmp/a.txt', '/tmp/b.txt'],
      ratios: [0.25, 0.75],
    }
    expect(yamlCodec.decode(yamlCodec.encode(record))).toEqual(record)
  })

  it('fails on malformed content', () => {
    expect(() => yamlCodec.decode(Buffer.from('a: [1, 2', 'utf8'))).toThrow()
  })
})
