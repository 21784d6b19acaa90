import { describe, it, expect } from 'vitest'
import { tomlCodec } from '../../src/codecs/toml.js'

describe('tomlCodec', () => {
  it('writes key = value lines', () => {
    const lines = tomlCodec.encode({ title: 'demo', port: 8080 }).toString('utf8').split('\n')
    expect(lines).toContain('title = "demo"')
    expect(lines).toContain('port = 8080')
  })

  it('decodes what it encoded', () => {
    const record = { title: 'demo', port: 8080, ratio: 0.5, enabled: true, owner: { name: 'tester' }, ids: [1, 2, 3] }
    expect(tomlCodec.decode(tomlCodec.encode(record))).toEqual(record)
  })

  it('only accepts a table at the top level', () => {
    expect(() => tomlCodec.encode([1, 2])).toThrow('TOML settings must be a table')
  })

  it('fails on malformed content', () => {
    expect(() => tomlCodec.decode(Buffer.from('title = ', 'utf8'))).toThrow()
  })
})
