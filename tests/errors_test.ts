import { describe, it, expect } from 'vitest'
import {
  DecodingError,
  DirectoryUnavailableError,
  EncodingError,
  FileNotFoundError,
  IoError,
  SettingsError,
  isSettingsError,
} from '../src/errors.js'

describe('errors', () => {
  it('FileNotFoundError is an IoError with its own code', () => {
    const error = new FileNotFoundError('/cfg/app/config.json')
    expect(error).toBeInstanceOf(IoError)
    expect(error.code).toBe('FILE_NOT_FOUND')
    expect(error.path).toBe('/cfg/app/config.json')
    expect(error.message).toBe('settings file not found: /cfg/app/config.json')
  })

  it('keeps the underlying cause', () => {
    const cause = new TypeError('Do not know how to serialize a BigInt')
    const error = new EncodingError('json', cause)
    expect(error.cause).toBe(cause)
    expect(error.message).toBe('unable to encode settings as json: Do not know how to serialize a BigInt')
  })

  it('DecodingError accepts plain reasons', () => {
    const error = new DecodingError('yaml', '/cfg/config.yaml', 'top-level value is not a record')
    expect(error.cause).toBeUndefined()
    expect(error.toJSON()).toEqual({
      name: 'DecodingError',
      code: 'DECODING_FAILURE',
      message: 'unable to decode yaml settings from /cfg/config.yaml: top-level value is not a record',
      context: { format: 'yaml', path: '/cfg/config.yaml' },
    })
  })

  it('isSettingsError tells store errors from others', () => {
    expect(isSettingsError(new DirectoryUnavailableError('MyApp'))).toBe(true)
    expect(isSettingsError(new SettingsError('x', 'IO_FAILURE'))).toBe(true)
    expect(isSettingsError(new Error('x'))).toBe(false)
    expect(isSettingsError('x')).toBe(false)
  })
})
