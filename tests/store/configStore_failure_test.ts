import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import * as fs from 'fs'
import { dirname } from 'path'
import { IoError } from '../../src/errors.js'
import { Formats } from '../../src/format.js'
import { Location, createDescriptor } from '../../src/location/descriptor.js'
import { FixedDirectoryProvider } from '../../src/location/directories.js'
import { LogLevelEnum, Logger } from '../../src/log.js'
import { ConfigStore } from '../../src/store/configStore.js'
import { TempDirHelper } from '../testhelper.js'

vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>()
  return {
    ...actual,
    rmdirSync: vi.fn(actual.rmdirSync),
    renameSync: vi.fn(actual.renameSync),
    rmSync: vi.fn(actual.rmSync),
  }
})

const APP_NAME = 'prefstore_failure'

function errnoError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code })
}

let temp: TempDirHelper
let configRoot: string
let store: ConfigStore

beforeEach(() => {
  temp = new TempDirHelper('failure')
  temp.setup()
  configRoot = temp.path('config-root')
  store = new ConfigStore({ directories: new FixedDirectoryProvider(configRoot) })
})

afterEach(() => {
  vi.clearAllMocks()
  temp.cleanup()
})

describe('delete', () => {
  it.each([
    { name: 'auto', location: () => Location.auto() },
    { name: 'file', location: () => Location.file('settings.json') },
    { name: 'path', location: () => Location.path(temp.path('explicit', 'settings.json')) },
  ])('ignores a denied directory removal with $name location', ({ location }) => {
    const descriptor = createDescriptor(APP_NAME, location(), Formats.json)
    store.save({ a: 1 }, descriptor)
    vi.mocked(fs.rmdirSync).mockImplementationOnce(() => {
      throw errnoError('denied', 'EACCES')
    })

    expect(() => store.delete(descriptor)).not.toThrow()
    expect(store.exists(descriptor)).toBe(false)
    expect(fs.rmdirSync).toHaveBeenCalledTimes(1)
    expect(fs.rmdirSync).toHaveBeenCalledWith(dirname(store.path(descriptor)))
    expect(fs.existsSync(dirname(store.path(descriptor)))).toBe(true)
  })
})

describe('save', () => {
  it('reports IoError even when the temporary file cannot be removed', () => {
    const logSpy = vi.spyOn(Logger.prototype, 'log')
    const descriptor = createDescriptor(APP_NAME)
    const file = store.path(descriptor)
    vi.mocked(fs.renameSync).mockImplementationOnce(() => {
      throw errnoError('rename denied', 'EACCES')
    })
    vi.mocked(fs.rmSync).mockImplementationOnce(() => {
      throw errnoError('remove denied', 'EROFS')
    })

    let caught: unknown
    try {
      store.save({ a: 1 }, descriptor)
    } catch (e) {
      caught = e
    }
    expect(caught).toBeInstanceOf(IoError)
    expect(caught).toMatchObject({ code: 'IO_FAILURE', path: file })
    expect(logSpy).toHaveBeenCalledWith(LogLevelEnum.verbose, 'Unable to write ' + file + ': Error: rename denied')
    logSpy.mockRestore()
  })
})
