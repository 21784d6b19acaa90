import * as fs from 'fs'
import * as path from 'path'
import Debug from 'debug'
import { Codec, CodecRegistry, isTable } from '../codecs/codec.js'
import { createDefaultCodecRegistry } from '../codecs/index.js'
import { DecodingError, EncodingError, FileNotFoundError, IoError, isSettingsError } from '../errors.js'
import { StoreDescriptor } from '../location/descriptor.js'
import { DirectoryProvider, PlatformDirectoryProvider } from '../location/directories.js'
import { resolveConfigPath } from '../location/resolver.js'
import { LogLevelEnum, Logger } from '../log.js'

const debug = Debug('configStore')
const log = new Logger('configStore')

/** What load returns when the caller gives no type guard. */
export type SettingsRecord = Record<string, unknown>

export type RecordGuard<T> = (value: unknown) => value is T

export interface ConfigStoreOptions {
  directories?: DirectoryProvider
  codecs?: CodecRegistry
}

export function isSettingsRecord(value: unknown): value is SettingsRecord {
  return isTable(value)
}

function errnoCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') return e.code
  return undefined
}

// The caller decides how to report the thrown error
function ioFailure(message: string, file: string, e: unknown): IoError {
  log.log(LogLevelEnum.verbose, message + ': ' + String(e))
  return new IoError(message, file, e)
}

/**
 * Saves, loads and deletes settings files. Holds no per-store state: every call resolves the
 * descriptor again, so one store instance serves any number of descriptors.
 */
export class ConfigStore {
  private directories: DirectoryProvider
  private codecs: CodecRegistry

  constructor(options?: ConfigStoreOptions) {
    this.directories = options?.directories ?? new PlatformDirectoryProvider()
    this.codecs = options?.codecs ?? createDefaultCodecRegistry()
  }

  path(descriptor: StoreDescriptor): string {
    return resolveConfigPath(descriptor, this.directories)
  }

  exists(descriptor: StoreDescriptor): boolean {
    return fs.existsSync(this.path(descriptor))
  }

  /**
   * Writes the record, replacing any earlier file. The parent directory is created first and is
   * left in place when encoding or writing fails afterwards.
   */
  save<T extends object>(record: T, descriptor: StoreDescriptor): void {
    const file = this.path(descriptor)
    const codec = this.codecs.get(descriptor.format.tag)
    const dir = path.dirname(file)
    if (!fs.existsSync(dir)) {
      try {
        fs.mkdirSync(dir, { recursive: true })
        debug('creating settings directory: ' + dir)
      } catch (e) {
        throw ioFailure('Unable to create directory ' + dir, dir, e)
      }
    }
    const data = this.encode(codec, record, descriptor)
    this.writeAtomic(file, data)
    debug('saved ' + file)
  }

  load(descriptor: StoreDescriptor): SettingsRecord
  load<T>(descriptor: StoreDescriptor, guard: RecordGuard<T>): T
  load<T>(descriptor: StoreDescriptor, guard?: RecordGuard<T>): T | SettingsRecord {
    const file = this.path(descriptor)
    const codec = this.codecs.get(descriptor.format.tag)
    let data: Buffer
    try {
      data = fs.readFileSync(file)
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') throw new FileNotFoundError(file, e)
      throw ioFailure('Unable to read ' + file, file, e)
    }

    let value: unknown
    try {
      value = codec.decode(data)
    } catch (e) {
      throw new DecodingError(descriptor.format.tag, file, e)
    }
    if (guard) {
      if (!guard(value)) throw new DecodingError(descriptor.format.tag, file, 'content does not match the expected record')
      return value
    }
    if (!isSettingsRecord(value)) throw new DecodingError(descriptor.format.tag, file, 'top-level value is not a record')
    return value
  }

  /**
   * Removes the settings file. Unless the directory was handed in by the caller (`dir` strategy),
   * its parent is removed as well when nothing else is left in it.
   */
  delete(descriptor: StoreDescriptor): void {
    const file = this.path(descriptor)
    try {
      fs.unlinkSync(file)
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') throw new FileNotFoundError(file, e)
      throw ioFailure('Unable to delete ' + file, file, e)
    }
    debug('deleted ' + file)
    if (descriptor.location.kind !== 'dir') this.removeDirIfEmpty(path.dirname(file))
  }

  // Best effort: a parent that still has entries or cannot be removed is expected and not an error
  private removeDirIfEmpty(dir: string): void {
    try {
      fs.rmdirSync(dir)
      debug('removed empty directory ' + dir)
    } catch (e) {
      debug('keeping directory ' + dir + ': ' + errnoCode(e))
    }
  }

  private encode(codec: Codec, record: unknown, descriptor: StoreDescriptor): Buffer {
    try {
      return codec.encode(record, descriptor.format.options)
    } catch (e) {
      if (isSettingsError(e)) throw e
      throw new EncodingError(descriptor.format.tag, e)
    }
  }

  // An existing target is resolved through symlinks and keeps its mode. The data goes to a sibling
  // of the resolved file which is then renamed over it, so readers never see a half written file.
  private writeAtomic(file: string, data: Buffer): void {
    let target = file
    let mode: number | undefined
    try {
      if (fs.existsSync(file)) {
        target = fs.realpathSync(file)
        mode = fs.statSync(target).mode & 0o7777
      }
    } catch (e) {
      throw ioFailure('Unable to inspect ' + file, file, e)
    }
    const tmp = target + '.' + process.pid + '.' + Math.random().toString(36).slice(2, 8) + '.tmp'
    try {
      fs.writeFileSync(tmp, data, mode === undefined ? undefined : { mode })
      // umask applies to the mode given at creation
      if (mode !== undefined) fs.chmodSync(tmp, mode)
      fs.renameSync(tmp, target)
    } catch (e) {
      this.removeTemp(tmp)
      throw ioFailure('Unable to write ' + file, file, e)
    }
  }

  private removeTemp(tmp: string): void {
    try {
      fs.rmSync(tmp, { force: true })
    } catch (e) {
      debug('leaving temporary file ' + tmp + ': ' + errnoCode(e))
    }
  }
}
