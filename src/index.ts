export { ConfigStore, isSettingsRecord } from './store/configStore.js'
export type { ConfigStoreOptions, RecordGuard, SettingsRecord } from './store/configStore.js'
export { Location, createDescriptor } from './location/descriptor.js'
export type { LocationStrategy, StoreDescriptor } from './location/descriptor.js'
export { FixedDirectoryProvider, PlatformDirectoryProvider } from './location/directories.js'
export type { DirectoryProvider, PlatformEnvironment } from './location/directories.js'
export { resolveConfigPath } from './location/resolver.js'
export { Formats, defaultName } from './format.js'
export type { BuiltinFormats, Format, FormatOptions } from './format.js'
export {
  CodecRegistry,
  createDefaultCodecRegistry,
  iniCodec,
  jsonCodec,
  pickleCodec,
  tomlCodec,
  yamlCodec,
} from './codecs/index.js'
export type { Codec } from './codecs/index.js'
export {
  DecodingError,
  DirectoryUnavailableError,
  EncodingError,
  FileNotFoundError,
  IoError,
  SettingsError,
  UnsupportedFormatError,
  isSettingsError,
} from './errors.js'
export type { SettingsErrorCode, SettingsErrorOptions } from './errors.js'
export { LogLevelEnum, Logger } from './log.js'
