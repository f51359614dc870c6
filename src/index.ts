export { default as DSMetaError, type DSMetaErrorCode } from './errors/DSMetaError.js'
export { default as Config, configSchema, type TConfig, type TConfigInput } from './Config.js'
export { default as Log, type TLogLevel, type TLogSink } from './misc/log.js'

export { default as EntryCodec, type TRecord, type TRecordKey, type TRecordType, type TRecordValue } from './L0/EntryCodec.js'
export { default as Plist, PlistReal, PlistUID, type TPlistDict, type TPlistValue } from './L0/Plist.js'
export { default as BuddyAllocator } from './L1/BuddyAllocator.js'
export { default as BTreeStore, type TChangeSet, type TRecordSource, type TSuperblock, type TWriteOptions } from './L1/BTreeStore.js'

export * from './L2/DirectoryMetadata.js'
export * from './L2/Coordinates.js'
export { Code, sortKeyForColumn, viewStyleFromCode, viewStyleToCode, type TSortKey } from './L2/Codes.js'
export { default as resolveAlias, type TAliasOptions } from './L2/AliasResolver.js'
export { default as SemanticDecoder, type TDecoderOptions } from './L2/SemanticDecoder.js'
export { default as SemanticEncoder, type TEncoderOptions } from './L2/SemanticEncoder.js'
export { default as MetadataLoader, describeMetadata, labelColorIndex, labelColorName } from './L2/MetadataLoader.js'
