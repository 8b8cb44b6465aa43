export { BigEndianIntegerCoder } from "./adapters/coders/big-endian-integer-coder"
export { ByteArrayCoder } from "./adapters/coders/byte-array-coder"
export type { LengthPrefixedCoderOptions } from "./adapters/coders/coder-options"
export { ListCoder } from "./adapters/coders/list-coder"
export { NullableCoder } from "./adapters/coders/nullable-coder"
export { StringUtf8Coder } from "./adapters/coders/string-utf8-coder"
export { VarIntCoder } from "./adapters/coders/var-int-coder"
export { BufferSink } from "./adapters/memory/buffer-sink"
export { BufferSource } from "./adapters/memory/buffer-source"
export {
  DEFAULT_ENV_PREFIX,
  EnvSettingsSource,
  type EnvSettingsSourceOptions,
} from "./adapters/settings/env-settings-source"
export { ObjectSettingsSource } from "./adapters/settings/object-settings-source"
export { Coder } from "./core/coder"
export { clone, decodeFromBytes, encodeToBytes } from "./core/coder-utils"
export { CustomCoder } from "./core/custom-coder"
export { verifyComponentsDeterministic } from "./core/determinism"
export {
  type CoderEntry,
  DeterminismChecker,
  type DeterminismCheckerDeps,
  type DeterminismFailure,
  type DeterminismReport,
} from "./core/determinism-checker"
export {
  DecodingError,
  type DecodingErrorCode,
  EncodingError,
  type EncodingErrorCode,
  IOFailure,
  type IOFailureCode,
  NondeterminismError,
  type NondeterminismErrorOptions,
} from "./core/errors"
export { SelfDelimitingCoder } from "./core/self-delimiting-coder"
export { CoderSettings } from "./core/settings/coder-settings"
export { type CreateLoggerDeps, createLoggerFromSettings } from "./core/settings/create-logger"
export { type LoadCoderSettingsOptions, loadCoderSettings } from "./core/settings/load-settings"
export { type LogFormat, logFormats, type SettingsValues, settingsSchema } from "./core/settings/schema"
export { DEFAULT_MAX_LENGTH, readVarInt, writeVarInt } from "./core/varint"
export type { ByteSink } from "./ports/byte-sink"
export type { ByteSource } from "./ports/byte-source"
export { Context } from "./ports/context"
export type { SettingsSource } from "./ports/settings-source"
