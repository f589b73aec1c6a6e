export {
  JsonReader,
  parse,
} from './reader.js';
export type { ArrayVisitor, ObjectVisitor } from './fold.js';
export {
  readerOptionsSchema,
  repeatedMemberPolicySchema,
  resolveReaderOptions,
  type ReaderOptions,
  type ReaderParams,
  type RepeatedMemberPolicy,
} from './options.js';
export {
  StringSink,
  StringStream,
  openFileStream,
  type CharStream,
  type LineOriented,
  type NamedStream,
  type PutbackStream,
  type TextSink,
} from './stream.js';
export {
  JsonCodecError,
  JsonConfigError,
  JsonEncodeError,
  JsonError,
  JsonFatalError,
  JsonParseError,
  JsonPointerError,
  JsonStreamError,
  describeError,
  isJsonReadError,
  type FoldResult,
  type JsonContext,
  type JsonErrorDesc,
  type JsonErrorKind,
  type JsonReadError,
  type ReadResult,
} from './errors.js';
export {
  consoleLogger,
  formatDiagnostic,
  reportError,
  type LogEntry,
  type Logger,
} from './diagnostics.js';
export {
  detResolve,
  escapeToken,
  formatPointer,
  parsePointer,
  resolve,
  unescapeToken,
  type PointerResult,
} from './pointer.js';
export {
  quoteString,
  stringify,
  writeComment,
  writeJson,
  type JsonComment,
  type OutputStyle,
  type WriterOptions,
} from './writer.js';
export * as codec from './codec.js';
export type { Codec, CodecFailure, CodecResult, FieldCodecs, FieldGetter } from './codec.js';
export * from './value.js';
