// src/index.ts
/**
 * Public surface of the request binder.
 */

export {
  Binder,
  type AfterBind,
  type BindOptions,
  type BinderConfig,
  type PooledBind,
} from "./binder/Binder";
export {
  defaultDecoders,
  defaultSources,
  defaultTransforms,
} from "./binder/defaults";

export { StructureCache, type FieldDescriptor } from "./cache/StructureCache";

export {
  coerce,
  convert,
  propertyHandle,
  type FieldHandle,
} from "./coerce/coerce";
export { CoercionError, type CoercionReason } from "./coerce/CoercionError";

export { field } from "./dsl/field";
export { describeType, isZero, zeroValue } from "./dsl/values";
export { UploadedFile, type UploadedFileInit } from "./dsl/upload";
export type { RecordType } from "./dsl/record";
export type {
  FieldSpec,
  FieldsShape,
  FieldTags,
  ScalarKind,
  ValueType,
} from "./dsl/types";

export {
  BindError,
  DecodeError,
  DefaultValueError,
  FieldCoercionError,
  HookError,
  NilArgumentError,
  TransformError,
  UnsupportedDestinationError,
  isBindError,
  type BindErrorKind,
} from "./errors/BindError";

export type { BindRequest } from "./request/BindRequest";
export { fromExpress } from "./request/fromExpress";

export type {
  Extraction,
  ExtractionSource,
} from "./sources/ExtractionSource";
export { found, NO_VALUE } from "./sources/ExtractionSource";
export { QuerySource, type QuerySourceOptions } from "./sources/query.source";
export { HeaderSource } from "./sources/header.source";
export { CookieSource, CookieValue } from "./sources/cookie.source";
export { PathSource, type PathLookup } from "./sources/path.source";

export type { BodyDecoder, DecodeTarget } from "./decoders/BodyDecoder";
export { JsonDecoder } from "./decoders/json.decoder";
export { FormDecoder } from "./decoders/form.decoder";
export {
  ALL_FILES,
  MultipartDecoder,
  type MultipartDecoderOptions,
} from "./decoders/multipart.decoder";

export type { Transform } from "./transforms/Transform";
export {
  StringTransform,
  type StringOperation,
} from "./transforms/string.transform";
export { NumericTransform } from "./transforms/numeric.transform";
export { ListTransform } from "./transforms/list.transform";
export { TimeTransform } from "./transforms/time.transform";

export { ExtractionMemo, MemoPool } from "./pool/ExtractionMemo";
export { RecordPool, type Resettable } from "./pool/RecordPool";

export {
  binderConfigFrom,
  loadBinderSettings,
  loadBinderSettingsFromFiles,
  type BinderSettings,
} from "./config/binderSettings";
export { loadEnvFilesOrThrow, type EnvFileOptions } from "./config/env";

export {
  bindList,
  bindRecord,
  boundList,
  boundRecord,
  preservedBody,
} from "./express/bindMiddleware";
export { bindProblem, type BindProblemJson } from "./express/problem";
