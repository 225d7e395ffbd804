export { RecordFormatter, FormatterConfigError, formatTimestamp, isStandardField } from "./formatter/record-formatter.js";
export { exceptionInfoFromError, renderException } from "./formatter/exception.js";
export { toJsonValue, stringifyJson, escapeNonAscii, CIRCULAR, TRUNCATED, MAX_DEPTH } from "./formatter/serialize.js";
export { UNSERIALIZABLE } from "./formatter/text.js";
export { STANDARD_FIELDS } from "./formatter/types.js";
export type {
  LogLevel,
  StandardField,
  ExceptionInfo,
  ExtraFields,
  LogRecord,
  FormatterOptions,
  JsonValue,
  JsonObject,
} from "./formatter/types.js";
export { loadFormatterConfig, loadFormatter, getDefaultConfigPath, mergeAndValidateConfig } from "./config/loader.js";
export type { FormatterConfig, LoadResult, RawConfig } from "./config/types.js";
export { Logger, ChildLogger } from "./utils/logger.js";
export type { LogContext, LogSink, LogCallOptions, LoggerOptions } from "./utils/logger.js";
export { parseCallSite, parseFrame, stackFrames, captureStack } from "./utils/call-site.js";
export type { CallSite } from "./utils/call-site.js";
