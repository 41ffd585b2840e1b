// Wire representation
export {
  listOf,
  mapOf,
  objectOf,
  WIRE_BOOL,
  WIRE_NUMBER,
  WIRE_STRING,
  type WireType,
  wireTypeEquals,
  wireTypeToString,
} from "./wire/wire_type.ts";
export {
  describeWireValue,
  isKnown,
  type KnownWireValue,
  objectAttributes,
  wireBool,
  wireList,
  wireMap,
  wireNull,
  wireNumber,
  wireObject,
  wireString,
  wireUnknown,
  type WireValue,
  wireValueEquals,
} from "./wire/wire_value.ts";

// Paths and diagnostics
export { Path, type PathStep } from "./path/path.ts";
export {
  type Diagnostic,
  diagnosticEquals,
  errorDiagnostic,
  formatDiagnostic,
  type Severity,
  warningDiagnostic,
  withPath,
} from "./diag/diagnostic.ts";
export { Diagnostics } from "./diag/diagnostics.ts";

// Attribute type system
export {
  BACKGROUND,
  cancellationReason,
  type ConversionContext,
} from "./attr/context.ts";
export {
  AttrType,
  hasAttributeTypes,
  hasElementType,
  hasValidate,
  type TypeWithAttributeTypes,
  type TypeWithElementType,
  type TypeWithValidate,
} from "./attr/type.ts";
export { type AttrValue, isAttrValue, type ValueState } from "./attr/value.ts";

// Built-in types
export { PrimitiveType, PrimitiveValue } from "./types/primitive/primitive_type.ts";
export {
  StringType,
  StringValue,
  stringNull,
  stringUnknown,
  stringValue,
} from "./types/primitive/string_type.ts";
export {
  NumberType,
  NumberValue,
  numberNull,
  numberUnknown,
  numberValue,
} from "./types/primitive/number_type.ts";
export {
  BoolType,
  BoolValue,
  boolNull,
  boolUnknown,
  boolValue,
} from "./types/primitive/bool_type.ts";
export {
  listNull,
  ListType,
  listUnknown,
  ListValue,
  listValue,
} from "./types/complex/list_type.ts";
export {
  mapNull,
  MapType,
  mapUnknown,
  MapValue,
  mapValue,
} from "./types/complex/map_type.ts";
export {
  objectNull,
  ObjectType,
  objectUnknown,
  ObjectValue,
  objectValue,
  objectValueFrom,
} from "./types/complex/object_type.ts";

// Reflection
export { t, type Target } from "./reflect/target.ts";
export {
  defineStruct,
  embed,
  type FieldTag,
  ignore,
  OPT_OUT_TAG,
  type StructShape,
  type StructShapeParams,
  tag,
} from "./reflect/struct_shape.ts";
export {
  type FieldDescriptor,
  type StructFieldMap,
  StructTagError,
  typeFields,
} from "./reflect/field_mapper.ts";
export { DEFAULT_MAX_DEPTH, type ReflectOptions } from "./reflect/options.ts";
export {
  type Converted,
  type FromDispatcher,
  type IntoDispatcher,
} from "./reflect/dispatcher.ts";
export { decodeStruct, encodeStruct } from "./reflect/struct.ts";
export { into, intoDispatcher, intoStruct } from "./reflect/into.ts";
export { fromDispatcher, fromStruct, fromValue } from "./reflect/from_value.ts";
export {
  CANCELLED_SUMMARY,
  CONVERSION_ERROR_SUMMARY,
  DEPTH_EXCEEDED_SUMMARY,
} from "./reflect/diags.ts";

// Logging
export {
  configureLogging,
  ConsoleTransport,
  type LogEntry,
  LogLevel,
  type LogTransport,
  type LoggerConfig,
  MemoryTransport,
  resetLoggingConfig,
} from "./internal/logging.ts";
