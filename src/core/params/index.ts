export {
  SOURCE_DEFAULT,
  SOURCE_HEADER,
  SOURCE_PATH,
  SOURCE_QUERY,
  type FieldDescriptor,
  type SourceKind,
  type TagPart,
  parseTag,
} from "./tag.js";
export {
  type ParamSource,
  type ResolvedParam,
  isDefaulted,
  parameterSource,
  reportingKey,
  requestSource,
  resolveParam,
} from "./resolver.js";
export {
  NIL_UUID,
  type CoercionFailure,
  type FieldKind,
  coerceParam,
  fieldKindOf,
  zeroValue,
} from "./coerce.js";
export {
  type ParamTags,
  type ParamsDefinition,
  type ParamsOf,
  defineParams,
  isParamsDefinition,
} from "./definition.js";
export {
  type BindFailure,
  type BoundParams,
  type FieldBinding,
  bindParams,
  deriveDescriptors,
} from "./bind.js";
