export {
  type TJsonKind,
  type TJsonKindMap,
  EMPTY_VALUE,
  type TEmptyValue,
  ROOT_MARKER,
  UNKNOWN_VALUE,
  type TUnknownValue,
  type TPropertyName,
  type TResult,
  type TConverter,
  type TFallback,
  type TFallbackOptions,
  type TOptions
} from './types.js'
export {
  type TConfig,
  Config
} from './config.js'
export {
  type IErrorDetail,
  type IErrorLike,
  type TErrorName,
  errorDetailToString,
  JcvError,
  WrongTypeError,
  RequiredPropertyError,
  FaultyValueError,
  ConfigureError,
  ArgumentError,
  JsonTypeError,
  type TForeignCategory,
  foreignErrorCategory,
  errorDetails,
  normalizeForeignError
} from './errors.js'
export {
  type TPathNode,
  propertyNameToString,
  JsonPath
} from './path.js'
export {
  Options
} from './options.js'
export {
  compileRegExp,
  Re,
  RegExpCache,
  anchorPattern
} from './re.js'
export {
  type IRule,
  type TIntRuleOptions,
  IntRule,
  type TStringCase,
  type TStrRuleOptions,
  StrRule,
  parseIso8601,
  type TDateTimeRuleOptions,
  DateTimeRule,
  type TEnumValues,
  isEnumMap,
  enumEntries,
  type TEnumRuleOptions,
  EnumRule,
  type TPatternRuleOptions,
  PatternRule,
  isJsonKind,
  PlainRule
} from './rules.js'
export {
  BaseValidator,
  Validator,
  OptionalValidator,
  type TValidatorOutput
} from './validator.js'
export {
  Field,
  type TFieldName,
  type TFieldValue
} from './field.js'
export {
  type TSchemaFields,
  type TSchemaData,
  type TSchemaConstructor,
  Schema,
  type TSchemaOutput
} from './schema.js'
export {
  Factory
} from './factory.js'
export {
  isUndefined,
  isBoolean,
  isNumber,
  isInt,
  isIntNonnegative,
  isString,
  isPlainObject,
  isArray,
  isFunction,
  isValidDate,
  hasOwn,
  jsonKind,
  valueTypeName,
  plainCopy,
  mergeBoolOrUIntProperties,
  safeToJson
} from './utils.js'
