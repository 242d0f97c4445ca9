import type { JcvError } from './errors.js'
import type { JsonPath } from './path.js'

/**
 * Вид значения декодированного Json.
 *
 * Значения не являющиеся Json(`undefined`, `Date`, `bigint`, экземпляры классов) получают вид `'unknown'`.
 */
type TJsonKind = 'null' | 'boolean' | 'number' | 'string' | 'array' | 'object'

/** Соответствие вида Json его типу. */
type TJsonKindMap = {
  null: null
  boolean: boolean
  number: number
  string: string
  array: unknown[]
  object: { [k: string]: unknown }
}

/** Специальный флаг(Symbol) отсутствующего значения, в отличие от присутствующего `null`. */
const EMPTY_VALUE = Symbol('Empty_Value')
/** Специальный флаг(Symbol) отсутствующего значения, в отличие от присутствующего `null`. */
type TEmptyValue = typeof EMPTY_VALUE

/** Символ корня документа в строковом представлении пути. */
const ROOT_MARKER = '$'

/** Неопределенное значение */
const UNKNOWN_VALUE = '<unknown_value>'
/** Неопределенное значение */
type TUnknownValue = typeof UNKNOWN_VALUE

/**
 * Сегмент пути:
 *
 * + `null`   - Корень документа.
 * + `number` - Индекс массива.
 * + `string` - Свойство объекта.
 */
type TPropertyName = null | number | string

/**
 * Результат валидации:
 *
 * + `ok`    - Утверждение наличия типа в `value` и успешной валидации.
 * + `value` - Результат валидации или `null` при ошибке.
 * + `error` - Всегда есть при `ok:false`. Единственная ошибка, прервавшая валидацию.
 */
type TResult<T> = { ok: true, value: T, error?: null } | { ok: false, value: null, error: JcvError }

/**
 * Функция преобразования значения.
 *
 * Получает присутствующее значение и путь {@link JsonPath} к нему. Функция может поднять одну из распознаваемых
 * ошибок (`ArgumentError`, `RangeError`, `SyntaxError`, `TypeError`, `JsonTypeError`), которые будут обернуты в
 * {@link JcvError} с текущим путем. Любые другие исключения не перехватываются.
 */
type TConverter<T> = ((value: unknown, path: JsonPath) => T)

/**
 * Запасное значение для отсутствующего свойства:
 *
 * + `none`    - Не задано.
 * + `value`   - Статическое значение, возвращается как есть.
 * + `builder` - Функция вызывается при каждом обращении к запасному значению.
 */
type TFallback<T> =
  { readonly kind: 'none' } |
  { readonly kind: 'value', readonly value: T } |
  { readonly kind: 'builder', readonly build: () => T }

/**
 * Параметры запасного значения для функций фабрики. Одновременная передача обоих параметров недопустима.
 */
type TFallbackOptions<T> =
  { fallback?: undefined | T, fallbackBuilder?: undefined | null } |
  { fallback?: undefined, fallbackBuilder: () => T }

/**
 * Параметры фабрики валидаторов.
 */
type TOptions = {
  /**
   * Поднимать исключение {@link JcvError} вместо возврата результата `{ok: false, error}`. По умолчанию `false`.
   *
   * Исключения не относящиеся к валидации поднимаются независимо от этой опции.
   */
  throwIfError?: undefined | null | boolean
  /**
   * Значение по умолчанию параметра `coerce` строковых валидаторов. По умолчанию `false`.
   */
  coerceStrings?: undefined | null | boolean
  /**
   * Значение по умолчанию параметра `trim` строковых валидаторов. По умолчанию `false`.
   */
  trimStrings?: undefined | null | boolean
  /**
   * Значение по умолчанию параметра `caseSensitive` для `enum()`. По умолчанию `false`.
   */
  enumCaseSensitive?: undefined | null | boolean
}

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
}
