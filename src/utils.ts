import {
  type TJsonKind,
  UNKNOWN_VALUE,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  type TUnknownValue
} from './types.js'

const _hasOwn = ('hasOwn' in Object && typeof Object.hasOwn === 'function')
  ? Object.hasOwn
  : (obj: object, key: string | number | symbol) => Object.prototype.hasOwnProperty.call(obj, key)

/**
 * Значение `undefined`.
 */
function isUndefined (value: unknown): value is undefined {
  return typeof value === 'undefined'
}

/**
 * Значение `boolean`.
 */
function isBoolean (value: unknown): value is boolean {
  return typeof value === 'boolean'
}

/**
 * Является ли аргумент `value` числом исключая `NaN` и `Infinity`. Псевдоним `Number.isFinite()`.
 */
function isNumber (value: unknown): value is number {
  return Number.isFinite(value)
}

/**
 * Является ли аргумент `value` целым числом. Псевдоним `Number.isSafeInteger()`.
 */
function isInt (value: unknown): value is number {
  return Number.isSafeInteger(value)
}

/**
 * Является ли аргумент `value` целым неотрицательным числом. Псевдоним `Number.isSafeInteger()` с проверкой `>= 0`.
 */
function isIntNonnegative (value: unknown): value is number {
  return isInt(value) && value >= 0
}

/**
 * Является ли аргумент `value` строкой.
 */
function isString (value: unknown): value is string {
  return typeof value === 'string'
}

/**
 * Является ли значение `value` структуроподобным объектом `{...}` исключая массивы `[]`.
 *
 * В отличие от простой проверки `typeof`, экземпляры классов(`Date`, `RegExp`, `Map`) не считаются Plain-объектами.
 */
function isPlainObject (value: unknown): value is { [k: string]: unknown } {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === null || proto === Object.prototype
}

/**
 * Является ли значение `value` массивом. Псевдоним `Array.isArray()`.
 */
function isArray (value: unknown): value is unknown[] {
  return Array.isArray(value)
}

/**
 * Является ли значение `value` функцией.
 */
function isFunction (value: unknown): value is ((..._: unknown[]) => unknown) {
  return typeof value === 'function'
}

/**
 * Является ли значение `value` корректной датой.
 */
function isValidDate (value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime())
}

/**
 * Наличие собственного `enumerable` свойства объекта.
 *
 * @param obj Целевой объект.
 * @param key Искомое имя свойства.
 */
function hasOwn (obj: object, key: string | number | symbol): boolean {
  return _hasOwn(obj, key)
}

/**
 * Вид значения декодированного Json или `'unknown'` для значений вне Json.
 *
 * Числа `NaN` и `Infinity` не являются Json, но получают вид `'number'` - проверка конечности остается за валидатором.
 */
function jsonKind (value: unknown): TJsonKind | 'unknown' {
  if (value === null) {
    return 'null'
  }
  switch (typeof value) {
    case 'boolean': return 'boolean'
    case 'number': return 'number'
    case 'string': return 'string'
    case 'object': return isArray(value) ? 'array' : isPlainObject(value) ? 'object' : 'unknown'
    default: return 'unknown'
  }
}

/**
 * Имя типа значения для сообщений об ошибках: вид Json, имя конструктора или результат `typeof`.
 */
function valueTypeName (value: unknown): string {
  const kind = jsonKind(value)
  if (kind !== 'unknown') {
    return kind
  }
  if (value !== null && typeof value === 'object') {
    const name: unknown = value.constructor?.name
    if (isString(name) && name.length > 0) {
      return name
    }
  }
  return typeof value
}

/**
 * Глубокая копия собственных перечислимых свойств.
 */
function plainCopy<T> (value: T): T
function plainCopy (value: unknown): unknown {
  const cache = new WeakMap<object, unknown>()
  const recursive = (val: unknown): unknown => {
    if (val === null || typeof val !== 'object') {
      return val
    }
    const cached = cache.get(val)
    if (cached) {
      return cached
    }
    if (isArray(val)) {
      const target: unknown[] = []
      cache.set(val, target)
      for (const item of val) {
        target.push(recursive(item))
      }
      return target
    }
    const target: { [k: string]: unknown } = {}
    cache.set(val, target)
    for (const [key, v] of Object.entries(val)) {
      target[key] = recursive(v)
    }
    return target
  }
  return recursive(value)
}

/**
 * Сливает только `boolean` и `number(UInt) >= 0` свойства, которые есть у обоих объектов.
 *
 * @param target Целевой объект на который копируются свойства.
 * @param source Источник.
 */
function mergeBoolOrUIntProperties<T extends Record<string, boolean | number>> (target: T, source: { [_ in keyof T]?: undefined | null | boolean | number }): T {
  for (const [key, value] of Object.entries(source)) {
    if (hasOwn(target, key) && (isBoolean(value) || isIntNonnegative(value))) {
      Object.assign(target, { [key]: value })
    }
  }
  return target
}

/**
 * Пытается привести `value` к Json или возвращает специальное значение {@link TUnknownValue}.
 * Эта функция используется для регистрации ошибок.
 */
function safeToJson (value: unknown): string {
  try {
    const json: unknown = JSON.stringify(value)
    return isString(json) ? json : String(value)
  } catch (_) {
    return UNKNOWN_VALUE
  }
}

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
}
