import type { TJsonKind, TJsonKindMap } from './types.js'
import { ArgumentError, JsonTypeError } from './errors.js'
import { type Re, type RegExpCache, compileRegExp, anchorPattern } from './re.js'
import { isInt, isString, isValidDate, jsonKind, safeToJson } from './utils.js'

/**
 * Правило преобразования присутствующего значения, отличного от `null`.
 *
 * Правило поднимает {@link ArgumentError} при нарушении ограничений и {@link JsonTypeError} для неподходящего вида
 * значения. Валидатор оборачивает эти ошибки в {@link JcvError} с путем к значению.
 */
interface IRule<T> {
  convert (value: unknown): T
}

const _reInt = /^[+-]?\d+$/
const _reFloat = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

type TIntRuleOptions = {
  /** Минимальное значение включительно. */
  min?: undefined | null | number
  /** Максимальное значение включительно. */
  max?: undefined | null | number
}

/**
 * Целое число.
 *
 * Дробные числа округляются вниз(`Math.floor`), строки разбираются как целое или как дробное с округлением вниз.
 */
class IntRule implements IRule<number> {
  readonly min: null | number
  readonly max: null | number

  constructor(options?: undefined | null | TIntRuleOptions) {
    this.min = options?.min ?? null
    this.max = options?.max ?? null
  }

  protected _fromNumber (value: number): number {
    if (isInt(value)) {
      return value
    }
    if (!Number.isFinite(value)) {
      throw new ArgumentError('Ожидалось конечное число.')
    }
    const int = Math.floor(value)
    if (!isInt(int)) {
      throw new ArgumentError('Число выходит за пределы допустимого диапазона.')
    }
    return int
  }

  protected _fromString (value: string): number {
    const str = value.trim()
    if (_reInt.test(str)) {
      const int = Number(str)
      if (!isInt(int)) {
        throw new ArgumentError('Число выходит за пределы допустимого диапазона.')
      }
      return int
    }
    if (_reFloat.test(str)) {
      return this._fromNumber(Number(str))
    }
    throw new ArgumentError('Не удалось разобрать целое число.')
  }

  protected _checkConstraints (value: number): number {
    if (this.min !== null && value < this.min) {
      throw new ArgumentError(`Значение должно быть не меньше ${this.min}.`)
    }
    if (this.max !== null && value > this.max) {
      throw new ArgumentError(`Значение должно быть не больше ${this.max}.`)
    }
    return value
  }

  convert (value: unknown): number {
    if (typeof value === 'number') {
      return this._checkConstraints(this._fromNumber(value))
    }
    if (isString(value)) {
      return this._checkConstraints(this._fromString(value))
    }
    throw new JsonTypeError('integer')
  }
}

/**
 * Преобразование регистра строки.
 */
type TStringCase = 'lower' | 'upper'

type TStrRuleOptions = {
  /** Минимальная длина включительно. */
  minLength?: undefined | null | number
  /** Максимальная длина включительно. */
  maxLength?: undefined | null | number
  /** Шаблон. Строка должна содержать совпадение(для полного совпадения используйте `^...$`). */
  pattern?: undefined | null | string | RegExp
  /** Удалить пробельные символы по краям до всех остальных проверок. */
  trim?: undefined | null | boolean
  /** Привести к регистру после `trim` и до остальных проверок. */
  caseType?: undefined | null | TStringCase
  /** Допустимые значения. Сравнение строгое после всех преобразований. */
  options?: undefined | null | readonly string[]
  /** Привести любое значение к строке. Структуры приводятся к Json. */
  coerce?: undefined | null | boolean
}

/**
 * Строка.
 *
 * Порядок проверок: `trim -> caseType -> minLength/maxLength -> pattern -> options`.
 */
class StrRule implements IRule<string> {
  readonly minLength: null | number
  readonly maxLength: null | number
  readonly pattern: null | Re
  readonly trim: boolean
  readonly caseType: null | TStringCase
  readonly options: null | ReadonlySet<string>
  readonly coerce: boolean

  /**
   * @param options Параметры строки.
   * @param cache   Кеш регулярных выражений для параметра `pattern`.
   */
  constructor(options: undefined | null | TStrRuleOptions, cache: RegExpCache) {
    this.minLength = options?.minLength ?? null
    this.maxLength = options?.maxLength ?? null
    const pattern = options?.pattern ?? null
    this.pattern = pattern === null
      ? null
      : isString(pattern) ? cache.getOf(pattern) : cache.getOf(pattern.source, pattern.flags)
    this.trim = options?.trim ?? false
    this.caseType = options?.caseType ?? null
    this.options = options?.options ? new Set(options.options) : null
    this.coerce = options?.coerce ?? false
  }

  protected _toString (value: unknown): string {
    if (isString(value)) {
      return value
    }
    if (!this.coerce) {
      throw new JsonTypeError('string')
    }
    switch (jsonKind(value)) {
      case 'array':
      case 'object':
        return safeToJson(value)
    }
    return String(value)
  }

  protected _checkConstraints (value: string): string {
    let str = this.trim ? value.trim() : value
    if (this.caseType === 'lower') {
      str = str.toLowerCase()
    }
    else if (this.caseType === 'upper') {
      str = str.toUpperCase()
    }
    if (this.minLength !== null && str.length < this.minLength) {
      throw new ArgumentError(`Длина строки должна быть не меньше ${this.minLength}.`)
    }
    if (this.maxLength !== null && str.length > this.maxLength) {
      throw new ArgumentError(`Длина строки должна быть не больше ${this.maxLength}.`)
    }
    if (this.pattern && !this.pattern.test(str)) {
      throw new ArgumentError(`Строка не соответствует шаблону /${this.pattern.re.source}/.`)
    }
    if (this.options && !this.options.has(str)) {
      throw new ArgumentError(`Строка должна быть одним из: ${[...this.options].join(', ')}.`)
    }
    return str
  }

  convert (value: unknown): string {
    return this._checkConstraints(this._toString(value))
  }
}

// YYYY[-]MM[-]DD[(T| )HH[[:]MM[[:]SS[(.|,)fraction]]][Z|±HH[[:]MM]]]
const _reIso8601 = /^([+-]?\d{4,6})-?(\d{2})-?(\d{2})(?:[Tt ](\d{2})(?::?(\d{2})(?::?(\d{2})(?:[.,](\d+))?)?)?\s*([zZ]|[+-]\d{2}(?::?\d{2})?)?)?$/

function _daysInMonth (year: number, month: number): number {
  const date = new Date(0)
  date.setUTCFullYear(year, month, 0)
  return date.getUTCDate()
}

/**
 * Разбирает строку ISO 8601 в расширенной(`2024-01-15T10:30`) или базовой(`20240115T1030`) форме. Минуты и секунды
 * можно опустить. Строка без смещения считается временем UTC.
 *
 * @returns Дата или `null`, если строка не соответствует формату или содержит недопустимые компоненты.
 */
function parseIso8601 (value: string): null | Date {
  const m = _reIso8601.exec(value)
  if (!m) {
    return null
  }
  const year = Number(m[1])
  const month = Number(m[2])
  const day = Number(m[3])
  const hour = Number(m[4] ?? 0)
  const minute = Number(m[5] ?? 0)
  const second = Number(m[6] ?? 0)
  const ms = Number((m[7] ?? '').padEnd(3, '0').slice(0, 3))
  if (month < 1 || month > 12 || day < 1 || day > _daysInMonth(year, month) || hour > 23 || minute > 59 || second > 59) {
    return null
  }
  let offset = 0
  const zone = m[8]
  if (zone && zone !== 'Z' && zone !== 'z') {
    const sign = zone.startsWith('-') ? -1 : 1
    const digits = zone.slice(1).replace(':', '')
    const offsetHours = Number(digits.slice(0, 2))
    const offsetMinutes = Number(digits.slice(2) || 0)
    if (offsetHours > 23 || offsetMinutes > 59) {
      return null
    }
    offset = sign * (offsetHours * 60 + offsetMinutes)
  }
  const date = new Date(0)
  date.setUTCFullYear(year, month - 1, day)
  date.setUTCHours(hour, minute - offset, second, ms)
  return isValidDate(date) ? date : null
}

type TDateTimeRuleOptions = {
  /** Минимальная дата включительно. */
  min?: undefined | null | Date
  /** Максимальная дата включительно. */
  max?: undefined | null | Date
  /** Разрешить строки ISO 8601. По умолчанию `true`. */
  allowIso8601?: undefined | null | boolean
  /** Разрешить метки времени в секундах(число или строка с числом). По умолчанию `true`. */
  allowTimestamp?: undefined | null | boolean
}

/**
 * Дата и время.
 *
 * Принимает `Date`, число секунд с начала эпохи или строку: сначала ISO 8601, затем число секунд.
 */
class DateTimeRule implements IRule<Date> {
  readonly min: null | Date
  readonly max: null | Date
  readonly allowIso8601: boolean
  readonly allowTimestamp: boolean

  constructor(options?: undefined | null | TDateTimeRuleOptions) {
    this.min = options?.min ?? null
    this.max = options?.max ?? null
    this.allowIso8601 = options?.allowIso8601 ?? true
    this.allowTimestamp = options?.allowTimestamp ?? true
  }

  protected _fromTimestamp (seconds: number): Date {
    if (!this.allowTimestamp) {
      throw new ArgumentError('Метки времени не допускаются для этого значения.')
    }
    // Секунды приводятся к микросекундам, Date хранит миллисекунды.
    const date = new Date(Math.trunc(seconds * 1_000_000) / 1000)
    if (!isValidDate(date)) {
      throw new ArgumentError('Метка времени выходит за пределы допустимого диапазона.')
    }
    return date
  }

  protected _fromString (value: string): Date {
    if (this.allowIso8601) {
      const date = parseIso8601(value)
      if (date) {
        return date
      }
    }
    const str = value.trim()
    if (!_reFloat.test(str)) {
      throw new ArgumentError('Не удалось разобрать дату.')
    }
    return this._fromTimestamp(Number(str))
  }

  protected _checkConstraints (date: Date): Date {
    if (this.min && date.getTime() < this.min.getTime()) {
      throw new ArgumentError(`Дата должна быть не раньше ${this.min.toISOString()}.`)
    }
    if (this.max && date.getTime() > this.max.getTime()) {
      throw new ArgumentError(`Дата должна быть не позже ${this.max.toISOString()}.`)
    }
    return date
  }

  convert (value: unknown): Date {
    if (value instanceof Date) {
      if (!isValidDate(value)) {
        throw new ArgumentError('Недопустимая дата.')
      }
      return this._checkConstraints(value)
    }
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new ArgumentError('Ожидалось конечное число.')
      }
      return this._checkConstraints(this._fromTimestamp(value))
    }
    if (isString(value)) {
      return this._checkConstraints(this._fromString(value))
    }
    throw new JsonTypeError('datetime')
  }
}

/**
 * Таблица перечисления: объект или `Map`.
 *
 * Целочисленные ключи объекта перечисляются раньше остальных в порядке возрастания. `Map` сохраняет порядок
 * объявления.
 */
type TEnumValues<T> = Readonly<Record<string, T>> | ReadonlyMap<string, T>

function isEnumMap<T> (values: TEnumValues<T>): values is ReadonlyMap<string, T> {
  return values instanceof Map
}

/**
 * Пары ключ-значение таблицы в порядке перечисления.
 */
function enumEntries<T> (values: TEnumValues<T>): [string, T][] {
  return isEnumMap(values) ? [...values.entries()] : Object.entries(values)
}

type TEnumRuleOptions = {
  /** Учитывать регистр. По умолчанию `false`. */
  caseSensitive?: undefined | null | boolean
}

/**
 * Перечисление: строка-ключ преобразуется в значение таблицы.
 */
class EnumRule<T> implements IRule<T> {
  protected readonly _values: ReadonlyMap<string, { readonly value: T }>
  readonly caseSensitive: boolean

  /**
   * @param values  Таблица ключ-значение. Порядок перечисления ключей сохраняется в сообщении об ошибке.
   * @param options Параметры.
   */
  constructor(values: TEnumValues<T>, options?: undefined | null | TEnumRuleOptions) {
    this.caseSensitive = options?.caseSensitive ?? false
    this._values = new Map(enumEntries(values).map(([key, value]) => [this.caseSensitive ? key : key.toLowerCase(), { value }]))
  }

  get keys (): string[] {
    return [...this._values.keys()]
  }

  convert (value: unknown): T {
    if (!isString(value)) {
      throw new JsonTypeError('string')
    }
    const key = this.caseSensitive ? value : value.toLowerCase()
    const found = this._values.get(key)
    if (!found) {
      throw new ArgumentError(`Значение должно быть одним из: ${this.keys.join(', ')}`)
    }
    return found.value
  }
}

type TPatternRuleOptions = {
  /** Привязать шаблон к началу и концу строки. По умолчанию `false`. */
  full?: undefined | null | boolean
  /** Флаг `m`. По умолчанию `false`. */
  multiLine?: undefined | null | boolean
  /** Учитывать регистр, без флага `i`. По умолчанию `true`. */
  caseSensitive?: undefined | null | boolean
  /** Флаг `u`. По умолчанию `false`. */
  unicode?: undefined | null | boolean
}

/**
 * Строка компилируется в регулярное выражение.
 */
class PatternRule implements IRule<RegExp> {
  readonly full: boolean
  readonly multiLine: boolean
  readonly caseSensitive: boolean
  readonly unicode: boolean

  constructor(options?: undefined | null | TPatternRuleOptions) {
    this.full = options?.full ?? false
    this.multiLine = options?.multiLine ?? false
    this.caseSensitive = options?.caseSensitive ?? true
    this.unicode = options?.unicode ?? false
  }

  get flags (): string {
    return `${this.caseSensitive ? '' : 'i'}${this.multiLine ? 'm' : ''}${this.unicode ? 'u' : ''}`
  }

  convert (value: unknown): RegExp {
    if (!isString(value)) {
      throw new JsonTypeError('string')
    }
    return compileRegExp(this.full ? anchorPattern(value) : value, this.flags)
  }
}

/**
 * Проверяет вид Json значения.
 */
function isJsonKind<K extends TJsonKind> (value: unknown, kind: K): value is TJsonKindMap[K] {
  return jsonKind(value) === kind
}

/**
 * Значение вида `kind` без преобразования.
 */
class PlainRule<K extends TJsonKind> implements IRule<TJsonKindMap[K]> {
  readonly kind: K

  constructor(kind: K) {
    this.kind = kind
  }

  convert (value: unknown): TJsonKindMap[K] {
    if (!isJsonKind(value, this.kind)) {
      throw new JsonTypeError(this.kind)
    }
    return value
  }
}

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
}
