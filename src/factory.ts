import type {
  TJsonKind,
  TJsonKindMap,
  TConverter,
  TFallbackOptions,
  TOptions
} from './types.js'
import { Config } from './config.js'
import type { JsonPath } from './path.js'
import { Options } from './options.js'
import { RegExpCache } from './re.js'
import { errorDetails, ConfigureError, ArgumentError, JsonTypeError } from './errors.js'
import {
  type IRule,
  type TIntRuleOptions,
  type TStrRuleOptions,
  type TDateTimeRuleOptions,
  type TEnumValues,
  type TEnumRuleOptions,
  type TPatternRuleOptions,
  isEnumMap,
  enumEntries,
  IntRule,
  StrRule,
  DateTimeRule,
  EnumRule,
  PatternRule,
  PlainRule
} from './rules.js'
import { type BaseValidator, Validator } from './validator.js'
import { Field } from './field.js'
import {
  type TSchemaFields,
  type TSchemaData,
  type TSchemaConstructor,
  Schema
} from './schema.js'
import {
  isArray,
  isFunction,
  isIntNonnegative,
  isNumber,
  isPlainObject,
  isString,
  isValidDate,
  jsonKind,
  safeToJson
} from './utils.js'

/**
 * Фабрика валидаторов, полей и схем.
 *
 * Все созданные объекты разделяют одну конфигурацию {@link Config}. Недопустимые параметры поднимают
 * {@link ConfigureError} сразу при создании.
 *
 * ```ts
 * const v = new Factory()
 * const userSchema = v.schema([
 *   v.field('name', v.str({ minLength: 1 }), ['fullName']),
 *   v.field('age', v.int({ min: 18 })),
 *   v.field('tags', v.str().list([]))
 * ], (data) => new User(data.name, data.age, data.tags))
 *
 * const result = userSchema.validate(JSON.parse(text))
 * ```
 */
class Factory {
  protected readonly _config: Config
  protected readonly _regExpCache = new RegExpCache()

  constructor(options?: undefined | null | TOptions) {
    this._config = new Config(options)
  }

  get config (): Config {
    return this._config
  }

  protected _configureError (message: string): never {
    throw new ConfigureError(errorDetails.ConfigureError(message))
  }

  protected _options<T> (options: undefined | null | TFallbackOptions<T>): Options<T> {
    return Options.from(options)
  }

  protected _validator<T> (rule: IRule<T>, options: undefined | null | TFallbackOptions<T>): Validator<T> {
    return new Validator<T>(this._config, (value: unknown) => rule.convert(value), this._options(options))
  }

  protected _checkRange (name: string, min: unknown, max: unknown): void {
    if ((min !== undefined && min !== null && !isNumber(min)) || (max !== undefined && max !== null && !isNumber(max))) {
      this._configureError(`Некорректные аргументы '${name}(min: ${safeToJson(min)}, max: ${safeToJson(max)})'.`)
    }
    if (isNumber(min) && isNumber(max) && max < min) {
      this._configureError(`Некорректные аргументы '${name}(min: ${min}, max: ${max})': min больше max.`)
    }
  }

  /**
   * Любое присутствующее значение кроме `null` без преобразования.
   */
  plain (): Validator<unknown>
  /**
   * Значение вида Json `kind` без преобразования.
   *
   * @param kind    Ожидаемый вид значения.
   * @param options Запасное значение.
   */
  plain<K extends TJsonKind> (kind: K, options?: undefined | null | TFallbackOptions<TJsonKindMap[K]>): Validator<TJsonKindMap[K]>
  plain (kind?: undefined | null | TJsonKind, options?: undefined | null | TFallbackOptions<unknown>): Validator<unknown> {
    if (kind === undefined || kind === null) {
      return new Validator<unknown>(this._config, (value: unknown) => value, this._options(options))
    }
    return this._validator<unknown>(new PlainRule(kind), options)
  }

  /**
   * Булево значение. Псевдоним `plain('boolean')`.
   */
  bool (options?: undefined | null | TFallbackOptions<boolean>): Validator<boolean> {
    return this._validator(new PlainRule('boolean'), options)
  }

  /**
   * Целое число. Дробные числа и строки с числами округляются вниз.
   */
  int (options?: undefined | null | (TIntRuleOptions & TFallbackOptions<number>)): Validator<number> {
    this._checkRange('int', options?.min, options?.max)
    return this._validator(new IntRule(options), options)
  }

  /**
   * Строка.
   *
   * Параметры `trim` и `coerce` по умолчанию берутся из конфигурации {@link Config.trimStrings} и
   * {@link Config.coerceStrings}.
   */
  str (options?: undefined | null | (TStrRuleOptions & TFallbackOptions<string>)): Validator<string> {
    const minLength = options?.minLength
    const maxLength = options?.maxLength
    for (const [name, value] of [['minLength', minLength], ['maxLength', maxLength]] as const) {
      if (value !== undefined && value !== null && !isIntNonnegative(value)) {
        this._configureError(`Параметр '${name}' должен быть целым неотрицательным числом, получено ${safeToJson(value)}.`)
      }
    }
    this._checkRange('str', minLength, maxLength)
    if (options?.options && !isArray(options.options)) {
      this._configureError('Параметр \'options\' должен быть массивом строк.')
    }
    let rule: StrRule
    try {
      rule = new StrRule({
        ...options,
        trim: options?.trim ?? this._config.trimStrings,
        coerce: options?.coerce ?? this._config.coerceStrings
      }, this._regExpCache)
    } catch (e) {
      if (e instanceof ArgumentError) {
        this._configureError(e.message)
      }
      throw e
    }
    return this._validator(rule, options)
  }

  /**
   * Дата и время: `Date`, строка ISO 8601 или число секунд с начала эпохи.
   */
  datetime (options?: undefined | null | (TDateTimeRuleOptions & TFallbackOptions<Date>)): Validator<Date> {
    const min = options?.min ?? null
    const max = options?.max ?? null
    if ((min !== null && !isValidDate(min)) || (max !== null && !isValidDate(max))) {
      this._configureError('Параметры \'min\' и \'max\' должны быть корректными датами.')
    }
    if (min && max && max.getTime() < min.getTime()) {
      this._configureError(`Некорректные аргументы 'datetime(min: ${min.toISOString()}, max: ${max.toISOString()})': min больше max.`)
    }
    return this._validator(new DateTimeRule(options), options)
  }

  /**
   * Перечисление: строка-ключ преобразуется в значение таблицы `values`.
   *
   * Параметр `caseSensitive` по умолчанию берется из {@link Config.enumCaseSensitive}.
   *
   * @param values Таблица ключ-значение. Для сохранения порядка целочисленных ключей используйте `Map`.
   */
  enum<T> (values: TEnumValues<T>, options?: undefined | null | (TEnumRuleOptions & TFallbackOptions<T>)): Validator<T> {
    if (!isEnumMap(values) && !isPlainObject(values)) {
      this._configureError('Перечисление должно быть объектом или Map.')
    }
    const entries = enumEntries<T>(values)
    if (entries.length === 0) {
      this._configureError('Перечисление должно содержать хотя бы одно значение.')
    }
    const caseSensitive = options?.caseSensitive ?? this._config.enumCaseSensitive
    if (!caseSensitive) {
      const keys = new Set<string>()
      for (const [key] of entries) {
        const lower = key.toLowerCase()
        if (keys.has(lower)) {
          this._configureError(`Ключи перечисления без учета регистра совпадают: '${key}'.`)
        }
        keys.add(lower)
      }
    }
    return this._validator(new EnumRule<T>(values, { caseSensitive }), options)
  }

  /**
   * Строка компилируется в `RegExp`.
   */
  pattern (options?: undefined | null | (TPatternRuleOptions & TFallbackOptions<RegExp>)): Validator<RegExp> {
    return this._validator(new PatternRule(options), options)
  }

  /**
   * Пользовательская функция преобразования присутствующего значения кроме `null`.
   *
   * Функция может поднять `ArgumentError`, `RangeError`, `SyntaxError` или `TypeError`(ошибка значения) и
   * {@link JsonTypeError}(неподходящий вид значения).
   */
  custom<T> (convert: TConverter<T>, options?: undefined | null | TFallbackOptions<T>): Validator<T>
  /**
   * Пользовательская функция преобразования значения вида `input`. Значения другого вида отклоняются с
   * `WrongTypeError` до вызова функции.
   */
  custom<K extends TJsonKind, T> (convert: (value: TJsonKindMap[K], path: JsonPath) => T, options: { input: K } & TFallbackOptions<T>): Validator<T>
  custom<T> (convert: TConverter<T>, options?: undefined | null | ({ input?: undefined | null | TJsonKind } & TFallbackOptions<T>)): Validator<T> {
    if (!isFunction(convert)) {
      this._configureError('Функция преобразования должна быть функцией.')
    }
    const input = options?.input ?? null
    const fallback = this._options(options)
    if (input === null) {
      return new Validator<T>(this._config, convert, fallback)
    }
    return new Validator<T>(this._config, (value: unknown, path: JsonPath) => {
      if (jsonKind(value) !== input) {
        throw new JsonTypeError(input)
      }
      return convert(value, path)
    }, fallback)
  }

  /**
   * Вложенный объект. Псевдоним {@link Schema.validator()}.
   */
  nested<T, F extends TSchemaFields> (schema: Schema<T, F>): Validator<T> {
    return schema.validator()
  }

  /**
   * Поле схемы.
   *
   * @param name      Основное имя свойства.
   * @param validator Валидатор значения.
   * @param aliases   Альтернативные имена свойства в порядке поиска.
   */
  field<N extends string, T> (name: N, validator: BaseValidator<T>, aliases?: undefined | null | readonly string[]): Field<N, T> {
    if (!isString(name)) {
      this._configureError(`Имя поля должно быть строкой, получено ${safeToJson(name)}.`)
    }
    if (aliases && (!isArray(aliases) || !aliases.every((alias) => isString(alias)))) {
      this._configureError(`Псевдонимы поля '${name}' должны быть массивом строк.`)
    }
    return new Field<N, T>(name, validator, aliases)
  }

  /**
   * Схема, результатом которой является объект с результатами всех полей.
   *
   * @param fields Поля схемы в порядке разрешения.
   */
  schema<F extends TSchemaFields> (fields: F): Schema<TSchemaData<F>, F>
  /**
   * Схема с конструктором итогового значения.
   *
   * @param fields    Поля схемы в порядке разрешения.
   * @param construct Конструктор получает объект с результатами всех полей.
   */
  schema<F extends TSchemaFields, T> (fields: F, construct: TSchemaConstructor<T, F>): Schema<T, F>
  schema<F extends TSchemaFields, T> (fields: F, construct?: undefined | null | TSchemaConstructor<T, F>): Schema<T, F> | Schema<TSchemaData<F>, F> {
    const names = new Set<string>()
    for (const field of fields) {
      if (!(field instanceof Field)) {
        this._configureError('Элементы схемы должны быть полями, созданными методом field().')
      }
      if (names.has(field.name)) {
        this._configureError(`Поле '${field.name}' объявлено более одного раза.`)
      }
      names.add(field.name)
    }
    if (construct === undefined || construct === null) {
      return new Schema<TSchemaData<F>, F>(this._config, fields, (data) => data)
    }
    if (!isFunction(construct)) {
      this._configureError('Конструктор схемы должен быть функцией.')
    }
    return new Schema<T, F>(this._config, fields, construct)
  }
}

export {
  Factory
}
