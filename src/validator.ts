import {
  type TEmptyValue,
  type TResult,
  type TConverter,
  EMPTY_VALUE
} from './types.js'
import type { Config } from './config.js'
import { JsonPath } from './path.js'
import { Options } from './options.js'
import {
  errorDetails,
  WrongTypeError,
  RequiredPropertyError,
  normalizeForeignError,
  validationResult
} from './errors.js'
import { isArray, isPlainObject, isUndefined } from './utils.js'

/**
 * Базовый класс валидаторов.
 *
 * Валидатор объединяет функцию преобразования, запасное значение и признак допустимости `null`. Экземпляры не
 * изменяются: все методы-комбинаторы возвращают новые валидаторы, поэтому один экземпляр можно использовать в
 * нескольких полях и схемах.
 *
 * Порядок разрешения значения:
 *
 * + Отсутствующее значение(`undefined` или {@link EMPTY_VALUE}): запасное значение, затем `null` для
 *   {@link OptionalValidator}, иначе {@link RequiredPropertyError}.
 * + Присутствующий `null`: `null` для {@link OptionalValidator}, затем запасное значение, иначе
 *   {@link RequiredPropertyError}.
 * + Любое другое значение передается в функцию преобразования. Распознаваемые сторонние ошибки оборачиваются в
 *   {@link JcvError} с текущим путем, остальные исключения не перехватываются.
 */
abstract class BaseValidator<T> {
  protected readonly _config: Config
  protected readonly _convert: TConverter<T>
  protected readonly _options: Options<T>

  constructor(config: Config, convert: TConverter<T>, options?: undefined | null | Options<T>) {
    this._config = config
    this._convert = convert
    this._options = options ?? new Options<T>()
  }

  /**
   * Значение для `null` или отсутствующего значения, если валидатор допускает `null`, иначе {@link EMPTY_VALUE}.
   */
  protected abstract _nullValue (): TEmptyValue | T

  /**
   * Допускает ли валидатор `null`.
   */
  get nullable (): boolean {
    return this._nullValue() !== EMPTY_VALUE
  }

  /**
   * Было ли установлено запасное значение.
   */
  get hasFallback (): boolean {
    return this._options.hasFallback()
  }

  /**
   * Проверяет значение относительно корня документа.
   *
   * @param value Значение. Отсутствие значения(`undefined`) обрабатывается как отсутствующее поле.
   * @returns Результат `{ok: true, value}` или `{ok: false, error}`. При включенной опции `throwIfError` ошибка
   *          поднимается.
   */
  validate (value?: unknown): TResult<T> {
    return validationResult(this._config, () => this.validateAtPath(value, JsonPath.root()))
  }

  /**
   * Проверяет и преобразует значение расположенное по пути `path`.
   *
   * @param value Значение, `undefined` или {@link EMPTY_VALUE} для отсутствующего значения.
   * @param path  Путь к значению.
   * @throws {JcvError} Первая ошибка валидации.
   */
  validateAtPath (value: unknown, path: JsonPath): T {
    if (value === EMPTY_VALUE || isUndefined(value)) {
      const fallback = this._options.getFallback()
      if (fallback !== EMPTY_VALUE) {
        return fallback
      }
      const nullValue = this._nullValue()
      if (nullValue !== EMPTY_VALUE) {
        return nullValue
      }
      throw new RequiredPropertyError(errorDetails.RequiredPropertyError(path))
    }
    if (value === null) {
      const nullValue = this._nullValue()
      if (nullValue !== EMPTY_VALUE) {
        return nullValue
      }
      const fallback = this._options.getFallback()
      if (fallback !== EMPTY_VALUE) {
        return fallback
      }
      throw new RequiredPropertyError(errorDetails.RequiredPropertyError(path, 'Значение не может быть null.'))
    }
    return this._convertAtPath(value, path)
  }

  /**
   * Вызывает функцию преобразования без разрешения `null` и запасного значения. Распознаваемые сторонние ошибки
   * получают путь `path`.
   */
  protected _convertAtPath (value: unknown, path: JsonPath): T {
    try {
      return this._convert(value, path)
    } catch (e) {
      throw normalizeForeignError(e, value, path)
    }
  }

  /**
   * Функция преобразования массива. Каждый элемент, включая `null`, передается в функцию преобразования этого
   * валидатора с путем `path[index]`. Запасное значение элемента не применяется.
   */
  protected _listConverter (): TConverter<T[]> {
    return (value: unknown, path: JsonPath): T[] => {
      if (!isArray(value)) {
        throw new WrongTypeError(errorDetails.WrongTypeError(path, value, 'array'))
      }
      return value.map((item, index) => this._convertAtPath(item, path.descend(index)))
    }
  }

  /**
   * Функция преобразования объекта. Каждое значение передается в функцию преобразования с путем `path.key`.
   * Порядок ключей результата соответствует порядку ключей входного объекта.
   */
  protected _mapConverter (): TConverter<Record<string, T>> {
    return (value: unknown, path: JsonPath): Record<string, T> => {
      if (!isPlainObject(value)) {
        throw new WrongTypeError(errorDetails.WrongTypeError(path, value, 'object'))
      }
      return Object.fromEntries(Object.entries(value).map(([key, item]): [string, T] => [key, this._convertAtPath(item, path.descend(key))]))
    }
  }
}

/**
 * Создает параметры со статическим запасным значением или без него.
 */
function staticFallback<T> (fallback: undefined | T): Options<T> {
  return isUndefined(fallback) ? new Options<T>() : new Options<T>({ kind: 'value', value: fallback })
}

/**
 * Валидатор значения, не допускающего `null`.
 */
class Validator<T> extends BaseValidator<T> {
  protected override _nullValue (): TEmptyValue {
    return EMPTY_VALUE
  }

  /**
   * Валидатор допускающий `null`. Запасное значение сохраняется.
   *
   * Отсутствующее значение без запасного значения разрешается в `null`, присутствующий `null` не передается в функцию
   * преобразования.
   */
  optional (): OptionalValidator<T> {
    return new OptionalValidator<T>(this._config, this._convert, this._options)
  }

  /**
   * Валидатор массива элементов этого валидатора.
   *
   * @param fallback Запасное значение для отсутствующего массива.
   */
  list (fallback?: undefined | T[]): Validator<T[]> {
    return new Validator<T[]>(this._config, this._listConverter(), staticFallback(fallback))
  }

  /**
   * Валидатор объекта со значениями этого валидатора.
   *
   * @param fallback Запасное значение для отсутствующего объекта.
   */
  map (fallback?: undefined | Record<string, T>): Validator<Record<string, T>> {
    return new Validator<Record<string, T>>(this._config, this._mapConverter(), staticFallback(fallback))
  }

  /**
   * Копия валидатора со статическим запасным значением.
   */
  fallback (value: T): Validator<T> {
    return new Validator<T>(this._config, this._convert, new Options<T>({ kind: 'value', value }))
  }

  /**
   * Копия валидатора с функцией-построителем запасного значения. Функция вызывается при каждом обращении.
   */
  fallbackWith (build: () => T): Validator<T> {
    return new Validator<T>(this._config, this._convert, new Options<T>({ kind: 'builder', build }))
  }
}

/**
 * Валидатор значения, допускающего `null`.
 */
class OptionalValidator<T> extends BaseValidator<null | T> {
  protected readonly _inner: TConverter<T>

  /**
   * @param config  Конфигурация фабрики.
   * @param convert Функция преобразования значения не равного `null`.
   * @param options Запасное значение.
   */
  constructor(config: Config, convert: TConverter<T>, options?: undefined | null | Options<null | T>) {
    super(config, (value: unknown, path: JsonPath) => value === null ? null : convert(value, path), options)
    this._inner = convert
  }

  protected override _nullValue (): null {
    return null
  }

  /**
   * Этот валидатор уже допускает `null` и возвращается как есть.
   */
  optional (): OptionalValidator<T> {
    return this
  }

  /**
   * Массив элементов, каждый из которых может быть `null`. Сам массив также может отсутствовать или быть `null`.
   */
  list (fallback?: undefined | (null | T)[]): OptionalValidator<(null | T)[]> {
    return new OptionalValidator<(null | T)[]>(this._config, this._listConverter(), staticFallback(fallback))
  }

  /**
   * Объект, каждое значение которого может быть `null`. Сам объект также может отсутствовать или быть `null`.
   */
  map (fallback?: undefined | Record<string, null | T>): OptionalValidator<Record<string, null | T>> {
    return new OptionalValidator<Record<string, null | T>>(this._config, this._mapConverter(), staticFallback(fallback))
  }

  fallback (value: null | T): OptionalValidator<T> {
    return new OptionalValidator<T>(this._config, this._inner, new Options<null | T>({ kind: 'value', value }))
  }

  fallbackWith (build: () => null | T): OptionalValidator<T> {
    return new OptionalValidator<T>(this._config, this._inner, new Options<null | T>({ kind: 'builder', build }))
  }
}

/**
 * Тип результата валидатора.
 */
type TValidatorOutput<V> = V extends BaseValidator<infer T> ? T : never

export {
  BaseValidator,
  Validator,
  OptionalValidator,
  type TValidatorOutput
}
