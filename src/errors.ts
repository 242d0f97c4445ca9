import {
  type IErrorDetail as IErrorDetail_,
  type IErrorLike as IErrorLike_,
  BaseError,
  createErrorLike
} from 'js-base-error'
import type { TResult } from './types.js'
import type { JsonPath } from './path.js'
import type { Config } from './config.js'
import { isString, safeToJson, valueTypeName } from './utils.js'

/**
 * Имя ошибки.
 */
type TErrorName = 'Jcv.WrongTypeError' | 'Jcv.RequiredPropertyError' | 'Jcv.FaultyValueError' | 'Jcv.ConfigureError'

/**
 * Детали ошибки.
 *
 * Все нижеуказанные поля не являются обязательными и зависят от типа ошибки.
 */
interface IErrorDetail extends IErrorDetail_ {
  /**
   * Имя ошибки.
   */
  name: TErrorName
  /**
   * Строковое представление пути к значению на котором произошла ошибка, например `$.user.address[0].zip`.
   */
  propertyPath?: string
  /**
   * Основное имя поля схемы, при разборе которого произошла ошибка.
   *
   * Устанавливается самым глубоким полем. Имя всегда основное, даже если значение было найдено по псевдониму.
   */
  field?: string
  /**
   * Псевдонимы поля {@link field}.
   */
  fieldAliases?: string[]
  /**
   * Имя обязательного свойства, которое не найдено в объекте.
   */
  requiredPropertyName?: string
  /**
   * Собственные ключи объекта, в котором не найдено обязательное поле.
   */
  availableKeys?: string[]
  /**
   * Значение, не прошедшее проверку, в строковом представлении.
   */
  value?: string
  /**
   * Тип значения не прошедшего проверку: вид Json(`'string'`, `'object'` ...) или имя конструктора.
   */
  valueType?: string
  /**
   * Ожидаемый вид значения для {@link WrongTypeError}.
   */
  expected?: string
}

/**
 * Базовый интерфейс деталей ошибок.
 */
interface IErrorLike extends IErrorLike_, IErrorDetail {
  name: TErrorName
}

/**
 * Строковое представление деталей ошибки. Всегда включает путь(если он есть) и сообщение.
 *
 * ```
 * Jcv.FaultyValueError at $.age (поле 'age'): Значение должно быть не меньше 18. Значение: 15
 * ```
 */
function errorDetailToString (detail: IErrorDetail): string {
  let field = ''
  if (isString(detail.field)) {
    const aliases = detail.fieldAliases ?? []
    field = aliases.length > 0
      ? ` (поле '${detail.field}' (псевдонимы: ${aliases.join(', ')}))`
      : ` (поле '${detail.field}')`
  }
  const at = isString(detail.propertyPath) ? ` at ${detail.propertyPath}` : ''
  const value = isString(detail.value) ? ` Значение: ${detail.value}` : ''
  return `${detail.name}${at}${field}: ${detail.message ?? ''}${value}`
}

/**
 * Базовый класс всех ошибок валидатора.
 */
class JcvError extends BaseError<IErrorLike> {
  override toString (): string {
    return errorDetailToString(this.detail)
  }
}

/**
 * Ошибка валидации.
 *
 * Значение присутствует, но его вид не подходит для преобразования, например строка вместо объекта.
 */
class WrongTypeError extends JcvError { }

/**
 * Ошибка валидации.
 *
 * Отсутствует обязательное значение(или присутствует `null` для значения не допускающего `null`).
 */
class RequiredPropertyError extends JcvError { }

/**
 * Ошибка валидации.
 *
 * Значение не удовлетворяет ограничениям или функция преобразования подняла одну из распознаваемых ошибок.
 */
class FaultyValueError extends JcvError { }

/**
 * Ошибки конфигурации.
 *
 * Поднимается фабрикой при создании валидатора с недопустимыми параметрами и никогда в процессе валидации.
 */
class ConfigureError extends JcvError { }

/**
 * Ошибка недопустимого аргумента.
 *
 * Эту ошибку поднимают встроенные правила при нарушении ограничений. Пользовательские функции преобразования и
 * конструкторы схем могут поднимать ее, чтобы сообщить о недопустимом значении.
 */
class ArgumentError extends Error {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ArgumentError'
  }
}

/**
 * Ошибка неподходящего вида значения.
 *
 * Пользовательские функции преобразования могут поднимать ее, чтобы получить {@link WrongTypeError} с ожидаемым видом.
 */
class JsonTypeError extends Error {
  readonly expected: string

  /**
   * @param expected Описание ожидаемого вида значения, например `'string'` или `'object'`.
   * @param message  Необязательное сообщение.
   */
  constructor(expected: string, message?: string) {
    super(message ?? `Ожидался тип '${expected}'.`)
    this.name = 'JsonTypeError'
    this.expected = expected
  }
}

/**
 * Категории сторонних ошибок, которые перехватываются и оборачиваются в {@link FaultyValueError}:
 *
 * + `argument` - {@link ArgumentError} или `RangeError`.
 * + `format`   - `SyntaxError`, например некорректное регулярное выражение.
 * + `type`     - `TypeError`.
 */
type TForeignCategory = 'argument' | 'format' | 'type'

// Переполнение стека в V8 также является RangeError, но не относится к значению.
const _reStackOverflow = /^Maximum call stack size exceeded/

/**
 * Возвращает категорию распознаваемой сторонней ошибки или `null`.
 *
 * `RangeError` переполнения стека не распознается и поднимается как есть.
 */
function foreignErrorCategory (e: unknown): null | TForeignCategory {
  if (e instanceof RangeError && _reStackOverflow.test(e.message)) {
    return null
  }
  if (e instanceof ArgumentError || e instanceof RangeError) {
    return 'argument'
  }
  if (e instanceof SyntaxError) {
    return 'format'
  }
  if (e instanceof TypeError) {
    return 'type'
  }
  return null
}

/**
 * Предопределенные описания ошибок. Все функции оборачивают объект в {@link IErrorLike}.
 */
const errorDetails = Object.freeze({
  WrongTypeError (path: JsonPath, value: unknown, expected: string, message?: undefined | null | string): IErrorLike {
    const valueType = valueTypeName(value)
    return createErrorLike({
      name: 'Jcv.WrongTypeError',
      propertyPath: path.toString(),
      value: safeToJson(value),
      valueType,
      expected,
      message: message ?? `Ожидался тип '${expected}', получено '${valueType}'.`
    })
  },
  RequiredPropertyError (path: JsonPath, message?: undefined | null | string, availableKeys?: undefined | null | readonly string[]): IErrorLike {
    const key = path.key
    let defaultMessage = 'Отсутствует обязательное значение.'
    if (availableKeys) {
      defaultMessage = `Отсутствует обязательное поле. Доступные ключи: ${availableKeys.length > 0 ? availableKeys.join(', ') : '(нет)'}.`
    }
    return createErrorLike({
      name: 'Jcv.RequiredPropertyError',
      propertyPath: path.toString(),
      requiredPropertyName: isString(key) ? key : undefined,
      availableKeys: availableKeys ? [...availableKeys] : undefined,
      message: message ?? defaultMessage
    })
  },
  FaultyValueError (path: JsonPath, value: unknown, message: string, cause?: unknown): IErrorLike {
    return createErrorLike({
      name: 'Jcv.FaultyValueError',
      propertyPath: path.toString(),
      value: safeToJson(value),
      valueType: valueTypeName(value),
      message,
      cause
    })
  },
  ConfigureError (message: string): IErrorLike {
    return createErrorLike({
      name: 'Jcv.ConfigureError',
      message
    })
  }
} as const)

/**
 * Оборачивает распознаваемую стороннюю ошибку в {@link JcvError} с путем `path`.
 *
 * Ошибки {@link JcvError} и нераспознанные исключения возвращаются как есть - вызывающий код поднимает их дальше.
 *
 * @param e     Перехваченное исключение.
 * @param value Значение, при преобразовании которого возникла ошибка.
 * @param path  Путь к значению.
 */
function normalizeForeignError (e: unknown, value: unknown, path: JsonPath): unknown {
  if (e instanceof JcvError) {
    return e
  }
  if (e instanceof JsonTypeError) {
    return new WrongTypeError(errorDetails.WrongTypeError(path, value, e.expected, e.message))
  }
  const category = foreignErrorCategory(e)
  if (category === null || !(e instanceof Error)) {
    return e
  }
  let message = e.message
  if (category === 'format') {
    message = `Некорректный формат: ${e.message}`
  }
  else if (category === 'type') {
    message = `Несоответствие типа: ${e.message}`
  }
  return new FaultyValueError(errorDetails.FaultyValueError(path, value, message, e))
}

/**
 * Выполняет валидацию и приводит результат к {@link TResult}.
 *
 * Ошибка {@link JcvError} возвращается в результате `{ok: false}` или поднимается при включенной опции
 * {@link Config.throwIfError}. Другие исключения не перехватываются.
 */
function validationResult<T> (config: Config, validate: () => T): TResult<T> {
  try {
    return { ok: true, value: validate() }
  } catch (e) {
    if ((e instanceof JcvError) && !config.throwIfError) {
      return { ok: false, value: null, error: e }
    }
    throw e
  }
}

export {
  type IErrorDetail,
  type IErrorLike,
  //
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
  normalizeForeignError,
  validationResult
}
