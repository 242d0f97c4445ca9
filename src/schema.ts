import type { TResult } from './types.js'
import type { Config } from './config.js'
import { JsonPath } from './path.js'
import type { Field, TFieldValue } from './field.js'
import { Validator } from './validator.js'
import {
  errorDetails,
  WrongTypeError,
  normalizeForeignError,
  validationResult
} from './errors.js'
import { isArray, isPlainObject } from './utils.js'

/**
 * Любой список полей схемы.
 */
type TSchemaFields = readonly Field<string, unknown>[]

/**
 * Объект с результатами всех полей схемы, который получает конструктор. Ключи - основные имена полей.
 */
type TSchemaData<F extends TSchemaFields> = { [K in F[number] as K['name']]: TFieldValue<K> }

/**
 * Конструктор итогового значения схемы.
 *
 * Может поднять `ArgumentError`, `RangeError`, `SyntaxError` или `TypeError`, чтобы отклонить объект целиком. Такая
 * ошибка оборачивается в `FaultyValueError` с путем объекта без указания поля.
 */
type TSchemaConstructor<T, F extends TSchemaFields> = (data: TSchemaData<F>) => T

/**
 * Схема объекта: упорядоченный список полей и конструктор.
 *
 * Поля разрешаются в порядке объявления, первая ошибка прерывает валидацию.
 */
class Schema<T, F extends TSchemaFields = TSchemaFields> {
  protected readonly _config: Config
  protected readonly _construct: TSchemaConstructor<T, F>
  readonly fields: F

  constructor(config: Config, fields: F, construct: TSchemaConstructor<T, F>) {
    this._config = config
    this.fields = fields
    this._construct = construct
  }

  /**
   * Проверяет объект по пути `path` и передает результаты полей в конструктор.
   *
   * @throws {JcvError} Первая ошибка валидации.
   */
  validateAtPath (value: unknown, path: JsonPath): T {
    if (!isPlainObject(value)) {
      throw new WrongTypeError(errorDetails.WrongTypeError(path, value, 'object'))
    }
    const mapping = value
    const data = Object.fromEntries(this.fields.map((field) => [field.name, field.resolve(mapping, path)]))
    try {
      // Ключи data в точности совпадают с именами полей F, значения получены валидаторами этих полей.
      return this._construct(data as TSchemaData<F>)
    } catch (e) {
      throw normalizeForeignError(e, value, path)
    }
  }

  /**
   * Проверяет объект в корне документа.
   */
  validate (value: unknown): TResult<T> {
    return validationResult(this._config, () => this.validateAtPath(value, JsonPath.root()))
  }

  /**
   * Проверяет массив объектов в корне документа. Путь каждого элемента `$[index]`.
   */
  validateList (value: unknown): TResult<T[]> {
    return validationResult(this._config, () => {
      const root = JsonPath.root()
      if (!isArray(value)) {
        throw new WrongTypeError(errorDetails.WrongTypeError(root, value, 'array'))
      }
      return value.map((item, index) => this.validateAtPath(item, root.descend(index)))
    })
  }

  /**
   * Проверяет объект, значения которого являются объектами этой схемы. Путь каждого значения `$.key`.
   */
  validateMap (value: unknown): TResult<Record<string, T>> {
    return validationResult(this._config, () => {
      const root = JsonPath.root()
      if (!isPlainObject(value)) {
        throw new WrongTypeError(errorDetails.WrongTypeError(root, value, 'object'))
      }
      return Object.fromEntries(Object.entries(value).map(([key, item]): [string, T] => [key, this.validateAtPath(item, root.descend(key))]))
    })
  }

  /**
   * Валидатор, функция преобразования которого {@link validateAtPath()}. Используется для вложенных объектов.
   */
  validator (): Validator<T> {
    return new Validator<T>(this._config, (value: unknown, path: JsonPath) => this.validateAtPath(value, path))
  }
}

/**
 * Тип результата схемы.
 */
type TSchemaOutput<S> = S extends Schema<infer T, infer _F> ? T : never

export {
  type TSchemaFields,
  type TSchemaData,
  type TSchemaConstructor,
  Schema,
  type TSchemaOutput
}
