import { EMPTY_VALUE } from './types.js'
import type { JsonPath } from './path.js'
import type { BaseValidator } from './validator.js'
import { errorDetails, JcvError, RequiredPropertyError } from './errors.js'
import { hasOwn } from './utils.js'

/**
 * Поле схемы: основное имя, псевдонимы и валидатор значения.
 *
 * Значение ищется по основному имени, затем по псевдонимам в порядке объявления. Путь к значению и имя в ошибках
 * всегда основное, даже если значение найдено по псевдониму.
 */
class Field<N extends string, T> {
  readonly name: N
  readonly aliases: readonly string[]
  readonly validator: BaseValidator<T>

  constructor(name: N, validator: BaseValidator<T>, aliases?: undefined | null | readonly string[]) {
    this.name = name
    this.validator = validator
    this.aliases = Object.freeze([...(aliases ?? [])])
  }

  /**
   * Основное имя и псевдонимы.
   */
  get names (): string[] {
    return [this.name, ...this.aliases]
  }

  /**
   * Возвращает значение первого найденного собственного свойства или {@link EMPTY_VALUE}.
   *
   * Свойство со значением `null` считается присутствующим.
   */
  extract (mapping: { [k: string]: unknown }): unknown {
    for (const name of this.names) {
      if (hasOwn(mapping, name)) {
        return mapping[name]
      }
    }
    return EMPTY_VALUE
  }

  /**
   * Извлекает и проверяет значение поля. Путь к значению `path.name`.
   *
   * Ошибка валидации, не отмеченная вложенным полем, получает имя и псевдонимы этого поля. Ошибка отсутствующего
   * поля перечисляет собственные ключи `mapping`.
   *
   * @param mapping Объект, которому принадлежит поле.
   * @param path    Путь к объекту.
   */
  resolve (mapping: { [k: string]: unknown }, path: JsonPath): T {
    const value = this.extract(mapping)
    const valuePath = path.descend(this.name)
    try {
      return this.validator.validateAtPath(value, valuePath)
    } catch (e) {
      if (!(e instanceof JcvError)) {
        throw e
      }
      const error = (value === EMPTY_VALUE && e instanceof RequiredPropertyError)
        ? new RequiredPropertyError(errorDetails.RequiredPropertyError(valuePath, null, Object.keys(mapping)))
        : e
      if (error.detail.field === undefined) {
        error.detail.field = this.name
        error.detail.fieldAliases = [...this.aliases]
      }
      throw error
    }
  }
}

/**
 * Тип имени поля.
 */
type TFieldName<F> = F extends Field<infer N, unknown> ? N : never

/**
 * Тип значения поля.
 */
type TFieldValue<F> = F extends Field<string, infer T> ? T : never

export {
  Field,
  type TFieldName,
  type TFieldValue
}
