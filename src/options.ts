import { type TEmptyValue, type TFallback, type TFallbackOptions, EMPTY_VALUE } from './types.js'
import { errorDetails, ConfigureError } from './errors.js'
import { isFunction, isUndefined } from './utils.js'

const _none: TFallback<never> = Object.freeze({ kind: 'none' })

/**
 * Запасное значение валидатора.
 *
 * Экземпляр не изменяется. Валидатор с другим запасным значением получает новый экземпляр.
 */
class Options<T> {
  protected readonly _fallback: TFallback<T>

  constructor(fallback?: undefined | null | TFallback<T>) {
    this._fallback = fallback ?? _none
  }

  /**
   * Создает экземпляр из параметров фабрики.
   *
   * Одновременная передача `fallback` и `fallbackBuilder` недопустима и поднимает {@link ConfigureError}.
   */
  static from<T> (options?: undefined | null | TFallbackOptions<T>): Options<T> {
    if (!options) {
      return new Options<T>()
    }
    const { fallback, fallbackBuilder } = options
    if (!isUndefined(fallback) && fallbackBuilder !== undefined && fallbackBuilder !== null) {
      throw new ConfigureError(errorDetails.ConfigureError('Параметры "fallback" и "fallbackBuilder" не могут быть заданы одновременно.'))
    }
    if (fallbackBuilder !== undefined && fallbackBuilder !== null) {
      if (!isFunction(fallbackBuilder)) {
        throw new ConfigureError(errorDetails.ConfigureError('Параметр "fallbackBuilder" должен быть функцией.'))
      }
      return new Options<T>({ kind: 'builder', build: fallbackBuilder })
    }
    return isUndefined(fallback) ? new Options<T>() : new Options<T>({ kind: 'value', value: fallback })
  }

  /**
   * Проверяет было ли установлено любое запасное значение.
   */
  hasFallback (): boolean {
    return this._fallback.kind !== 'none'
  }

  /**
   * Возвращает запасное значение или {@link EMPTY_VALUE}, если оно не установлено.
   *
   * Функция-построитель вызывается при каждом обращении.
   */
  getFallback (): TEmptyValue | T {
    switch (this._fallback.kind) {
      case 'value': return this._fallback.value
      case 'builder': return this._fallback.build()
    }
    return EMPTY_VALUE
  }
}

export {
  Options
}
