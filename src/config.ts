import type { TOptions } from './types.js'
import { isPlainObject, plainCopy, mergeBoolOrUIntProperties } from './utils.js'

type TConfig = { [K in keyof TOptions]-?: Exclude<TOptions[K], undefined | null> }

// NOTE: Этот тип должен соответствовать всем глобальным параметрам конфигурации
const defaultConfig: TConfig = Object.freeze({
  throwIfError: false,
  coerceStrings: false,
  trimStrings: false,
  enumCaseSensitive: false
} as const)

/**
 * Общие параметры фабрики. Копируются при создании и далее не изменяются.
 */
class Config {
  protected readonly _options: TConfig

  constructor(options?: undefined | null | TOptions) {
    this._options = isPlainObject(options)
      ? mergeBoolOrUIntProperties(plainCopy(defaultConfig), options)
      : plainCopy(defaultConfig)
  }

  get throwIfError (): boolean {
    return this._options.throwIfError
  }

  get coerceStrings (): boolean {
    return this._options.coerceStrings
  }

  get trimStrings (): boolean {
    return this._options.trimStrings
  }

  get enumCaseSensitive (): boolean {
    return this._options.enumCaseSensitive
  }
}

export {
  type TConfig,
  Config
}
