import { ArgumentError } from './errors.js'

/**
 * Компилирует регулярное выражение.
 *
 * @throws {ArgumentError} Если шаблон или флаги недопустимы.
 */
function compileRegExp (source: string, flags: string = ''): RegExp {
  try {
    return new RegExp(source, flags)
  } catch (e) {
    throw new ArgumentError(`Недопустимое регулярное выражение: ${e instanceof Error ? e.message : String(e)}`, { cause: e })
  }
}

/**
 * Обертка над `RegExp`.
 */
class Re {
  private readonly _re: RegExp

  constructor(re: RegExp) {
    this._re = re
  }

  _isEquals (source: string, flags: string): boolean {
    return (this._re.source === source && this._re.flags === flags)
  }

  /**
   * Возвращает ссылку на `RegExp` сбрасывая `lastIndex`.
   */
  get re (): RegExp {
    this._re.lastIndex = 0
    return this._re
  }

  /**
   * Поиск совпадения в любом месте строки.
   */
  test (value: string): boolean {
    return this.re.test(value)
  }
}

/**
 * Вспомогательный кеш для `RegExp`.
 */
class RegExpCache {
  readonly _cache: Re[] = []

  /**
   * Возвращает обертку для `RegExp` или ссылку на ранее скомпилированное выражение с тем же шаблоном и флагами.
   *
   * @param source Шаблон регулярного выражения.
   * @param flags  Флаги.
   * @throws {ArgumentError} Если шаблон не компилируется.
   */
  getOf (source: string, flags: string = ''): Re {
    for (const item of this._cache) {
      if (item._isEquals(source, flags)) {
        return item
      }
    }
    const wrapper = new Re(compileRegExp(source, flags))
    // Нормализованные source и flags могут отличаться от переданных, например пустой шаблон становится `(?:)`.
    if (wrapper._isEquals(source, flags)) {
      this._cache.push(wrapper)
    }
    return wrapper
  }
}

/**
 * Привязывает шаблон к началу и концу строки: `abc -> ^abc$`.
 *
 * Повторный вызов ничего не меняет, уже имеющиеся `^` и `$` не дублируются.
 */
function anchorPattern (pattern: string): string {
  let result = pattern
  if (!result.startsWith('^')) {
    result = `^${result}`
  }
  if (!result.endsWith('$')) {
    result = `${result}$`
  }
  return result
}

export {
  compileRegExp,
  Re,
  RegExpCache,
  anchorPattern
}
