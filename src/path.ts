import { type TPropertyName, ROOT_MARKER } from './types.js'

type TPathNode = {
  readonly key: TPropertyName,
  readonly prev: null | TPathNode
}

const _reQuotedName = /[\s[\]{}.$]/

/**
 * Строковое представление одного сегмента пути.
 *
 * + `null`   - Корень `$`.
 * + `number` - Индекс `[0]`.
 * + `string` - Свойство `.name`. Пустое имя или имя с пробельными символами или любым из `. [ ] { } $` заключается в
 *              одинарные кавычки `.'first name'`, внутренние кавычки экранируются `\'`.
 */
function propertyNameToString (key: TPropertyName): string {
  if (key === null) {
    return ROOT_MARKER
  }
  if (typeof key === 'number') {
    return `[${key}]`
  }
  return (key.length === 0 || _reQuotedName.test(key))
    ? `.'${key.replaceAll("'", "\\'")}'`
    : `.${key}`
}

/**
 * Неизменяемый путь к значению в документе.
 *
 * Каждый сегмент хранится в узле со ссылкой на предыдущий, поэтому {@link descend()} не копирует путь, а лишь
 * добавляет узел. Пути с общим началом разделяют одни и те же узлы и безопасно передаются во вложенные валидаторы.
 */
class JsonPath {
  private static readonly _root = new JsonPath({ key: null, prev: null })

  protected readonly _node: TPathNode

  protected constructor(node: TPathNode) {
    this._node = node
  }

  /**
   * Корень документа `$`.
   */
  static root (): JsonPath {
    return JsonPath._root
  }

  /**
   * Последний сегмент пути. Для корня это `null`.
   */
  get key (): TPropertyName {
    return this._node.key
  }

  /**
   * Количество сегментов без учета корня.
   */
  get depth (): number {
    let depth = 0
    let current = this._node.prev
    while (current) {
      ++depth
      current = current.prev
    }
    return depth
  }

  /**
   * Возвращает новый путь с добавленным сегментом.
   *
   * @param key Имя свойства объекта или индекс элемента массива.
   */
  descend (key: string | number): JsonPath {
    return new JsonPath({ key, prev: this._node })
  }

  /**
   * Возвращает сегменты пути от корня. Первый элемент всегда `null`.
   */
  keys (): TPropertyName[] {
    const keys: TPropertyName[] = []
    let current: null | TPathNode = this._node
    while (current) {
      keys.push(current.key)
      current = current.prev
    }
    return keys.reverse()
  }

  toString (): string {
    return this.keys().map((key) => propertyNameToString(key)).join('')
  }
}

export {
  type TPathNode,
  propertyNameToString,
  JsonPath
}
