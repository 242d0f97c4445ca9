import { test, expect } from 'vitest'
import { ConfigureError, WrongTypeError, JsonTypeError } from './errors.js'
import { Validator } from './validator.js'
import { Field } from './field.js'
import { Factory } from './factory.js'

test('Config defaults', () => {
  const v = new Factory()
  expect(v.config.throwIfError).toBe(false)
  expect(v.config.coerceStrings).toBe(false)
  expect(v.config.trimStrings).toBe(false)
  expect(v.config.enumCaseSensitive).toBe(false)

  // Параметры неподходящего типа игнорируются
  const custom = new Factory({ coerceStrings: true, trimStrings: null, enumCaseSensitive: true })
  expect(custom.config.coerceStrings).toBe(true)
  expect(custom.config.trimStrings).toBe(false)
  expect(custom.config.enumCaseSensitive).toBe(true)
})

test('Config applies to string and enum validators', () => {
  const v = new Factory({ coerceStrings: true, trimStrings: true, enumCaseSensitive: true })
  expect(v.str().validate(5)).toStrictEqual({ ok: true, value: '5' })
  expect(v.str().validate('  a ')).toStrictEqual({ ok: true, value: 'a' })
  // Явные параметры важнее конфигурации
  expect(v.str({ trim: false }).validate(' a ')).toStrictEqual({ ok: true, value: ' a ' })
  expect(v.str({ coerce: false }).validate(5).ok).toBe(false)

  expect(v.enum({ Light: 1 }).validate('light').ok).toBe(false)
  expect(v.enum({ Light: 1 }, { caseSensitive: false }).validate('light')).toStrictEqual({ ok: true, value: 1 })
})

test('Leaf validators', () => {
  const v = new Factory()
  expect(v.int({ min: 18 }).validate(23)).toStrictEqual({ ok: true, value: 23 })
  expect(v.int({ min: 18 }).validate('23')).toStrictEqual({ ok: true, value: 23 })
  const low = v.int({ min: 18 }).validate(5)
  expect(low.ok).toBe(false)
  expect(low.error?.detail.message).toContain('18')

  expect(v.bool().validate(true)).toStrictEqual({ ok: true, value: true })
  expect(v.bool().validate('true').error).toBeInstanceOf(WrongTypeError)
  expect(v.plain().validate({ a: 1 })).toStrictEqual({ ok: true, value: { a: 1 } })
  expect(v.plain('string').validate('s')).toStrictEqual({ ok: true, value: 's' })
  expect(v.plain('string').validate(1).error?.detail.expected).toBe('string')
  expect(v.bool({ fallback: false }).validate()).toStrictEqual({ ok: true, value: false })

  const theme = v.enum({ light: 'L', dark: 'D' })
  expect(theme.validate('light').value).toBe('L')
  expect(theme.validate('LIGHT').value).toBe('L')
  expect(theme.validate('Light').value).toBe('L')

  const re = v.pattern({ full: true }).validate('^abc')
  expect(re.value?.source).toBe('^abc$')
  expect(v.pattern({ full: true }).validate('abc$').value?.source).toBe('^abc$')
  expect(v.pattern().validate('(').error?.detail.name).toBe('Jcv.FaultyValueError')

  const at = v.datetime().validate('2024-01-15T10:30:00Z')
  expect(at.value?.getTime()).toBe(Date.UTC(2024, 0, 15, 10, 30))
  const fixed = new Date(0)
  expect(v.datetime({ fallback: fixed }).validate().value).toBe(fixed)
})

test('custom()', () => {
  const v = new Factory()
  const upper = v.custom((value: string) => value.toUpperCase(), { input: 'string' })
  expect(upper).toBeInstanceOf(Validator)
  expect(upper.validate('abc')).toStrictEqual({ ok: true, value: 'ABC' })
  const wrong = upper.validate(5)
  expect(wrong.error).toBeInstanceOf(WrongTypeError)
  expect(wrong.error?.detail.expected).toBe('string')

  const sum = v.custom((value) => {
    if (!Array.isArray(value)) {
      throw new JsonTypeError('array', 'Ожидался массив чисел.')
    }
    return value.reduce((acc: number, item: unknown) => acc + Number(item), 0)
  }, { fallback: 0 })
  expect(sum.validate([1, 2, '3'])).toStrictEqual({ ok: true, value: 6 })
  expect(sum.validate()).toStrictEqual({ ok: true, value: 0 })
  expect(sum.validate('x').error?.detail.message).toBe('Ожидался массив чисел.')
})

test('ConfigureError', () => {
  const v = new Factory()
  expect(() => v.int({ min: 10, max: 0 })).toThrow(ConfigureError)
  expect(() => v.str({ minLength: 5, maxLength: 1 })).toThrow(ConfigureError)
  expect(() => v.str({ minLength: -1 })).toThrow(ConfigureError)
  expect(() => v.str({ maxLength: 1.5 })).toThrow(ConfigureError)
  expect(() => v.str({ pattern: '(' })).toThrow(ConfigureError)
  expect(() => v.datetime({ min: new Date(1000), max: new Date(0) })).toThrow(ConfigureError)
  expect(() => v.datetime({ min: new Date(Number.NaN) })).toThrow(ConfigureError)
  expect(() => v.enum({})).toThrow(ConfigureError)
  expect(() => v.enum({ Light: 1, light: 2 })).toThrow(ConfigureError)
  expect(v.enum({ Light: 1, light: 2 }, { caseSensitive: true }).validate('light').value).toBe(2)
  expect(() => v.enum(new Map<string, number>())).toThrow(ConfigureError)
  expect(() => v.enum(new Map([['Light', 1], ['light', 2]]))).toThrow(ConfigureError)
  expect(v.enum(new Map([['x', 'X']])).validate('X')).toStrictEqual({ ok: true, value: 'X' })
  expect(() => Reflect.apply(v.enum, v, ['abc'])).toThrow(ConfigureError)

  // Одновременная передача fallback и fallbackBuilder отклоняется и без проверки типов
  expect(() => Reflect.apply(v.int, v, [{ fallback: 1, fallbackBuilder: () => 2 }])).toThrow(ConfigureError)

  expect(() => v.schema([v.field('a', v.int()), v.field('a', v.str())])).toThrow(ConfigureError)

  const error = (() => {
    try {
      v.int({ min: 2, max: 1 })
    } catch (e) {
      return e
    }
    return null
  })()
  expect(error).toBeInstanceOf(ConfigureError)
  expect(String(error)).toBe("Jcv.ConfigureError: Некорректные аргументы 'int(min: 2, max: 1)': min больше max.")
})

test('field()', () => {
  const v = new Factory()
  const field = v.field('name', v.str(), ['fullName'])
  expect(field).toBeInstanceOf(Field)
  expect(field.name).toBe('name')
  expect(field.aliases).toStrictEqual(['fullName'])
  expect(Object.isFrozen(field.aliases)).toBe(true)
})
