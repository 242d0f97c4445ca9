import { test, expect } from 'vitest'
import { EMPTY_VALUE } from './types.js'
import { ConfigureError } from './errors.js'
import { Options } from './options.js'

test('Options', () => {
  const none = Options.from<number>()
  expect(none.hasFallback()).toBe(false)
  expect(none.getFallback()).toBe(EMPTY_VALUE)
  expect(Options.from<number>({}).hasFallback()).toBe(false)

  const value = Options.from({ fallback: 0 })
  expect(value.hasFallback()).toBe(true)
  expect(value.getFallback()).toBe(0)

  // null является допустимым запасным значением
  const nullValue = Options.from<null | number>({ fallback: null })
  expect(nullValue.hasFallback()).toBe(true)
  expect(nullValue.getFallback()).toBe(null)

  let counter = 0
  const builder = Options.from({ fallbackBuilder: () => ++counter })
  expect(builder.hasFallback()).toBe(true)
  expect(builder.getFallback()).toBe(1)
  expect(builder.getFallback()).toBe(2)

  expect(() => Reflect.apply(Options.from, Options, [{ fallback: 1, fallbackBuilder: () => 2 }])).toThrow(ConfigureError)
  expect(() => Reflect.apply(Options.from, Options, [{ fallbackBuilder: 'x' }])).toThrow(ConfigureError)
})
