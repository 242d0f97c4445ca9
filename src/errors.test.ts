import { test, expect } from 'vitest'
import { JsonPath } from './path.js'
import { Config } from './config.js'
import {
  errorDetailToString,
  JcvError,
  WrongTypeError,
  RequiredPropertyError,
  FaultyValueError,
  ConfigureError,
  ArgumentError,
  JsonTypeError,
  foreignErrorCategory,
  errorDetails,
  normalizeForeignError,
  validationResult
} from './errors.js'

const path = JsonPath.root().descend('user').descend('age')

test('Error classes', () => {
  for (const error of [
    new WrongTypeError(errorDetails.WrongTypeError(path, 1, 'string')),
    new RequiredPropertyError(errorDetails.RequiredPropertyError(path)),
    new FaultyValueError(errorDetails.FaultyValueError(path, 1, 'Ошибка.')),
    new ConfigureError(errorDetails.ConfigureError('Ошибка.'))
  ]) {
    expect(error).toBeInstanceOf(JcvError)
    expect(error).toBeInstanceOf(Error)
  }
})

test('errorDetails', () => {
  const wrongType = errorDetails.WrongTypeError(path, 'abc', 'integer')
  expect(wrongType).toMatchObject({
    name: 'Jcv.WrongTypeError',
    propertyPath: '$.user.age',
    value: '"abc"',
    valueType: 'string',
    expected: 'integer',
    message: "Ожидался тип 'integer', получено 'string'."
  })

  const required = errorDetails.RequiredPropertyError(path)
  expect(required).toMatchObject({
    name: 'Jcv.RequiredPropertyError',
    propertyPath: '$.user.age',
    requiredPropertyName: 'age',
    message: 'Отсутствует обязательное значение.'
  })
  expect(errorDetails.RequiredPropertyError(JsonPath.root().descend(1)).requiredPropertyName).toBe(undefined)
  expect(required.availableKeys).toBe(undefined)

  const missingField = errorDetails.RequiredPropertyError(path, null, ['name', 'years'])
  expect(missingField.availableKeys).toStrictEqual(['name', 'years'])
  expect(missingField.message).toBe('Отсутствует обязательное поле. Доступные ключи: name, years.')
  expect(errorDetails.RequiredPropertyError(path, null, []).message).toBe('Отсутствует обязательное поле. Доступные ключи: (нет).')

  const faulty = errorDetails.FaultyValueError(path, [1, 2], 'Ошибка.')
  expect(faulty).toMatchObject({
    name: 'Jcv.FaultyValueError',
    propertyPath: '$.user.age',
    value: '[1,2]',
    valueType: 'array',
    message: 'Ошибка.'
  })
})

test('toString', () => {
  const error = new FaultyValueError(errorDetails.FaultyValueError(path, 15, 'Значение должно быть не меньше 18.'))
  expect(error.toString()).toBe('Jcv.FaultyValueError at $.user.age: Значение должно быть не меньше 18. Значение: 15')

  error.detail.field = 'age'
  expect(error.toString()).toBe("Jcv.FaultyValueError at $.user.age (поле 'age'): Значение должно быть не меньше 18. Значение: 15")

  error.detail.fieldAliases = ['years', 'userAge']
  expect(error.toString()).toBe("Jcv.FaultyValueError at $.user.age (поле 'age' (псевдонимы: years, userAge)): Значение должно быть не меньше 18. Значение: 15")

  const required = new RequiredPropertyError(errorDetails.RequiredPropertyError(path))
  expect(required.toString()).toBe('Jcv.RequiredPropertyError at $.user.age: Отсутствует обязательное значение.')

  const configure = new ConfigureError(errorDetails.ConfigureError('Ошибка конфигурации.'))
  expect(configure.toString()).toBe('Jcv.ConfigureError: Ошибка конфигурации.')
  expect(errorDetailToString(configure.detail)).toBe('Jcv.ConfigureError: Ошибка конфигурации.')
})

test('Foreign error categories', () => {
  expect(foreignErrorCategory(new ArgumentError('a'))).toBe('argument')
  expect(foreignErrorCategory(new RangeError('a'))).toBe('argument')
  expect(foreignErrorCategory(new RangeError('Maximum call stack size exceeded'))).toBe(null)
  expect(foreignErrorCategory(new SyntaxError('a'))).toBe('format')
  expect(foreignErrorCategory(new TypeError('a'))).toBe('type')
  expect(foreignErrorCategory(new Error('a'))).toBe(null)
  expect(foreignErrorCategory('a')).toBe(null)
})

test('normalizeForeignError', () => {
  const argument = new ArgumentError('Недопустимое значение.')
  const wrappedArgument = normalizeForeignError(argument, 5, path)
  expect(wrappedArgument).toBeInstanceOf(FaultyValueError)
  expect(wrappedArgument).toMatchObject({
    detail: {
      name: 'Jcv.FaultyValueError',
      propertyPath: '$.user.age',
      value: '5',
      message: 'Недопустимое значение.'
    }
  })

  const wrappedSyntax = normalizeForeignError(new SyntaxError('Unexpected token'), 'x', path)
  expect(wrappedSyntax).toMatchObject({ detail: { message: 'Некорректный формат: Unexpected token' } })

  const wrappedType = normalizeForeignError(new TypeError('not a function'), 'x', path)
  expect(wrappedType).toMatchObject({ detail: { message: 'Несоответствие типа: not a function' } })

  const wrongType = normalizeForeignError(new JsonTypeError('object'), [], path)
  expect(wrongType).toBeInstanceOf(WrongTypeError)
  expect(wrongType).toMatchObject({ detail: { expected: 'object', valueType: 'array', message: "Ожидался тип 'object'." } })

  // JcvError и нераспознанные исключения возвращаются как есть
  const own = new RequiredPropertyError(errorDetails.RequiredPropertyError(path))
  expect(normalizeForeignError(own, null, JsonPath.root())).toBe(own)
  const fatal = new Error('fatal')
  expect(normalizeForeignError(fatal, 1, path)).toBe(fatal)
  expect(normalizeForeignError('string', 1, path)).toBe('string')
  const overflow = new RangeError('Maximum call stack size exceeded')
  expect(normalizeForeignError(overflow, [], path)).toBe(overflow)
})

test('validationResult', () => {
  const config = new Config()
  const throwConfig = new Config({ throwIfError: true })
  const fail = (): number => {
    throw new FaultyValueError(errorDetails.FaultyValueError(path, 1, 'Ошибка.'))
  }

  expect(validationResult(config, () => 1)).toStrictEqual({ ok: true, value: 1 })
  expect(validationResult(throwConfig, () => 1)).toStrictEqual({ ok: true, value: 1 })

  const result = validationResult(config, fail)
  expect(result.ok).toBe(false)
  expect(result.value).toBe(null)
  expect(result.error).toBeInstanceOf(FaultyValueError)

  expect(() => validationResult(throwConfig, fail)).toThrow(FaultyValueError)
  expect(() => validationResult(config, () => { throw new Error('fatal') })).toThrow('fatal')
})
