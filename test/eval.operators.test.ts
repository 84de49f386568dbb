import { describe, expect, it } from 'vitest'
import { evalCode, runtimeError } from './helpers'

describe('eval operators', () => {
  describe('arithmetic', () => {
    it('keeps Int arithmetic exact', () => {
      expect(evalCode('1 + 2')).toBe(3n)
      expect(evalCode('6 * 7')).toBe(42n)
      expect(evalCode('9007199254740993 + 1')).toBe(9007199254740994n)
      expect(evalCode('2 ** 100')).toBe(1267650600228229401496703205376n)
    })

    it('always divides to a Float', () => {
      expect(evalCode('5 / 2')).toBe(2.5)
      expect(evalCode('4 / 2')).toBe(2)
      expect(evalCode('type(4 / 2)')).toBe('float')
    })

    it('promotes mixed operands to Float', () => {
      expect(evalCode('1 + 2.5')).toBe(3.5)
      expect(evalCode('10 - 0.5')).toBe(9.5)
      expect(evalCode('type(2 * 1.0)')).toBe('float')
      expect(evalCode('0.1 + 0.2')).toBe(0.30000000000000004)
    })

    it('truncates Int remainders toward zero', () => {
      expect(evalCode('7 % 3')).toBe(1n)
      expect(evalCode('-7 % 3')).toBe(-1n)
      expect(evalCode('7.5 % 2')).toBe(1.5)
    })

    it('raises to powers', () => {
      expect(evalCode('2 ** 10')).toBe(1024n)
      expect(evalCode('2 ** -1')).toBe(0.5)
      expect(evalCode('2 ** 0.5')).toBe(Math.SQRT2)
      expect(evalCode('-2 ** 2')).toBe(-4n)
    })

    it('keeps large Int results exact', () => {
      expect(evalCode('type(2 ** 1000000)')).toBe('int')
      expect(evalCode('2 ** 100 - 2 ** 100')).toBe(0n)
    })

    it('overflows oversized Int results to an infinite Float', () => {
      expect(evalCode('10 ** 10 ** 10')).toBe(Number.POSITIVE_INFINITY)
      expect(evalCode('pow(2, 10000000000)')).toBe(Number.POSITIVE_INFINITY)
      expect(evalCode('(-2) ** 10000001')).toBe(Number.NEGATIVE_INFINITY)
      expect(evalCode('let x = 2 ** 1000000; x * x')).toBe(Number.POSITIVE_INFINITY)
      expect(evalCode('let x = 2 ** 1000000; -(x * x)')).toBe(Number.NEGATIVE_INFINITY)
    })

    it('concatenates strings with +', () => {
      expect(evalCode('"foo" + "bar"')).toBe('foobar')
    })

    it('negates numbers', () => {
      expect(evalCode('-(3)')).toBe(-3n)
      expect(evalCode('--2.5')).toBe(2.5)
    })
  })

  describe('division by zero', () => {
    it('rejects Int and Float division by zero', () => {
      const err = runtimeError('1 / 0')
      expect(err.kind).toBe('DivisionByZero')
      expect(err.message).toBe('Division by zero')
      expect(err.span).toEqual({ start: 0, end: 5 })
      expect(runtimeError('1.0 / 0.0').kind).toBe('DivisionByZero')
      expect(runtimeError('1 / 0.0').kind).toBe('DivisionByZero')
    })

    it('rejects modulo by zero', () => {
      const err = runtimeError('5 % 0')
      expect(err.kind).toBe('DivisionByZero')
      expect(err.message).toBe('Modulo by zero')
    })
  })

  describe('type mismatches', () => {
    it('rejects adding a string and a number', () => {
      const err = runtimeError('1 + "a"')
      expect(err.kind).toBe('TypeMismatch')
      expect(err.message).toBe('Cannot apply + to int and string')
      expect(err.span).toEqual({ start: 0, end: 7 })
    })

    it('rejects arithmetic on nil and booleans', () => {
      expect(runtimeError('nil * 2').message).toBe('Cannot apply * to nil and int')
      expect(runtimeError('true - 1.5').message).toBe('Cannot apply - to bool and float')
    })

    it('rejects negating a string', () => {
      const err = runtimeError('-"a"')
      expect(err.kind).toBe('TypeMismatch')
      expect(err.message).toBe('Cannot negate string')
    })
  })

  describe('comparison', () => {
    it('compares numbers across kinds', () => {
      expect(evalCode('1 < 2.5')).toBe(true)
      expect(evalCode('3 >= 3.0')).toBe(true)
      expect(evalCode('2 <= 1')).toBe(false)
      expect(evalCode('1 == 1.0')).toBe(true)
      expect(evalCode('1 == 1.5')).toBe(false)
    })

    it('compares strings lexicographically', () => {
      expect(evalCode('"abc" < "abd"')).toBe(true)
      expect(evalCode('"b" > "abc"')).toBe(true)
    })

    it('treats values of different kinds as unequal', () => {
      expect(evalCode('1 == "1"')).toBe(false)
      expect(evalCode('nil == false')).toBe(false)
      expect(evalCode('nil != 0')).toBe(true)
      expect(evalCode('nil == nil')).toBe(true)
    })

    it('compares functions by identity', () => {
      expect(evalCode('let f = func () 1; f == f')).toBe(true)
      expect(evalCode('(func () 1) == (func () 1)')).toBe(false)
      expect(evalCode('len == len')).toBe(true)
    })

    it('rejects ordering across kinds', () => {
      const err = runtimeError('1 < "2"')
      expect(err.kind).toBe('TypeMismatch')
      expect(err.message).toBe('Cannot compare int with string using <')
      expect(runtimeError('nil >= nil').message).toBe('Cannot compare nil with nil using >=')
    })
  })
})
