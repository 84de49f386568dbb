import { describe, expect, it } from 'vitest'
import { evalCode, runtimeError } from './helpers'

describe('eval math', () => {
  it('computes square roots', () => {
    expect(evalCode('sqrt(2)')).toBe(Math.SQRT2)
    expect(evalCode('sqrt(16)')).toBe(4)
    expect(evalCode('sqrt(-1)')).toBeNaN()
  })

  it('rejects non-numeric arguments', () => {
    const err = runtimeError('sqrt("x")')
    expect(err.kind).toBe('TypeMismatch')
    expect(err.message).toBe('sqrt expects a number, got string')
    expect(runtimeError('atan2(1, nil)').message).toBe('atan2 expects a number, got nil')
  })

  it('evaluates trigonometric and exponential functions', () => {
    expect(evalCode('sin(0)')).toBe(0)
    expect(evalCode('cos(0)')).toBe(1)
    expect(evalCode('atan2(1, 1)')).toBe(Math.atan2(1, 1))
    expect(evalCode('exp(0)')).toBe(1)
    expect(evalCode('ln(1)')).toBe(0)
    expect(evalCode('log10(1000)')).toBeCloseTo(3)
    expect(evalCode('log2(8)')).toBeCloseTo(3)
    expect(evalCode('hypot(3, 4)')).toBe(5)
  })

  it('preserves the kind in abs', () => {
    expect(evalCode('abs(-3)')).toBe(3n)
    expect(evalCode('abs(-2.5)')).toBe(2.5)
  })

  it('rounds to Int', () => {
    expect(evalCode('floor(2.7)')).toBe(2n)
    expect(evalCode('floor(-2.1)')).toBe(-3n)
    expect(evalCode('ceil(2.1)')).toBe(3n)
    expect(evalCode('round(2.5)')).toBe(3n)
    expect(evalCode('round(-2.5)')).toBe(-3n)
    expect(evalCode('round(2.4)')).toBe(2n)
    expect(evalCode('floor(5)')).toBe(5n)
  })

  it('rejects rounding infinities', () => {
    const err = runtimeError('floor(inf)')
    expect(err.kind).toBe('TypeMismatch')
    expect(err.message).toBe('floor cannot convert Infinity to int')
  })

  it('follows the ** rules in pow', () => {
    expect(evalCode('pow(2, 10)')).toBe(1024n)
    expect(evalCode('pow(2, 0.5)')).toBe(Math.SQRT2)
    expect(evalCode('pow(4, -1)')).toBe(0.25)
  })

  it('returns the chosen operand from min and max', () => {
    expect(evalCode('min(3, 1.5)')).toBe(1.5)
    expect(evalCode('max(3, 1.5)')).toBe(3n)
    expect(evalCode('min(2, 2.0)')).toBe(2n)
  })

  it('defines constants', () => {
    expect(evalCode('pi')).toBe(Math.PI)
    expect(evalCode('e')).toBe(Math.E)
    expect(evalCode('tau')).toBe(2 * Math.PI)
    expect(evalCode('inf')).toBe(Number.POSITIVE_INFINITY)
    expect(evalCode('-inf < 0')).toBe(true)
  })
})
