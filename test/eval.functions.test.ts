import { describe, expect, it } from 'vitest'
import { formatValue } from '../src/value'
import { evalCode, evalWithOutput, runtimeError } from './helpers'

describe('eval functions', () => {
  it('calls declared functions', () => {
    expect(evalCode('func add(a, b) { a + b }; add(2, 3)')).toBe(5n)
    expect(evalCode('func square(n) n * n; square(9)')).toBe(81n)
  })

  it('recurses', () => {
    const factorial = 'func fact(n) { if n <= 1 then 1 else n * fact(n - 1) }'
    expect(evalCode(`${factorial}; fact(5)`)).toBe(120n)
    expect(evalCode(`${factorial}; fact(25)`)).toBe(15511210043330985984000000n)
    expect(evalCode('func fib(n) if n < 2 then n else fib(n - 1) + fib(n - 2); fib(15)')).toBe(610n)
  })

  it('recurses through a variable bound after the closure was created', () => {
    const code = 'let fact = func (n) if n <= 1 then 1 else n * fact(n - 1); fact(5)'
    expect(evalCode(code)).toBe(120n)
  })

  it('invokes anonymous functions immediately', () => {
    expect(evalCode('(func (a) a + 1)(1)')).toBe(2n)
  })

  it('passes functions as values', () => {
    expect(evalCode('func twice(f, x) f(f(x)); twice(func (n) n * 2, 5)')).toBe(20n)
    expect(evalCode('func adder(n) func (x) x + n; adder(10)(5)')).toBe(15n)
  })

  it('keeps independent state per closure', () => {
    const code = `
      func makeCounter() {
        let count = 0
        func () { count += 1; count }
      }
      let a = makeCounter()
      let b = makeCounter()
      a(); a(); b()
      a()
    `
    expect(evalCode(code)).toBe(3n)
  })

  it('captures variables by reference', () => {
    expect(evalCode('let x = 1; let f = func () x; x = 2; f()')).toBe(2n)
  })

  it('resolves free variables lexically', () => {
    const code = `
      let x = "global"
      func show() x
      func test() { let x = "local"; show() }
      test()
    `
    expect(evalCode(code)).toBe('global')
  })

  it('binds a named function to itself even after the outer name is rebound', () => {
    const code = `
      func countdown(n) if n == 0 then "done" else countdown(n - 1)
      let saved = countdown
      countdown = nil
      saved(3)
    `
    expect(evalCode(code)).toBe('done')
  })

  it('gives each call a fresh frame for its parameters', () => {
    expect(evalCode('let n = "outer"; func f(n) n; f(1); n')).toBe('outer')
  })

  it('evaluates the callee before the arguments, left to right', () => {
    const { lines } = evalWithOutput('func pair(a, b) nil; pair(print("a"), print("b"))')
    expect(lines).toEqual(['a', 'b'])
  })

  it('displays functions by name', () => {
    expect(formatValue(evalCode('func greet() "hi"; greet'))).toBe('<func greet>')
    expect(formatValue(evalCode('func () 1'))).toBe('<func>')
    expect(formatValue(evalCode('print'))).toBe('<native print>')
  })

  describe('errors', () => {
    it('rejects calling a non-function', () => {
      const err = runtimeError('let x = 5; x(1)')
      expect(err.kind).toBe('NotCallable')
      expect(err.message).toBe('Cannot call a value of type int')
      expect(err.span).toEqual({ start: 11, end: 12 })
      expect(runtimeError('"s"()').message).toBe('Cannot call a value of type string')
    })

    it('does not evaluate arguments of a non-callable', () => {
      const lines: string[] = []
      const err = runtimeError('nil(print(1))', { write: (text) => lines.push(text) })
      expect(err.kind).toBe('NotCallable')
      expect(lines).toEqual([])
    })

    it('rejects the wrong number of arguments', () => {
      const err = runtimeError('func f(a, b) a; f(1)')
      expect(err.kind).toBe('ArityMismatch')
      expect(err.message).toBe('Function "f" expects 2 arguments but got 1')
      expect(err.span).toEqual({ start: 16, end: 20 })
    })

    it('names anonymous functions and builtins in arity errors', () => {
      expect(runtimeError('(func (x) x)()').message).toBe(
        'Anonymous function expects 1 argument but got 0'
      )
      expect(runtimeError('sqrt(1, 2)').message).toBe('Builtin "sqrt" expects 1 argument but got 2')
    })

    it('propagates errors raised inside a call', () => {
      const err = runtimeError('func boom() 1 / 0; boom()')
      expect(err.kind).toBe('DivisionByZero')
      expect(err.span).toEqual({ start: 12, end: 17 })
    })
  })
})
