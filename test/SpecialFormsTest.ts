import {withInterpreter} from './Helpers'
import {Sym, unspecified} from '../src/Cairn'
import {expect} from 'chai'

describe('quote', () => {
  it('returns its operand unevaluated', withInterpreter(should => {
    should.equal("'x", Sym.of('x'))
    should.printed('(quote (1 (a b) "c"))', '(1 (a b) "c")')
    should.printed("'()", '()')
    should.printed("''a", '(quote a)')
  }))
  it('handles deeply nested data', withInterpreter(should => {
    const deep = '('.repeat(50000) + '1' + ')'.repeat(50000)
    should.equal(`(pair? '${deep})`, true)
    should.eval(`(define d '${deep})`)
    should.equal(`(equal? d '${deep})`, true)
    should.equal(`(equal? d '${deep.replace('1', '2')})`, false)
    should.equal("(equal? (eval (list 'quote d)) d)", true)
  }))
  it('takes exactly one operand', withInterpreter(should => {
    expect(should.raise('MalformedSpecialForm', '(quote)').why)
      .to.equal('bad quote form: expected 1 operand, got 0')
    expect(should.raise('MalformedSpecialForm', '(quote a b)').why)
      .to.equal('bad quote form: expected 1 operand, got 2')
  }))
})

describe('define', () => {
  it('binds a name and returns unspecified', withInterpreter(should => {
    should.equal('(define x (+ 1 2))', unspecified)
    should.equal('x', 3)
  }))
  it('rebinds an existing name', withInterpreter(should => {
    should.equal('(define x 1) (define x 2) x', 2)
  }))
  it('defines inside a lambda body locally', withInterpreter(should => {
    should.eval('(define f (lambda () (begin (define inner 5) inner)))')
    should.equal('(f)', 5)
    should.raise('UnboundVariable', 'inner')
  }))
  it('names the lambda it binds', withInterpreter(should => {
    should.eval('(define twice (lambda (x) (* 2 x)))')
    expect(should.raise('ArityMismatch', '(twice 1 2)').why)
      .to.equal('twice expects 1 argument, got 2')
  }))
  it('requires a symbol', withInterpreter(should => {
    expect(should.raise('MalformedSpecialForm', '(define 1 2)').why)
      .to.equal('bad define form: expected a symbol, got 1')
    expect(should.raise('MalformedSpecialForm', '(define (f x) x)').why)
      .to.equal('bad define form: expected a symbol, got (f x)')
    expect(should.raise('MalformedSpecialForm', '(define x)').why)
      .to.equal('bad define form: expected 2 operands, got 1')
  }))
})

describe('set!', () => {
  it('changes an existing binding', withInterpreter(should => {
    should.equal('(define x 1) (set! x 2) x', 2)
  }))
  it('changes the binding a closure sees', withInterpreter(should => {
    should.eval(`
      (define make-counter
        (lambda ()
          (begin
            (define c 0)
            (lambda () (begin (set! c (+ c 1)) c)))))
      (define counter (make-counter))`)
    should.equal('(counter)', 1)
    should.equal('(counter)', 2)
    should.equal('((make-counter))', 1)
  }))
  it('refuses to create a binding', withInterpreter(should => {
    expect(should.raise('UnboundVariable', '(set! fresh 1)').why)
      .to.equal('unbound variable fresh')
  }))
})

describe('lambda', () => {
  it('evaluates to a procedure', withInterpreter(should => {
    should.printed('(lambda (a b) a)', '#<lambda (a b)>')
    should.printed('(lambda () 1)', '#<lambda ()>')
  }))
  it('rejects malformed parameter lists', withInterpreter(should => {
    expect(should.raise('MalformedSpecialForm', '(lambda (x x) x)').why)
      .to.equal('bad lambda form: duplicate parameter x')
    expect(should.raise('MalformedSpecialForm', '(lambda (x 1) x)').why)
      .to.equal('bad lambda form: parameter is not a symbol: 1')
    expect(should.raise('MalformedSpecialForm', '(lambda x x)').why)
      .to.equal('bad lambda form: parameters must be a list')
    expect(should.raise('MalformedSpecialForm', '(lambda (x))').why)
      .to.equal('bad lambda form: expected 2 operands, got 1')
  }))
})

describe('if', () => {
  it('chooses a branch', withInterpreter(should => {
    should.equal('(if #t 1 2)', 1)
    should.equal('(if #f 1 2)', 2)
  }))
  it('treats everything except #f as true', withInterpreter(should => {
    should.equal('(if 0 1 2)', 1)
    should.equal("(if '() 1 2)", 1)
    should.equal('(if "" 1 2)', 1)
  }))
  it('returns unspecified without an alternative', withInterpreter(should => {
    should.equal('(if #f 1)', unspecified)
  }))
  it('evaluates only the chosen branch', withInterpreter(should => {
    should.equal('(if #t 1 (car 1))', 1)
    should.equal('(if #f (car 1) 2)', 2)
  }))
  it('takes two or three operands', withInterpreter(should => {
    expect(should.raise('MalformedSpecialForm', '(if)').why)
      .to.equal('bad if form: expected 2 or 3 operands, got 0')
    expect(should.raise('MalformedSpecialForm', '(if 1 2 3 4)').why)
      .to.equal('bad if form: expected 2 or 3 operands, got 4')
  }))
})

describe('begin', () => {
  it('returns its last value', withInterpreter(should => {
    should.equal('(begin 1 2 3)', 3)
    should.equal('(begin 1)', 1)
  }))
  it('evaluates in order', withInterpreter(should => {
    should.eval('(begin (display 1) (display 2) (display 3))')
    expect(should.displayed).to.equal('123')
  }))
  it('evaluates thousands of operands', withInterpreter(should => {
    should.equal(`(begin ${'1 '.repeat(20000)}2)`, 2)
    should.equal(`(+ ${'1 '.repeat(20000)})`, 20000)
  }))
  it('needs at least one operand', withInterpreter(should => {
    expect(should.raise('MalformedSpecialForm', '(begin)').why)
      .to.equal('bad begin form: expected at least 1 operand, got 0')
  }))
})

describe('and and or', () => {
  it('return the value that decided the result', withInterpreter(should => {
    should.equal('(and 1 2)', 2)
    should.equal('(and 1 #f 3)', false)
    should.equal('(or #f 2)', 2)
    should.equal('(or #f #f)', false)
  }))
  it('have identities when empty', withInterpreter(should => {
    should.equal('(and)', true)
    should.equal('(or)', false)
  }))
  it('stop evaluating early', withInterpreter(should => {
    should.equal('(or 1 (car 1))', 1)
    should.equal('(and #f (car 1))', false)
  }))
})

describe('special forms as values', () => {
  it('are bound to their keywords', withInterpreter(should => {
    should.printed('if', '#<special-form if>')
    should.printed('call-with-current-continuation', '#<special-form call/cc>')
  }))
  it('keep their rules under another name', withInterpreter(should => {
    should.equal('(define my-if if) (my-if #f 1 2)', 2)
  }))
  it('can be shadowed by local bindings', withInterpreter(should => {
    should.equal('((lambda (if) (if 1 2 3)) +)', 6)
  }))
  it('are not procedures', withInterpreter(should => {
    should.equal('(procedure? if)', false)
  }))
})
