import {expect} from 'chai'
import Parser from '../src/Parser'
import {Sym} from '../src/Cairn'

function parse(str: string, filename = '<test>') {
  const parser = new Parser(filename)
  parser.read(str)
  return parser.getOneResult()
}

function parseMany(str: string) {
  const parser = new Parser('<test>')
  parser.read(str)
  return parser.getManyResults()
}

const a = Sym.of('a'), b = Sym.of('b'), c = Sym.of('c'), quote = Sym.of('quote')

describe('the parser', () => {
  it('parses numbers', () => {
    expect(parse('1')).to.equal(1)
    expect(parse('100')).to.equal(100)
    expect(parse('3.14')).to.equal(3.14)
    expect(parse('.5')).to.equal(0.5)
    expect(parse('-1')).to.equal(-1)
    expect(parse('+1')).to.equal(1)
    expect(parse('-753.571')).to.equal(-753.571)
    expect(parse('1e2')).to.equal(100)
    expect(parse('1.23e-45')).to.equal(1.23e-45)
  })
  it('reads only ASCII digits as numbers', () => {
    expect(parse('١٢')).to.equal(Sym.of('١٢'))
    expect(parse('-٣')).to.equal(Sym.of('-٣'))
  })
  it('parses booleans', () => {
    expect(parse('#t')).to.equal(true)
    expect(parse('#f')).to.equal(false)
    expect(parse('#true')).to.equal(true)
    expect(parse('#false')).to.equal(false)
  })
  it('parses symbols', () => {
    expect(parse('foo')).to.equal(Sym.of('foo'))
    expect(parse('set!')).to.equal(Sym.of('set!'))
    expect(parse('call/cc')).to.equal(Sym.of('call/cc'))
    expect(parse('+')).to.equal(Sym.of('+'))
    expect(parse('-')).to.equal(Sym.of('-'))
    expect(parse('...')).to.equal(Sym.of('...'))
    expect(parse('->x')).to.equal(Sym.of('->x'))
  })
  it('parses strings', () => {
    expect(parse('""')).to.equal('')
    expect(parse('"foo bar"')).to.equal('foo bar')
    expect(parse('"(not a list)"')).to.equal('(not a list)')
    expect(parse('"a\\nb\\tc"')).to.equal('a\nb\tc')
    expect(parse('"say \\"hi\\""')).to.equal('say "hi"')
    expect(parse('"back\\\\slash"')).to.equal('back\\slash')
  })
  it('parses () as the empty list', () => {
    expect(parse('()')).to.equal(null)
    expect(parse('[]')).to.equal(null)
  })
  it('parses lists', () => {
    expect(parse('(a)')).to.deep.equal([a])
    expect(parse('(a b c)')).to.deep.equal([a, b, c])
    expect(parse('(a (b c) ())')).to.deep.equal([a, [b, c], null])
    expect(parse('[a [b]]')).to.deep.equal([a, [b]])
    expect(parse('(1 "two" #f)')).to.deep.equal([1, 'two', false])
  })
  it('reads a quote prefix as a quote form', () => {
    expect(parse("'a")).to.deep.equal([quote, a])
    expect(parse("'(a b)")).to.deep.equal([quote, [a, b]])
    expect(parse("''a")).to.deep.equal([quote, [quote, a]])
    expect(parse("(a 'b c)")).to.deep.equal([a, [quote, b], c])
    expect(parse("'()")).to.deep.equal([quote, null])
  })
  it('ignores comments', () => {
    expect(parse('; comment\na')).to.equal(a)
    expect(parse('(a ; comment\n b)')).to.deep.equal([a, b])
    expect(parse('(a #| block |# b)')).to.deep.equal([a, b])
    expect(parse('(a #| outer #| inner |# still outer |# b)'))
      .to.deep.equal([a, b])
    expect(parse('"#| not a comment |#"')).to.equal('#| not a comment |#')
  })
  it('parses several top-level forms', () => {
    expect(parseMany('1 (a) "x"')).to.deep.equal([1, [a], 'x'])
    expect(parseMany('  ; nothing\n')).to.deep.equal([])
  })
  it('reads a form split across chunks', () => {
    const parser = new Parser('<test>')
    parser.read('(a')
    expect(parser.isDone()).to.equal(false)
    parser.read(' #| comment')
    expect(parser.isDone()).to.equal(false)
    parser.read(' |# b)')
    expect(parser.isDone()).to.equal(true)
    expect(parser.getOneResult()).to.deep.equal([a, b])
  })
  it('tracks line numbers', () => {
    const parser = new Parser('file.scm')
    parser.read('(a\n  b\n  ')
    expect(parser.line).to.equal(2)
  })
  it('fails on unbalanced or mismatched parens', () => {
    expect(() => parse(')')).to.throw(Parser.ParseError, 'unexpected )')
    expect(() => parse('(a')).to.throw(Parser.ParseError,
      'unclosed ( (<test>, line 1, col 0)')
    expect(() => parse('(a]')).to.throw(Parser.ParseError,
      'expected ) to close (, got ]')
    expect(() => parse("'")).to.throw(Parser.ParseError,
      'form unterminated due to EOF')
  })
  it('fails on bad strings and tokens', () => {
    expect(() => parse('"a\\qb"')).to.throw(Parser.ParseError, 'invalid escape: \\q')
    expect(() => parse('#x')).to.throw(Parser.ParseError, 'unknown syntax #x')
    expect(() => parse('"abc')).to.throw(Parser.ParseError)
    expect(() => parse('#| abc')).to.throw(Parser.ParseError, 'unclosed block comment')
  })
  it('fails when exactly one form is expected but there are more or fewer', () => {
    expect(() => parse('1 2')).to.throw(Parser.ParseError,
      'more than 1 top-level expression')
    expect(() => parse('')).to.throw(Parser.ParseError,
      'no top-level expression found')
  })
})
