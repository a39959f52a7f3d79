/**
 * Parser for the query subset answered over the in-memory archive table:
 *
 *   SELECT <* | col, ...> FROM psf [WHERE expr] [ORDER BY col [ASC|DESC], ...] [LIMIT n]
 *
 * Keywords are case-insensitive, column names are not. 'text' is a string
 * literal; "text" names a column when the table has one and is otherwise
 * read as a string, resolved at evaluation time.
 */

import { PsfError } from './errors'

export type CellValue = string | number | null

export type ComparisonOperator = '=' | '!=' | '<' | '<=' | '>' | '>='

export type Expression =
  | { type: 'column'; name: string }
  | { type: 'literal'; value: CellValue }
  | { type: 'quoted'; text: string }
  | { type: 'comparison'; operator: ComparisonOperator; left: Expression; right: Expression }
  | { type: 'isNull'; operand: Expression; negated: boolean }
  | { type: 'logical'; operator: 'AND' | 'OR'; left: Expression; right: Expression }
  | { type: 'not'; operand: Expression }

export type Projection = { type: 'all' } | { type: 'columns'; columns: string[] }

export interface OrderTerm {
  column: string
  descending: boolean
}

export interface Query {
  projection: Projection
  table: string
  where?: Expression
  orderBy: OrderTerm[]
  limit?: number
}

type TokenType = 'keyword' | 'identifier' | 'quoted' | 'string' | 'number' | 'operator' | 'punct' | 'eof'

interface Token {
  type: TokenType
  value: string
  position: number
}

const KEYWORDS = new Set(['SELECT', 'FROM', 'WHERE', 'AND', 'OR', 'NOT', 'IS', 'NULL', 'ORDER', 'BY', 'ASC', 'DESC', 'LIMIT'])

const OPERATORS = ['==', '!=', '<>', '<=', '>=', '=', '<', '>']

function fail(message: string, position?: number): never {
  throw new PsfError('QUERY_ERROR', position === undefined ? message : `${message} at position ${position + 1}`)
}

function readDelimited(text: string, start: number, quote: string): { value: string; end: number } {
  let value = ''
  let i = start + 1
  while (i < text.length) {
    if (text[i] === quote) {
      if (text[i + 1] === quote) {
        value += quote
        i += 2
        continue
      }
      return { value, end: i + 1 }
    }
    value += text[i]
    i++
  }
  return fail('unterminated quoted text', start)
}

export function tokenize(text: string): Token[] {
  const tokens: Token[] = []
  let i = 0

  while (i < text.length) {
    const ch = text[i]

    if (/\s/.test(ch)) {
      i++
      continue
    }

    if (ch === "'" || ch === '"') {
      const { value, end } = readDelimited(text, i, ch)
      tokens.push({ type: ch === "'" ? 'string' : 'quoted', value, position: i })
      i = end
      continue
    }

    const number = /^(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?/.exec(text.slice(i))
    if (number) {
      tokens.push({ type: 'number', value: number[0], position: i })
      i += number[0].length
      continue
    }

    const word = /^[A-Za-z_][A-Za-z0-9_]*/.exec(text.slice(i))
    if (word) {
      const upper = word[0].toUpperCase()
      tokens.push(KEYWORDS.has(upper)
        ? { type: 'keyword', value: upper, position: i }
        : { type: 'identifier', value: word[0], position: i })
      i += word[0].length
      continue
    }

    const operator = OPERATORS.find((op) => text.startsWith(op, i))
    if (operator) {
      tokens.push({ type: 'operator', value: operator, position: i })
      i += operator.length
      continue
    }

    if (',()*;-'.includes(ch)) {
      tokens.push({ type: 'punct', value: ch, position: i })
      i++
      continue
    }

    fail(`unexpected character '${ch}'`, i)
  }

  tokens.push({ type: 'eof', value: '', position: text.length })
  return tokens
}

const normalizeOperator = (op: string): ComparisonOperator => {
  switch (op) {
    case '==':
    case '=':
      return '='
    case '<>':
    case '!=':
      return '!='
    case '<':
    case '<=':
    case '>':
    case '>=':
      return op
    default:
      return fail(`unknown operator '${op}'`)
  }
}

class Parser {
  private index = 0

  constructor(private readonly tokens: Token[]) {}

  private peek(): Token {
    return this.tokens[this.index]
  }

  private next(): Token {
    const token = this.tokens[this.index]
    if (token.type !== 'eof') this.index++
    return token
  }

  private isKeyword(value: string): boolean {
    const token = this.peek()
    return token.type === 'keyword' && token.value === value
  }

  private isPunct(value: string): boolean {
    const token = this.peek()
    return token.type === 'punct' && token.value === value
  }

  private expectKeyword(value: string) {
    const token = this.next()
    if (token.type !== 'keyword' || token.value !== value) {
      fail(`expected ${value} but found ${describe(token)}`, token.position)
    }
  }

  private expectPunct(value: string) {
    const token = this.next()
    if (token.type !== 'punct' || token.value !== value) {
      fail(`expected '${value}' but found ${describe(token)}`, token.position)
    }
  }

  private columnName(): string {
    const token = this.next()
    if (token.type === 'identifier' || token.type === 'quoted') return token.value
    return fail(`expected a column name but found ${describe(token)}`, token.position)
  }

  parseQuery(): Query {
    this.expectKeyword('SELECT')
    const projection = this.parseProjection()

    this.expectKeyword('FROM')
    const table = this.columnName()

    let where: Expression | undefined
    if (this.isKeyword('WHERE')) {
      this.next()
      where = this.parseOr()
    }

    const orderBy: OrderTerm[] = []
    if (this.isKeyword('ORDER')) {
      this.next()
      this.expectKeyword('BY')
      do {
        if (orderBy.length) this.next()
        const column = this.columnName()
        let descending = false
        if (this.isKeyword('ASC') || this.isKeyword('DESC')) {
          descending = this.next().value === 'DESC'
        }
        orderBy.push({ column, descending })
      } while (this.isPunct(','))
    }

    let limit: number | undefined
    if (this.isKeyword('LIMIT')) {
      this.next()
      const token = this.next()
      const value = Number(token.value)
      if (token.type !== 'number' || !Number.isInteger(value)) {
        fail(`LIMIT expects a whole number but found ${describe(token)}`, token.position)
      }
      limit = value
    }

    if (this.isPunct(';')) this.next()
    const trailing = this.peek()
    if (trailing.type !== 'eof') {
      fail(`unexpected ${describe(trailing)}`, trailing.position)
    }

    return { projection, table, where, orderBy, limit }
  }

  private parseProjection(): Projection {
    if (this.isPunct('*')) {
      this.next()
      return { type: 'all' }
    }
    const columns = [this.columnName()]
    while (this.isPunct(',')) {
      this.next()
      columns.push(this.columnName())
    }
    return { type: 'columns', columns }
  }

  private parseOr(): Expression {
    let left = this.parseAnd()
    while (this.isKeyword('OR')) {
      this.next()
      left = { type: 'logical', operator: 'OR', left, right: this.parseAnd() }
    }
    return left
  }

  private parseAnd(): Expression {
    let left = this.parseNot()
    while (this.isKeyword('AND')) {
      this.next()
      left = { type: 'logical', operator: 'AND', left, right: this.parseNot() }
    }
    return left
  }

  private parseNot(): Expression {
    if (this.isKeyword('NOT')) {
      this.next()
      return { type: 'not', operand: this.parseNot() }
    }
    return this.parsePredicate()
  }

  private parsePredicate(): Expression {
    const left = this.parseOperand()
    const token = this.peek()

    if (token.type === 'operator') {
      this.next()
      return { type: 'comparison', operator: normalizeOperator(token.value), left, right: this.parseOperand() }
    }

    if (this.isKeyword('IS')) {
      this.next()
      let negated = false
      if (this.isKeyword('NOT')) {
        this.next()
        negated = true
      }
      this.expectKeyword('NULL')
      return { type: 'isNull', operand: left, negated }
    }

    return left
  }

  private parseOperand(): Expression {
    const token = this.next()
    switch (token.type) {
      case 'number':
        return { type: 'literal', value: Number(token.value) }
      case 'string':
        return { type: 'literal', value: token.value }
      case 'quoted':
        return { type: 'quoted', text: token.value }
      case 'identifier':
        return { type: 'column', name: token.value }
      case 'keyword':
        if (token.value === 'NULL') return { type: 'literal', value: null }
        break
      case 'punct':
        if (token.value === '(') {
          const inner = this.parseOr()
          this.expectPunct(')')
          return inner
        }
        if (token.value === '-') {
          const operand = this.next()
          if (operand.type === 'number') return { type: 'literal', value: -Number(operand.value) }
          return fail(`expected a number after '-' but found ${describe(operand)}`, operand.position)
        }
        break
      default:
        break
    }
    return fail(`unexpected ${describe(token)}`, token.position)
  }
}

function describe(token: Token): string {
  switch (token.type) {
    case 'eof':
      return 'end of query'
    case 'string':
      return `'${token.value}'`
    case 'quoted':
      return `"${token.value}"`
    default:
      return `'${token.value}'`
  }
}

export function parseQuery(text: string): Query {
  if (!text.trim()) fail('query is empty')
  return new Parser(tokenize(text)).parseQuery()
}
