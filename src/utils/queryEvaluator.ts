/**
 * Pure evaluator for parsed queries. Takes a table and a query, returns the
 * selected rows; nothing is cached or written anywhere.
 *
 * Comparison rules:
 * - anything compared with NULL is unknown, and unknown rows are filtered out
 * - two numbers compare numerically, as does a number against a string that
 *   parses as one
 * - otherwise both sides compare as strings, by UTF-16 code unit
 */

import { PsfError } from './errors'
import { CellValue, ComparisonOperator, Expression, Query } from './queryParser'

export type Row = ReadonlyMap<string, CellValue>

export interface Table {
  name: string
  columns: readonly string[]
  rows: readonly Row[]
}

export interface ResultSet {
  columns: string[]
  rows: CellValue[][]
}

type Truth = boolean | null

function resolve(expression: Expression, table: Table): Expression {
  switch (expression.type) {
    case 'quoted':
      return table.columns.includes(expression.text)
        ? { type: 'column', name: expression.text }
        : { type: 'literal', value: expression.text }
    case 'column':
      if (!table.columns.includes(expression.name)) {
        throw new PsfError('QUERY_ERROR', `no such column: ${expression.name}`)
      }
      return expression
    case 'literal':
      return expression
    case 'comparison':
    case 'logical':
      return { ...expression, left: resolve(expression.left, table), right: resolve(expression.right, table) }
    case 'isNull':
    case 'not':
      return { ...expression, operand: resolve(expression.operand, table) }
  }
}

function asNumber(value: string | number): number | null {
  if (typeof value === 'number') return value
  if (value.trim() === '') return null
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : null
}

export function compareValues(a: CellValue, b: CellValue): number | null {
  if (a === null || b === null) return null

  if (typeof a === 'number' || typeof b === 'number') {
    const left = asNumber(a)
    const right = asNumber(b)
    if (left !== null && right !== null) return left === right ? 0 : left < right ? -1 : 1
  }

  const left = String(a)
  const right = String(b)
  return left === right ? 0 : left < right ? -1 : 1
}

function applyOperator(operator: ComparisonOperator, order: number): boolean {
  switch (operator) {
    case '=': return order === 0
    case '!=': return order !== 0
    case '<': return order < 0
    case '<=': return order <= 0
    case '>': return order > 0
    case '>=': return order >= 0
  }
}

function truthOf(value: CellValue | Truth): Truth {
  if (value === null || typeof value === 'boolean') return value
  const n = asNumber(value)
  return n !== null && n !== 0
}

function evaluate(expression: Expression, row: Row): CellValue | Truth {
  switch (expression.type) {
    case 'column':
      return row.get(expression.name) ?? null
    case 'literal':
      return expression.value
    case 'quoted':
      return expression.text
    case 'comparison': {
      const left = evaluate(expression.left, row)
      const right = evaluate(expression.right, row)
      if (typeof left === 'boolean' || typeof right === 'boolean') {
        throw new PsfError('QUERY_ERROR', 'cannot compare the result of a condition')
      }
      const order = compareValues(left, right)
      return order === null ? null : applyOperator(expression.operator, order)
    }
    case 'isNull': {
      const isNull = evaluate(expression.operand, row) === null
      return expression.negated ? !isNull : isNull
    }
    case 'not': {
      const truth = truthOf(evaluate(expression.operand, row))
      return truth === null ? null : !truth
    }
    case 'logical': {
      const left = truthOf(evaluate(expression.left, row))
      const right = truthOf(evaluate(expression.right, row))
      if (expression.operator === 'AND') {
        if (left === false || right === false) return false
        return left === null || right === null ? null : true
      }
      if (left === true || right === true) return true
      return left === null || right === null ? null : false
    }
  }
}

function requireColumn(table: Table, name: string): string {
  if (!table.columns.includes(name)) {
    throw new PsfError('QUERY_ERROR', `no such column: ${name}`)
  }
  return name
}

// NULL sorts before every value, as in most SQL engines
function orderCells(a: CellValue, b: CellValue): number {
  if (a === null || b === null) return a === b ? 0 : a === null ? -1 : 1
  return compareValues(a, b) ?? 0
}

export function evaluateQuery(table: Table, query: Query): ResultSet {
  if (query.table !== table.name) {
    throw new PsfError('QUERY_ERROR', `no such table: ${query.table} (the only table is '${table.name}')`)
  }

  const columns = query.projection.type === 'all'
    ? [...table.columns]
    : query.projection.columns.map((name) => requireColumn(table, name))
  const orderBy = query.orderBy.map((term) => ({ ...term, column: requireColumn(table, term.column) }))
  const where = query.where ? resolve(query.where, table) : undefined

  let rows = where ? table.rows.filter((row) => truthOf(evaluate(where, row)) === true) : [...table.rows]

  if (orderBy.length) {
    rows = [...rows].sort((a, b) => {
      for (const term of orderBy) {
        const order = orderCells(a.get(term.column) ?? null, b.get(term.column) ?? null)
        if (order !== 0) return term.descending ? -order : order
      }
      return 0
    })
  }

  if (query.limit !== undefined) {
    rows = rows.slice(0, query.limit)
  }

  return {
    columns,
    rows: rows.map((row) => columns.map((name) => row.get(name) ?? null)),
  }
}
