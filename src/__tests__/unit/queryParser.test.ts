import { parseQuery, tokenize } from '../../utils/queryParser'
import { PsfError } from '../../utils/errors'

describe('queryParser', () => {
  describe('tokenize', () => {
    it('separates keywords, identifiers, literals and operators', () => {
      const tokens = tokenize("select course from psf where score >= 0.5 and section <> 'B'")
      expect(tokens.map((t) => `${t.type}:${t.value}`)).toEqual([
        'keyword:SELECT',
        'identifier:course',
        'keyword:FROM',
        'identifier:psf',
        'keyword:WHERE',
        'identifier:score',
        'operator:>=',
        'number:0.5',
        'keyword:AND',
        'identifier:section',
        'operator:<>',
        'string:B',
        'eof:',
      ])
    })

    it('unescapes doubled quotes', () => {
      const [token] = tokenize("'it''s'")
      expect(token).toEqual({ type: 'string', value: "it's", position: 0 })
    })

    it('reports unterminated text with its position', () => {
      expect(() => tokenize("a = 'open")).toThrow('unterminated quoted text at position 5')
    })

    it('rejects unknown characters', () => {
      expect(() => tokenize('a # b')).toThrow("unexpected character '#' at position 3")
    })
  })

  describe('parseQuery', () => {
    it('parses a projection with a filter', () => {
      expect(parseQuery('SELECT course FROM psf WHERE section == "B2"')).toEqual({
        projection: { type: 'columns', columns: ['course'] },
        table: 'psf',
        where: {
          type: 'comparison',
          operator: '=',
          left: { type: 'column', name: 'section' },
          right: { type: 'quoted', text: 'B2' },
        },
        orderBy: [],
        limit: undefined,
      })
    })

    it('parses star, ordering and limit', () => {
      const query = parseQuery('select * from psf order by course desc, section limit 3;')
      expect(query.projection).toEqual({ type: 'all' })
      expect(query.orderBy).toEqual([
        { column: 'course', descending: true },
        { column: 'section', descending: false },
      ])
      expect(query.limit).toBe(3)
    })

    it('binds AND tighter than OR', () => {
      const query = parseQuery("SELECT * FROM psf WHERE a = 1 OR b = 2 AND c = 3")
      expect(query.where).toMatchObject({
        type: 'logical',
        operator: 'OR',
        left: { type: 'comparison' },
        right: { type: 'logical', operator: 'AND' },
      })
    })

    it('parses IS NOT NULL, NOT and negative numbers', () => {
      const query = parseQuery('SELECT * FROM psf WHERE NOT (score IS NOT NULL) OR score > -1')
      expect(query.where).toEqual({
        type: 'logical',
        operator: 'OR',
        left: { type: 'not', operand: { type: 'isNull', operand: { type: 'column', name: 'score' }, negated: true } },
        right: { type: 'comparison', operator: '>', left: { type: 'column', name: 'score' }, right: { type: 'literal', value: -1 } },
      })
    })

    it('rejects an empty query', () => {
      expect(() => parseQuery('   ')).toThrow('query is empty')
    })

    it('reports what it expected and where', () => {
      expect(() => parseQuery('SELECT course psf')).toThrow("expected FROM but found 'psf' at position 15")
    })

    it('rejects trailing tokens', () => {
      expect(() => parseQuery('SELECT * FROM psf extra')).toThrow("unexpected 'extra' at position 19")
    })

    it('rejects a fractional LIMIT', () => {
      expect(() => parseQuery('SELECT * FROM psf LIMIT 1.5')).toThrow('LIMIT expects a whole number')
    })

    it('rejects a negative LIMIT', () => {
      expect(() => parseQuery('SELECT * FROM psf LIMIT -1')).toThrow('LIMIT expects a whole number')
    })

    it('raises query errors', () => {
      try {
        parseQuery('DELETE FROM psf')
        throw new Error('expected a failure')
      } catch (err) {
        expect(err).toBeInstanceOf(PsfError)
        expect(err).toMatchObject({ code: 'QUERY_ERROR' })
      }
    })
  })
})
