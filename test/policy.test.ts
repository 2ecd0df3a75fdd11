import { describe, it, expect } from 'vitest';
import { checkQuery, leadingToken } from '../src/policy.js';

describe('checkQuery', () => {
  it('allows statements that start with SELECT in any case', () => {
    expect(checkQuery('SELECT * FROM users')).toEqual({ allowed: true });
    expect(checkQuery('select 1')).toEqual({ allowed: true });
    expect(checkQuery('SeLeCt name FROM users')).toEqual({ allowed: true });
  });

  it('trims leading whitespace before checking', () => {
    expect(checkQuery(' select 1')).toEqual({ allowed: true });
    expect(checkQuery('\n\t  SELECT 1')).toEqual({ allowed: true });
  });

  it('allows SELECT directly followed by punctuation', () => {
    expect(checkQuery('SELECT*FROM users')).toEqual({ allowed: true });
  });

  it('denies destructive statements and names the verb', () => {
    expect(checkQuery('DROP TABLE users')).toEqual({
      allowed: false,
      reason: 'DROP statements are not permitted; only SELECT queries are allowed for safety',
    });
    expect(checkQuery('  delete from users')).toEqual({
      allowed: false,
      reason: 'DELETE statements are not permitted; only SELECT queries are allowed for safety',
    });
  });

  it('denies anything else with the generic reason', () => {
    for (const text of ['', '   ', 'EXPLAIN SELECT 1', '-- comment\nSELECT 1', '(SELECT 1)', 'selection', 'select1']) {
      expect(checkQuery(text)).toEqual({ allowed: false, reason: 'Only SELECT queries are allowed for safety' });
    }
  });

  it('denies WITH unless common table expressions are enabled', () => {
    const cte = 'WITH t AS (SELECT 1) SELECT * FROM t';
    expect(checkQuery(cte)).toEqual({ allowed: false, reason: 'Only SELECT queries are allowed for safety' });
    expect(checkQuery(cte, { allowCte: true })).toEqual({ allowed: true });
  });

  it('never allows a statement because it lacks dangerous keywords', () => {
    expect(checkQuery('VALUES (1)').allowed).toBe(false);
    expect(checkQuery('BEGIN').allowed).toBe(false);
  });
});

describe('leadingToken', () => {
  it('returns the lower-cased first word', () => {
    expect(leadingToken('  UPDATE users SET name = 1')).toBe('update');
    expect(leadingToken('*')).toBe('');
  });
});
