/**
 * Validator tests: parsing, the five checks in order, and the verdict shape.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseSql, tokenize, leadingDmlKeyword } from '../parse.js';
import { extractTableNames, findForbiddenKeyword, findUnknownTables } from '../rules.js';
import { DefaultPolicyEngine, validateSql } from '../engine.js';
import { FORBIDDEN_KEYWORDS } from '../types.js';

const RETAIL_TABLES = new Set(['stores', 'customers', 'products', 'orders', 'order_items']);

// ── Parsing ──────────────────────────────────────────────────────────

describe('tokenize', () => {
  it('splits statements on semicolons outside quotes', () => {
    const statements = tokenize("SELECT 'a;b' FROM stores; SELECT 1;");
    assert.equal(statements.length, 2);
    assert.deepEqual(
      statements[0].map((t) => t.value),
      ['SELECT', "'a;b'", 'FROM', 'stores'],
    );
  });

  it('drops line and block comments', () => {
    const statements = tokenize('-- heading\nSELECT /* cols */ id FROM stores');
    assert.deepEqual(
      statements[0].map((t) => t.value),
      ['SELECT', 'id', 'FROM', 'stores'],
    );
  });

  it('yields no statements for comments and bare semicolons', () => {
    assert.deepEqual(tokenize(' ;; -- nothing here'), []);
  });

  it('treats a doubled quote as an escape', () => {
    const statements = tokenize("SELECT 'it''s' FROM stores");
    assert.equal(statements[0][1].value, "'it''s'");
    assert.equal(statements[0][1].type, 'string');
  });
});

describe('leadingDmlKeyword', () => {
  it('finds SELECT after a CTE prefix', () => {
    const [tokens] = tokenize('WITH x AS (SELECT 1) SELECT * FROM x');
    assert.equal(leadingDmlKeyword(tokens), 'SELECT');
  });

  it('returns undefined when no DML keyword is present', () => {
    const [tokens] = tokenize('PRAGMA table_info(stores)');
    assert.equal(leadingDmlKeyword(tokens), undefined);
  });
});

describe('parseSql', () => {
  it('parses a simple SELECT', () => {
    const result = parseSql('SELECT * FROM stores;');
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.equal(result.kind, 'select');
      assert.equal(result.statementCount, 1);
      assert.equal(result.normalizedSql, 'SELECT * FROM stores');
    }
  });

  it('counts multiple statements', () => {
    const result = parseSql('SELECT 1; SELECT 2;');
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.equal(result.statementCount, 2);
    }
  });

  it('classifies UPDATE as update', () => {
    const result = parseSql("UPDATE stores SET name = 'x'");
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.equal(result.kind, 'update');
    }
  });

  it('returns an error for empty SQL', () => {
    const result = parseSql('   ');
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error, 'unparseable');
    }
  });
});

// ── Rules ────────────────────────────────────────────────────────────

describe('extractTableNames', () => {
  it('extracts a single table', () => {
    assert.deepEqual(extractTableNames('SELECT * FROM stores;'), ['stores']);
  });

  it('extracts joined tables', () => {
    assert.deepEqual(
      extractTableNames('SELECT * FROM stores JOIN customers ON stores.id = customers.store_id;'),
      ['stores', 'customers'],
    );
  });

  it('ignores aliases and deduplicates', () => {
    assert.deepEqual(
      extractTableNames(
        'SELECT * FROM orders o JOIN order_items oi ON o.id = oi.order_id JOIN orders o2 ON o2.id = o.id;',
      ),
      ['orders', 'order_items'],
    );
  });

  it('is case-insensitive on FROM and JOIN', () => {
    assert.deepEqual(extractTableNames('select * from Stores left join Orders on 1 = 1'), ['Stores', 'Orders']);
  });
});

describe('findForbiddenKeyword', () => {
  it('reports the keyword that appears first in the text', () => {
    assert.equal(findForbiddenKeyword('UPDATE stores SET x = 1; DROP TABLE stores'), 'UPDATE');
  });

  it('matches whole words only', () => {
    assert.equal(findForbiddenKeyword('SELECT created_at, updated_by FROM stores'), undefined);
  });

  it('tells EXEC and EXECUTE apart', () => {
    assert.equal(findForbiddenKeyword('EXECUTE sp_report'), 'EXECUTE');
    assert.equal(findForbiddenKeyword('exec sp_report'), 'EXEC');
  });
});

describe('findUnknownTables', () => {
  it('compares case-insensitively', () => {
    assert.deepEqual(findUnknownTables(['STORES', 'Users'], ['stores']), ['Users']);
  });
});

// ── validateSql ──────────────────────────────────────────────────────

describe('validateSql', () => {
  it('accepts a SELECT on a known table', () => {
    const verdict = validateSql('SELECT * FROM stores;', new Set(['stores', 'customers']));
    assert.equal(verdict.isValid, true);
    assert.equal(verdict.reason, undefined);
    assert.deepEqual([...verdict.tablesReferenced], ['stores']);
  });

  it('rejects DROP and names the keyword', () => {
    const verdict = validateSql('DROP TABLE stores;', new Set(['stores']));
    assert.equal(verdict.isValid, false);
    assert.equal(verdict.code, 'FORBIDDEN_KEYWORD');
    assert.equal(verdict.reason, 'Forbidden keyword found: DROP');
    assert.equal(verdict.tablesReferenced.size, 0);
  });

  it('rejects an unknown table and names it', () => {
    const verdict = validateSql('SELECT * FROM users;', new Set(['stores']));
    assert.equal(verdict.isValid, false);
    assert.equal(verdict.code, 'UNKNOWN_TABLE');
    assert.equal(verdict.reason, 'Invalid table names: users');
  });

  it('lists every unknown table, not just the first', () => {
    const verdict = validateSql(
      'SELECT * FROM users u JOIN accounts a ON u.id = a.user_id JOIN stores s ON s.id = a.store_id;',
      RETAIL_TABLES,
    );
    assert.equal(verdict.reason, 'Invalid table names: users, accounts');
  });

  it('rejects empty and comment-only input as unparseable', () => {
    for (const sql of ['', '   ', ';;', '-- just a comment']) {
      const verdict = validateSql(sql, RETAIL_TABLES);
      assert.equal(verdict.isValid, false);
      assert.equal(verdict.code, 'UNPARSEABLE_INPUT');
      assert.equal(verdict.reason, 'unparseable');
    }
  });

  it('rejects every deny-listed keyword in any case, even inside a valid SELECT', () => {
    for (const keyword of FORBIDDEN_KEYWORDS) {
      const mixed = keyword[0] + keyword.slice(1).toLowerCase();
      const verdict = validateSql(`SELECT * FROM stores WHERE name = '${mixed}';`, RETAIL_TABLES);
      assert.equal(verdict.isValid, false, keyword);
      assert.equal(verdict.reason, `Forbidden keyword found: ${keyword}`);
    }
  });

  it('rejects non-SELECT statements that carry no deny-listed keyword', () => {
    for (const sql of ['PRAGMA table_info(stores);', 'REPLACE INTO stores (id) VALUES (1);', 'VACUUM;']) {
      const verdict = validateSql(sql, RETAIL_TABLES);
      assert.equal(verdict.isValid, false, sql);
      assert.equal(verdict.code, 'NON_SELECT_STATEMENT');
      assert.equal(verdict.reason, 'Only SELECT statements are allowed');
    }
  });

  it('checks forbidden keywords before the statement kind', () => {
    const verdict = validateSql("UPDATE stores SET name = 'New Name';", RETAIL_TABLES);
    assert.equal(verdict.reason, 'Forbidden keyword found: UPDATE');
  });

  it('rejects a boolean tautology', () => {
    const verdict = validateSql("SELECT * FROM stores WHERE name = '' OR 1=1;", RETAIL_TABLES);
    assert.equal(verdict.isValid, false);
    assert.equal(verdict.code, 'INJECTION_PATTERN');
    assert.equal(verdict.reason, 'Potential SQL injection detected: Pattern: or.*1=1');
  });

  it('rejects an AND tautology', () => {
    const verdict = validateSql('SELECT * FROM products WHERE price > 10 AND 1=1;', RETAIL_TABLES);
    assert.equal(verdict.reason, 'Potential SQL injection detected: Pattern: and.*1=1');
  });

  it('rejects a quote-terminated statement followed by a comment', () => {
    const verdict = validateSql("SELECT * FROM stores WHERE name = 'x'; --", RETAIL_TABLES);
    assert.equal(verdict.reason, "Potential SQL injection detected: Pattern: ';.*--");
  });

  it('accepts joins across known tables and reports each table once', () => {
    const verdict = validateSql(
      'SELECT s.name, COUNT(o.id) FROM stores s JOIN orders o ON o.store_id = s.id GROUP BY s.name;',
      RETAIL_TABLES,
    );
    assert.equal(verdict.isValid, true);
    assert.deepEqual(new Set(verdict.tablesReferenced), new Set(['stores', 'orders']));
  });

  it('matches schema tables case-insensitively and keeps the name as written', () => {
    const verdict = validateSql('SELECT * FROM STORES;', RETAIL_TABLES);
    assert.equal(verdict.isValid, true);
    assert.deepEqual([...verdict.tablesReferenced], ['STORES']);
  });

  it('accepts column names that merely contain a keyword', () => {
    const verdict = validateSql('SELECT created_at FROM stores;', RETAIL_TABLES);
    assert.equal(verdict.isValid, true);
  });

  it('returns identical verdicts for repeated calls', () => {
    for (const sql of ['SELECT * FROM stores;', 'DROP TABLE stores;', 'SELECT * FROM users;']) {
      assert.deepEqual(validateSql(sql, RETAIL_TABLES), validateSql(sql, RETAIL_TABLES));
    }
  });
});

describe('DefaultPolicyEngine', () => {
  it('validates against its own table allow-list', () => {
    const engine = new DefaultPolicyEngine(['stores']);
    assert.equal(engine.validate('SELECT * FROM stores;').isValid, true);
    assert.equal(engine.validate('SELECT * FROM customers;').isValid, false);
  });

  it('works with the postgres dialect', () => {
    const engine = new DefaultPolicyEngine(RETAIL_TABLES, 'postgres');
    const verdict = engine.validate('SELECT id, name FROM products ORDER BY price DESC LIMIT 5;');
    assert.equal(verdict.isValid, true);
    assert.deepEqual([...verdict.tablesReferenced], ['products']);
  });

  it('exposes the configured tables', () => {
    const engine = new DefaultPolicyEngine(['stores', 'orders']);
    assert.deepEqual([...engine.getSchemaTables()], ['stores', 'orders']);
  });
});
