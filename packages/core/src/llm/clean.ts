/**
 * Cleanup of raw model output into a single-line, semicolon-terminated SQL
 * string. The validator relies on this shape.
 */

const LABELS = ['SQL:', 'Query:'];

export function cleanGeneratedSql(raw: string): string {
  let sql = raw.replaceAll('```sql', '').replaceAll('```', '');
  for (const label of LABELS) {
    sql = sql.replaceAll(label, '');
  }

  sql = sql.split(/\s+/).filter((part) => part.length > 0).join(' ');

  if (!sql.endsWith(';')) {
    sql += ';';
  }
  return sql;
}
