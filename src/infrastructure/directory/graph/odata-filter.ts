/**
 * OData `$filter` helpers for directory queries.
 *
 * String literals double embedded single quotes (OData escaping) and
 * percent-encode `&`, which the Graph SDK passes through unencoded and would
 * otherwise split the query string.
 */
export function odataStringLiteral(value: string): string {
  return `'${value.replace(/'/g, "''").replace(/&/g, '%26')}'`;
}

export function equalsFilter(property: string, value: string): string {
  return `${property} eq ${odataStringLiteral(value)}`;
}
