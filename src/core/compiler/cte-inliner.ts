import type { CteDefinition } from '../../query-builder/clause-types.js';

/**
 * Prefixes a statement with its common table expressions.
 * Bodies are opaque text and are never parsed or rewritten here.
 */
export class CteInliner {
  /**
   * @returns `WITH a AS (\n<body>\n),\n  b AS (\n<body>\n)\n` or an empty string
   */
  static compileCtes(ctes: readonly CteDefinition[]): string {
    if (!ctes.length) return '';
    const defs = ctes.map(cte => `${cte.name} AS (\n${cte.body}\n)`).join(',\n  ');
    return `WITH ${defs}\n`;
  }

  static inline(sql: string, ctes: readonly CteDefinition[]): string {
    return `${CteInliner.compileCtes(ctes)}${sql}`;
  }
}
