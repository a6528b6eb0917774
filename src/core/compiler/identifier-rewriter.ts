/**
 * Connection alias → linked server name.
 */
export type LinkedServerMap = Readonly<Record<string, string>>;

const FROM_OR_JOIN_LINE = /^\s*(?:FROM|(?:INNER|LEFT|RIGHT|FULL)\s+JOIN)\s/i;
const NAME_TOKEN = /[A-Za-z_#@$][\w#@$]*(?:\.[A-Za-z_#@$][\w#@$]*)*/g;

/**
 * Rewrites `<alias>.<database>.<table>` references for execution through a
 * linked server: `[<linked>].[<database>].dbo.[<table>]`.
 *
 * Only FROM and JOIN lines are scanned. Tokens with any other number of parts
 * (columns, keywords, two- or four-part names) and tokens whose alias is not
 * mapped are left as they are. Text inside string literals is skipped.
 */
export class IdentifierRewriter {
  constructor(private readonly linkedServers: LinkedServerMap = {}) {}

  get isEmpty(): boolean {
    return Object.keys(this.linkedServers).length === 0;
  }

  /**
   * @returns the four-part name, or undefined when the token is not rewritten
   */
  rewriteToken(token: string): string | undefined {
    const parts = token.split('.');
    if (parts.length !== 3 || parts.some(part => !part)) return undefined;
    const [alias, database, table] = parts;
    if (!Object.prototype.hasOwnProperty.call(this.linkedServers, alias)) return undefined;
    const linked = this.linkedServers[alias];
    return `[${linked}].[${database}].dbo.[${table}]`;
  }

  rewriteLine(line: string): string {
    if (!FROM_OR_JOIN_LINE.test(line)) return line;
    return splitOutsideLiterals(line)
      .map(segment =>
        segment.literal
          ? segment.text
          : segment.text.replace(NAME_TOKEN, token => this.rewriteToken(token) ?? token)
      )
      .join('');
  }

  rewrite(sql: string): string {
    if (this.isEmpty) return sql;
    return sql.split('\n').map(line => this.rewriteLine(line)).join('\n');
  }
}

interface Segment {
  text: string;
  literal: boolean;
}

const splitOutsideLiterals = (line: string): Segment[] => {
  const segments: Segment[] = [];
  let start = 0;
  let i = 0;
  while (i < line.length) {
    if (line[i] !== "'") {
      i++;
      continue;
    }
    if (i > start) segments.push({ text: line.slice(start, i), literal: false });
    let end = i + 1;
    while (end < line.length) {
      if (line[end] === "'" && line[end + 1] === "'") {
        end += 2;
        continue;
      }
      if (line[end] === "'") break;
      end++;
    }
    const stop = Math.min(end + 1, line.length);
    segments.push({ text: line.slice(i, stop), literal: true });
    start = stop;
    i = stop;
  }
  if (start < line.length) segments.push({ text: line.slice(start), literal: false });
  return segments;
};
