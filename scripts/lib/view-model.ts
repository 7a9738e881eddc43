import { UnsupportedViewSqlError } from './error-handler';

/**
 * CTE union view model
 * ====================
 * The patchable view format is a list of named per-year blocks followed by a
 * `union_all` block that selects each of them, and a final select:
 *
 *   CREATE OR ALTER VIEW [eavs_analytics].[eavs_county_reg_union] AS
 *   WITH
 *     a_reg_2016 AS (
 *       SELECT ... FROM [eavs].[eavs_2016].[eavs_county_16_a_reg]
 *     ),
 *     union_all AS (
 *       SELECT * FROM a_reg_2016
 *       UNION ALL
 *       SELECT * FROM a_reg_2018
 *     )
 *   SELECT * FROM union_all
 *
 * parseCteUnionView/serializeCteUnionView convert between that text and a
 * CteUnionView. Serializing a parsed view reproduces serializer output exactly.
 * A hand-edited view is normalized on the way through: union_all is kept as its
 * list of arms, and the text between blocks is not kept at all, so comments there
 * or inside union_all are dropped and the serializer's layout replaces theirs.
 */

export const UNION_CTE_NAME = 'union_all';

export interface CteBlock {
  name: string;
  /** Text between the block's parentheses, verbatim. */
  body: string;
}

export interface CteUnionView {
  /** Everything before the WITH keyword (comments, CREATE ... AS). */
  preamble: string;
  blocks: CteBlock[];
  /** Block names selected by union_all, in order. */
  unionArms: string[];
  /** Everything after union_all's closing parenthesis. */
  finalSelect: string;
}

const WORD_CHAR = /[A-Za-z0-9_]/;
const IDENTIFIER_AT = /[A-Za-z_][A-Za-z0-9_]*/y;
const ARM = /^SELECT\s+\*\s+FROM\s+([A-Za-z_][A-Za-z0-9_]*)$/i;

/**
 * Index just past a comment, string literal, quoted or bracketed identifier starting at `i`;
 * `i` itself when none starts there.
 */
function skipOpaque(sql: string, i: number): number {
  const ch = sql[i];
  const next = sql[i + 1];

  if (ch === '-' && next === '-') {
    const end = sql.indexOf('\n', i);
    return end === -1 ? sql.length : end + 1;
  }
  if (ch === '/' && next === '*') {
    const end = sql.indexOf('*/', i + 2);
    return end === -1 ? sql.length : end + 2;
  }
  if (ch === "'" || ch === '"' || ch === '[') {
    const close = ch === '[' ? ']' : ch;
    let j = i + 1;
    while (j < sql.length) {
      if (sql[j] === close) {
        // doubled quote is an escaped quote
        if (sql[j + 1] === close) {
          j += 2;
          continue;
        }
        return j + 1;
      }
      j++;
    }
    return sql.length;
  }
  return i;
}

function isCommentStart(sql: string, i: number): boolean {
  return (sql[i] === '-' && sql[i + 1] === '-') || (sql[i] === '/' && sql[i + 1] === '*');
}

/** Skip whitespace and comments. */
function skipTrivia(sql: string, i: number): number {
  let pos = i;
  while (pos < sql.length) {
    if (/\s/.test(sql[pos])) {
      pos++;
    } else if (isCommentStart(sql, pos)) {
      pos = skipOpaque(sql, pos);
    } else {
      break;
    }
  }
  return pos;
}

function keywordAt(sql: string, i: number, keyword: string): boolean {
  if (sql.slice(i, i + keyword.length).toUpperCase() !== keyword) {
    return false;
  }
  const before = i > 0 ? sql[i - 1] : '';
  const after = sql[i + keyword.length] ?? '';
  return !WORD_CHAR.test(before) && !WORD_CHAR.test(after);
}

/**
 * First occurrence of `keyword` outside comments, literals and parentheses.
 */
export function findTopLevelKeyword(sql: string, keyword: string, from = 0): number {
  const upper = keyword.toUpperCase();
  let depth = 0;
  let i = from;

  while (i < sql.length) {
    const skipped = skipOpaque(sql, i);
    if (skipped !== i) {
      i = skipped;
      continue;
    }
    const ch = sql[i];
    if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
    } else if (depth === 0 && keywordAt(sql, i, upper)) {
      return i;
    }
    i++;
  }
  return -1;
}

/**
 * Index of the parenthesis closing the one at `open`, or -1 when unbalanced.
 */
export function findMatchingParen(sql: string, open: number): number {
  let depth = 0;
  let i = open;

  while (i < sql.length) {
    const skipped = skipOpaque(sql, i);
    if (skipped !== i) {
      i = skipped;
      continue;
    }
    if (sql[i] === '(') {
      depth++;
    } else if (sql[i] === ')') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
    i++;
  }
  return -1;
}

function readIdentifier(sql: string, i: number): string | null {
  IDENTIFIER_AT.lastIndex = i;
  const match = IDENTIFIER_AT.exec(sql);
  return match ? match[0] : null;
}

function stripComments(text: string): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    if (isCommentStart(text, i)) {
      i = skipOpaque(text, i);
      out += ' ';
      continue;
    }
    const skipped = skipOpaque(text, i);
    if (skipped !== i) {
      out += text.slice(i, skipped);
      i = skipped;
      continue;
    }
    out += text[i];
    i++;
  }
  return out;
}

function parseUnionArms(body: string): string[] {
  const parts = stripComments(body).split(/\bUNION\s+ALL\b/i);
  return parts.map(part => {
    const match = ARM.exec(part.trim());
    if (!match) {
      throw new UnsupportedViewSqlError(`union_all arm "${part.trim()}" is not a plain SELECT * FROM <block>`);
    }
    return match[1];
  });
}

/**
 * Deserialize a CTE union view. Throws UnsupportedViewSqlError for anything outside the format.
 * Block bodies, the preamble and the final select are kept verbatim. The union_all
 * body is reduced to its arm names and comments between blocks are skipped.
 */
export function parseCteUnionView(sql: string): CteUnionView {
  const withIndex = findTopLevelKeyword(sql, 'WITH');
  if (withIndex === -1) {
    throw new UnsupportedViewSqlError('no top-level WITH clause');
  }

  const blocks: CteBlock[] = [];
  let pos = withIndex + 'WITH'.length;
  let lastClose = -1;

  for (;;) {
    pos = skipTrivia(sql, pos);
    const name = readIdentifier(sql, pos);
    if (!name) {
      throw new UnsupportedViewSqlError(`expected a block name at offset ${pos}`);
    }
    pos = skipTrivia(sql, pos + name.length);
    if (!keywordAt(sql, pos, 'AS')) {
      throw new UnsupportedViewSqlError(`expected AS after block "${name}"`);
    }
    pos = skipTrivia(sql, pos + 2);
    if (sql[pos] !== '(') {
      throw new UnsupportedViewSqlError(`expected "(" after "${name} AS"`);
    }
    const close = findMatchingParen(sql, pos);
    if (close === -1) {
      throw new UnsupportedViewSqlError(`unbalanced parentheses in block "${name}"`);
    }
    if (blocks.some(b => b.name.toLowerCase() === name.toLowerCase())) {
      throw new UnsupportedViewSqlError(`block "${name}" is defined twice`);
    }

    blocks.push({ name, body: sql.slice(pos + 1, close) });
    lastClose = close;

    pos = skipTrivia(sql, close + 1);
    if (sql[pos] !== ',') {
      break;
    }
    pos++;
  }

  const unionBlock = blocks.pop();
  if (!unionBlock || unionBlock.name.toLowerCase() !== UNION_CTE_NAME) {
    throw new UnsupportedViewSqlError(`the last block must be ${UNION_CTE_NAME}`);
  }

  return {
    preamble: sql.slice(0, withIndex),
    blocks,
    unionArms: parseUnionArms(unionBlock.body),
    finalSelect: sql.slice(lastClose + 1),
  };
}

export function renderUnionArms(arms: string[]): string {
  return arms.map(arm => `    SELECT * FROM ${arm}`).join('\n    UNION ALL\n');
}

/**
 * Serialize a CTE union view.
 */
export function serializeCteUnionView(view: CteUnionView): string {
  const blocks = view.blocks.map(block => `  ${block.name} AS (${block.body})`);
  blocks.push(`  ${UNION_CTE_NAME} AS (\n${renderUnionArms(view.unionArms)}\n  )`);
  return `${view.preamble}WITH\n${blocks.join(',\n')}${view.finalSelect}`;
}
