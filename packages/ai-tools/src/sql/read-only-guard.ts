// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-tools/sql/read-only-guard`
 * Purpose: Rejects data- or schema-modifying SQL before it reaches the database.
 * Scope: Lexical check only. Does NOT parse SQL or execute anything.
 * Invariants:
 *   - KEYWORDS_OUTSIDE_LITERALS: comments, string literals, dollar-quoted bodies and quoted identifiers
 *     are blanked before matching, so `"delete"` as a column or `'drop'` as a value is allowed
 *   - CASE_INSENSITIVE_WORDS: keywords match case-insensitively on word boundaries
 *   - FAIL_CLOSED: the body of an unterminated literal or comment is inspected as code
 *   - POSTGRES_LEXING: E'' strings honour backslash escapes; `$` opens a dollar quote only outside an identifier
 *   - SINGLE_STATEMENT: a `;` followed by anything but whitespace or further `;` is rejected, so a
 *     statement cannot end the surrounding read-only transaction and run another
 * Side-effects: none
 * Links: tools/sql-query.ts
 * @public
 */

const MODIFYING_KEYWORDS = [
  "insert",
  "update",
  "delete",
  "drop",
  "alter",
  "truncate",
  "create",
  "grant",
  "revoke",
  "merge",
] as const;

const TRANSACTION_KEYWORDS = ["commit", "rollback", "begin"] as const;

export const WRITE_KEYWORDS = [
  ...MODIFYING_KEYWORDS,
  ...TRANSACTION_KEYWORDS,
] as const;

export type WriteKeyword = (typeof WRITE_KEYWORDS)[number];

export type ReadOnlyCheck =
  | { readonly ok: true }
  | { readonly ok: false; readonly keyword: WriteKeyword }
  | { readonly ok: false; readonly reason: "multiple_statements" };

export const MULTIPLE_STATEMENTS_MESSAGE =
  "Only a single statement is permitted per query.";

// Modifying keywords are reported ahead of transaction control
const KEYWORD_PASSES = [MODIFYING_KEYWORDS, TRANSACTION_KEYWORDS].map(
  (words) => new RegExp(`\\b(${words.join("|")})\\b`, "i")
);
const DOLLAR_TAG_RE = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;
const IDENTIFIER_CHAR_RE = /[A-Za-z0-9_$]/;
const STATEMENT_BREAK_RE = /;[\s;]*\S/;

function isIdentifierChar(ch: string | undefined): boolean {
  return ch !== undefined && IDENTIFIER_CHAR_RE.test(ch);
}

function isWriteKeyword(word: string): word is WriteKeyword {
  return WRITE_KEYWORDS.some((k) => k === word);
}

/**
 * Replace comments, literals and quoted identifiers with single spaces.
 * Block comments nest, as in PostgreSQL. Backslash escapes only inside E'' strings.
 */
export function blankSqlLiterals(sql: string): string {
  let out = "";
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];
    const prev = sql[i - 1];

    // -- line comment
    if (ch === "-" && next === "-") {
      const end = sql.indexOf("\n", i + 2);
      i = end === -1 ? sql.length : end;
      out += " ";
      continue;
    }

    // /* block comment */ (nesting)
    if (ch === "/" && next === "*") {
      const bodyStart = i + 2;
      let depth = 1;
      i += 2;
      while (i < sql.length && depth > 0) {
        if (sql[i] === "/" && sql[i + 1] === "*") {
          depth++;
          i += 2;
        } else if (sql[i] === "*" && sql[i + 1] === "/") {
          depth--;
          i += 2;
        } else {
          i++;
        }
      }
      out += depth > 0 ? ` ${sql.slice(bodyStart)}` : " ";
      continue;
    }

    // E'string' with backslash escapes
    if ((ch === "E" || ch === "e") && next === "'" && !isIdentifierChar(prev)) {
      const bodyStart = i + 2;
      let closed = false;
      i += 2;
      while (i < sql.length) {
        if (sql[i] === "\\") {
          i += 2;
          continue;
        }
        if (sql[i] === "'") {
          if (sql[i + 1] === "'") {
            i += 2;
            continue;
          }
          i++;
          closed = true;
          break;
        }
        i++;
      }
      out += closed ? " " : ` ${sql.slice(bodyStart)}`;
      continue;
    }

    // 'string' and "identifier", doubled quote escapes itself
    if (ch === "'" || ch === '"') {
      const bodyStart = i + 1;
      let closed = false;
      i++;
      while (i < sql.length) {
        if (sql[i] === ch) {
          if (sql[i + 1] === ch) {
            i += 2;
            continue;
          }
          i++;
          closed = true;
          break;
        }
        i++;
      }
      out += closed ? " " : ` ${sql.slice(bodyStart)}`;
      continue;
    }

    // $tag$ body $tag$; inside an identifier `$` is an ordinary character
    if (ch === "$" && !isIdentifierChar(prev)) {
      const tag = DOLLAR_TAG_RE.exec(sql.slice(i));
      if (tag) {
        const delimiter = tag[0];
        const bodyStart = i + delimiter.length;
        const end = sql.indexOf(delimiter, bodyStart);
        if (end === -1) {
          out += ` ${sql.slice(bodyStart)}`;
          i = sql.length;
        } else {
          out += " ";
          i = end + delimiter.length;
        }
        continue;
      }
    }

    out += ch;
    i++;
  }

  return out;
}

/**
 * Check that a statement is read-only.
 */
export function checkReadOnlySql(sql: string): ReadOnlyCheck {
  const code = blankSqlLiterals(sql);
  for (const pass of KEYWORD_PASSES) {
    const word = pass.exec(code)?.[1]?.toLowerCase();
    if (word !== undefined && isWriteKeyword(word)) {
      return { ok: false, keyword: word };
    }
  }
  if (STATEMENT_BREAK_RE.test(code)) {
    return { ok: false, reason: "multiple_statements" };
  }
  return { ok: true };
}

export function readOnlyDenialMessage(keyword: WriteKeyword): string {
  return `Only read-only queries are permitted; '${keyword.toUpperCase()}' statements are rejected.`;
}

/**
 * Message for a failed check, as shown to the model.
 */
export function readOnlyCheckMessage(check: ReadOnlyCheck): string | null {
  if (check.ok) return null;
  return "keyword" in check
    ? readOnlyDenialMessage(check.keyword)
    : MULTIPLE_STATEMENTS_MESSAGE;
}
