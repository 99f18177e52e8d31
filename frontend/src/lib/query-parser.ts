/**
 * Feature query language — tokenizer and recursive-descent parser.
 *
 *   query      := orExpr EOF
 *   orExpr     := andExpr ( OR andExpr )*
 *   andExpr    := notExpr ( AND notExpr )*
 *   notExpr    := NOT notExpr | primary
 *   primary    := "(" orExpr ")" | field op value
 *   op         := == | != | < | <= | > | >= | contains
 *
 * Keywords are case-insensitive. Fields and values are bare words or quoted
 * strings ('..' or ".."; backslash escapes the next character).
 * Parsing is purely syntactic; field names are resolved later against the
 * metadata index (see feature-metadata-index.ts).
 */

import { QuerySyntaxError } from "@/lib/errors";

// ─── Tokens ────────────────────────────────────────────────

export type TokenType = "word" | "string" | "op" | "lparen" | "rparen" | "eof";

export interface Token {
  type: TokenType;
  /** Raw source text, quotes included. */
  text: string;
  /** Decoded value (quotes and escapes removed for strings). */
  value: string;
  position: number;
}

export type ComparisonOp = "==" | "!=" | "<" | "<=" | ">" | ">=" | "contains";

const SYMBOL_OPS = ["==", "!=", "<=", ">=", "<", ">"] as const;

const isWhitespace = (ch: string) => /\s/.test(ch);
const isWordBreak = (ch: string) =>
  isWhitespace(ch) || ch === "'" || ch === '"' || ch === "(" || ch === ")" ||
  ch === "=" || ch === "!" || ch === "<" || ch === ">";

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (isWhitespace(ch)) {
      i++;
      continue;
    }

    if (ch === "(" || ch === ")") {
      tokens.push({ type: ch === "(" ? "lparen" : "rparen", text: ch, value: ch, position: i });
      i++;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const start = i;
      let value = "";
      i++;
      let closed = false;
      while (i < source.length) {
        const c = source[i];
        if (c === "\\" && i + 1 < source.length) {
          value += source[i + 1];
          i += 2;
          continue;
        }
        if (c === ch) {
          closed = true;
          i++;
          break;
        }
        value += c;
        i++;
      }
      if (!closed) {
        throw new QuerySyntaxError("Unterminated quoted string", source.slice(start), start);
      }
      tokens.push({ type: "string", text: source.slice(start, i), value, position: start });
      continue;
    }

    const op = SYMBOL_OPS.find((candidate) => source.startsWith(candidate, i));
    if (op) {
      tokens.push({ type: "op", text: op, value: op, position: i });
      i += op.length;
      continue;
    }
    if (ch === "=" || ch === "!") {
      throw new QuerySyntaxError("Unknown operator", ch, i);
    }

    const start = i;
    while (i < source.length && !isWordBreak(source[i])) i++;
    const word = source.slice(start, i);
    tokens.push({ type: "word", text: word, value: word, position: start });
  }

  tokens.push({ type: "eof", text: "", value: "", position: source.length });
  return tokens;
}

// ─── AST ───────────────────────────────────────────────────

export interface FieldRef {
  name: string;
  position: number;
}

export interface ValueRef {
  text: string;
  quoted: boolean;
  position: number;
}

export type QueryExpression =
  | { type: "or"; operands: QueryExpression[] }
  | { type: "and"; operands: QueryExpression[] }
  | { type: "not"; operand: QueryExpression }
  | { type: "comparison"; field: FieldRef; op: ComparisonOp; opPosition: number; value: ValueRef };

// ─── Parser ────────────────────────────────────────────────

function isKeyword(token: Token, keyword: "and" | "or" | "not" | "contains"): boolean {
  return token.type === "word" && token.value.toLowerCase() === keyword;
}

function isAnyKeyword(token: Token): boolean {
  return (
    isKeyword(token, "and") || isKeyword(token, "or") ||
    isKeyword(token, "not") || isKeyword(token, "contains")
  );
}

/** Combined depth of parentheses and NOT operators a query may nest. */
export const MAX_QUERY_NESTING = 64;

class Parser {
  private index = 0;
  private depth = 0;

  constructor(private readonly tokens: Token[]) {}

  private peek(): Token {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (token.type !== "eof") this.index++;
    return token;
  }

  parseQuery(): QueryExpression {
    if (this.peek().type === "eof") {
      throw new QuerySyntaxError("Empty query", "", 0);
    }
    const expr = this.parseOr();
    const trailing = this.peek();
    if (trailing.type !== "eof") {
      throw new QuerySyntaxError("Unexpected token", trailing.text, trailing.position);
    }
    return expr;
  }

  private parseOr(): QueryExpression {
    const operands = [this.parseAnd()];
    while (isKeyword(this.peek(), "or")) {
      this.next();
      operands.push(this.parseAnd());
    }
    return operands.length === 1 ? operands[0] : { type: "or", operands };
  }

  private parseAnd(): QueryExpression {
    const operands = [this.parseNot()];
    while (isKeyword(this.peek(), "and")) {
      this.next();
      operands.push(this.parseNot());
    }
    return operands.length === 1 ? operands[0] : { type: "and", operands };
  }

  private descend(token: Token): void {
    if (++this.depth > MAX_QUERY_NESTING) {
      throw new QuerySyntaxError("Query nests too deeply", token.text, token.position);
    }
  }

  private parseNot(): QueryExpression {
    const token = this.peek();
    if (isKeyword(token, "not")) {
      this.next();
      this.descend(token);
      const operand = this.parseNot();
      this.depth--;
      return { type: "not", operand };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): QueryExpression {
    const token = this.peek();
    if (token.type === "lparen") {
      this.next();
      this.descend(token);
      const inner = this.parseOr();
      const close = this.peek();
      if (close.type !== "rparen") {
        throw new QuerySyntaxError("Expected ')'", close.text, close.position);
      }
      this.next();
      this.depth--;
      return inner;
    }
    return this.parseComparison();
  }

  private parseComparison(): QueryExpression {
    const fieldToken = this.next();
    if (fieldToken.type === "eof") {
      throw new QuerySyntaxError("Expected a field name", "", fieldToken.position);
    }
    if ((fieldToken.type !== "word" && fieldToken.type !== "string") || (fieldToken.type === "word" && isAnyKeyword(fieldToken))) {
      throw new QuerySyntaxError("Expected a field name", fieldToken.text, fieldToken.position);
    }

    const opToken = this.next();
    const symbol = opToken.type === "op" ? SYMBOL_OPS.find((o) => o === opToken.value) : undefined;
    let op: ComparisonOp;
    if (symbol) {
      op = symbol;
    } else if (isKeyword(opToken, "contains")) {
      op = "contains";
    } else {
      throw new QuerySyntaxError("Expected a comparison operator", opToken.text, opToken.position);
    }

    const valueToken = this.next();
    if (valueToken.type !== "word" && valueToken.type !== "string") {
      throw new QuerySyntaxError("Expected a value", valueToken.text, valueToken.position);
    }

    return {
      type: "comparison",
      field: { name: fieldToken.value, position: fieldToken.position },
      op,
      opPosition: opToken.position,
      value: { text: valueToken.value, quoted: valueToken.type === "string", position: valueToken.position },
    };
  }
}

export function parseQuery(source: string): QueryExpression {
  return new Parser(tokenize(source)).parseQuery();
}
