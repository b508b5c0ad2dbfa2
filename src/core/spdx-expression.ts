// License expression parsing and validation.
// Grammar (keywords are case-sensitive):
//   or-expr   := and-expr ("OR" and-expr)*
//   and-expr  := with-expr ("AND" with-expr)*
//   with-expr := primary ("WITH" exception-id)?
//   primary   := license-id ["+"] | "(" or-expr ")"

import { LicenseCatalog, isLicenseRef } from "./spdx-catalog.js";
import { sortedUnique } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type LicenseNode = { kind: "license"; id: string; orLater: boolean };

export type ExpressionNode =
  | LicenseNode
  | { kind: "with"; license: LicenseNode; exception: string }
  | { kind: "and" | "or"; left: ExpressionNode; right: ExpressionNode };

export type ExpressionParseError = {
  message: string;
  position: number;
};

export type ParseOutcome =
  | { ok: true; node: ExpressionNode }
  | { ok: false; error: ExpressionParseError };

export type AtomRole = "license" | "exception";

export type AtomStatus = "valid" | "deprecated" | "unrecognized";

export type AtomDetail = {
  identifier: string;
  role: AtomRole;
  status: AtomStatus;
};

export type ValidationResult = {
  expression: string;
  parsed: boolean;
  /** License and exception ids, without any `+` suffix. Empty when not parsed. */
  atoms: string[];
  isCompound: boolean;
  atomDetails: AtomDetail[];
  error?: ExpressionParseError;
};

type TokenKind = "id" | "and" | "or" | "with" | "lparen" | "rparen" | "plus";

type Token = {
  kind: TokenKind;
  value: string;
  position: number;
};

const KEYWORDS: Record<string, TokenKind> = { AND: "and", OR: "or", WITH: "with" };
const IDSTRING = /[A-Za-z0-9.-]/;

// =============================================================================
// VALIDATOR
// =============================================================================

export class ExpressionValidator {
  private readonly cache = new Map<string, ValidationResult>();

  constructor(private readonly catalog: LicenseCatalog) {}

  validate(expression: string): ValidationResult {
    const cached = this.cache.get(expression);
    if (cached) return cached;

    const result = this.computeValidation(expression);
    this.cache.set(expression, result);
    return result;
  }

  private computeValidation(expression: string): ValidationResult {
    const outcome = parseLicenseExpression(expression);
    if (!outcome.ok) {
      return {
        expression,
        parsed: false,
        atoms: [],
        isCompound: false,
        atomDetails: [],
        error: outcome.error,
      };
    }

    const details = new Map<string, AtomDetail>();
    for (const atom of collectAtoms(outcome.node)) {
      const key = `${atom.role}:${atom.identifier}`;
      if (details.has(key)) continue;
      details.set(key, {
        identifier: atom.identifier,
        role: atom.role,
        status: this.classifyAtom(atom),
      });
    }

    const atomDetails = Array.from(details.values()).sort((a, b) =>
      a.identifier === b.identifier
        ? a.role.localeCompare(b.role)
        : a.identifier < b.identifier
          ? -1
          : 1,
    );

    return {
      expression,
      parsed: true,
      atoms: sortedUnique(atomDetails.map((detail) => detail.identifier)),
      isCompound: outcome.node.kind !== "license",
      atomDetails,
    };
  }

  private classifyAtom(atom: { identifier: string; role: AtomRole; orLater: boolean }): AtomStatus {
    if (atom.role === "exception") {
      return this.catalog.isKnownException(atom.identifier) ? "valid" : "unrecognized";
    }

    if (isLicenseRef(atom.identifier)) {
      return "valid";
    }

    if (
      this.catalog.isDeprecated(atom.identifier) ||
      (atom.orLater && this.catalog.isDeprecated(`${atom.identifier}+`))
    ) {
      return "deprecated";
    }

    return this.catalog.isKnownLicense(atom.identifier) ? "valid" : "unrecognized";
  }
}

// =============================================================================
// PARSER
// =============================================================================

export function parseLicenseExpression(text: string): ParseOutcome {
  const tokens = tokenize(text);
  if (!Array.isArray(tokens)) {
    return { ok: false, error: tokens };
  }

  if (tokens.length === 0) {
    return { ok: false, error: { message: "Empty license expression", position: 0 } };
  }

  const parser = new TokenCursor(tokens, text.length);
  try {
    const node = parser.parseOr();
    const trailing = parser.peek();
    if (trailing) {
      parser.fail(`Unexpected '${trailing.value}'`, trailing.position);
    }
    return { ok: true, node };
  } catch (err) {
    if (err instanceof ExpressionSyntaxError) {
      return { ok: false, error: { message: err.message, position: err.position } };
    }
    throw err;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

class ExpressionSyntaxError extends Error {
  constructor(
    message: string,
    public readonly position: number,
  ) {
    super(message);
    this.name = "ExpressionSyntaxError";
  }
}

class TokenCursor {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly end: number,
  ) {}

  peek(): Token | undefined {
    return this.tokens[this.index];
  }

  next(): Token | undefined {
    const token = this.tokens[this.index];
    this.index += 1;
    return token;
  }

  fail(message: string, position: number): never {
    throw new ExpressionSyntaxError(message, position);
  }

  parseOr(): ExpressionNode {
    let left = this.parseAnd();
    while (this.peek()?.kind === "or") {
      this.next();
      left = { kind: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExpressionNode {
    let left = this.parseWith();
    while (this.peek()?.kind === "and") {
      this.next();
      left = { kind: "and", left, right: this.parseWith() };
    }
    return left;
  }

  private parseWith(): ExpressionNode {
    const primary = this.parsePrimary();
    if (this.peek()?.kind !== "with") {
      return primary;
    }

    const withToken = this.next();
    if (primary.kind !== "license") {
      this.fail("WITH must follow a single license", withToken?.position ?? this.end);
    }

    const exception = this.next();
    if (!exception || exception.kind !== "id") {
      this.fail("Expected an exception after WITH", exception?.position ?? this.end);
    }

    return { kind: "with", license: primary, exception: exception.value };
  }

  private parsePrimary(): ExpressionNode {
    const token = this.next();
    if (!token) {
      this.fail("Unexpected end of expression", this.end);
    }

    if (token.kind === "lparen") {
      const inner = this.parseOr();
      const closing = this.next();
      if (!closing || closing.kind !== "rparen") {
        this.fail("Expected ')'", closing?.position ?? this.end);
      }
      return inner;
    }

    if (token.kind !== "id") {
      this.fail(`Unexpected '${token.value}'`, token.position);
    }

    let orLater = false;
    if (this.peek()?.kind === "plus") {
      this.next();
      orLater = true;
    }

    return { kind: "license", id: token.value, orLater };
  }
}

function tokenize(text: string): Token[] | ExpressionParseError {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (/\s/.test(char)) {
      i += 1;
      continue;
    }

    if (char === "(" || char === ")") {
      tokens.push({ kind: char === "(" ? "lparen" : "rparen", value: char, position: i });
      i += 1;
      continue;
    }

    if (char === "+") {
      const previous = tokens[tokens.length - 1];
      const attached = previous?.kind === "id" && previous.position + previous.value.length === i;
      if (!attached) {
        return { message: "'+' must directly follow a license identifier", position: i };
      }
      tokens.push({ kind: "plus", value: char, position: i });
      i += 1;
      continue;
    }

    if (IDSTRING.test(char)) {
      const start = i;
      while (i < text.length && (IDSTRING.test(text[i]) || text[i] === ":")) {
        i += 1;
      }
      const value = text.slice(start, i);
      if (value.includes(":") && !isLicenseRef(value)) {
        return { message: `Invalid identifier '${value}'`, position: start };
      }
      tokens.push({ kind: KEYWORDS[value] ?? "id", value, position: start });
      continue;
    }

    return { message: `Invalid character '${char}'`, position: i };
  }

  return tokens;
}

function collectAtoms(
  node: ExpressionNode,
): Array<{ identifier: string; role: AtomRole; orLater: boolean }> {
  switch (node.kind) {
    case "license":
      return [{ identifier: node.id, role: "license", orLater: node.orLater }];
    case "with":
      return [
        { identifier: node.license.id, role: "license", orLater: node.license.orLater },
        { identifier: node.exception, role: "exception", orLater: false },
      ];
    case "and":
    case "or":
      return [...collectAtoms(node.left), ...collectAtoms(node.right)];
  }
}
