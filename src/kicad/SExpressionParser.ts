import { SExprSyntaxError } from "@sch/errors";
import { SAtom, SDocument, SList, type SNode, SString } from "./SExpression";
import { SExpressionWriter } from "./SExpressionWriter";

const ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  n: "\n",
  r: "\r",
  t: "\t",
};

/**
 * S-expression parser for KiCad files.
 * Handles:
 * - Nested lists: (a b)
 * - Quoted strings with `\"`, `\\`, `\n`, `\r` and `\t` escapes
 * - Atoms: unquoted tokens
 *
 * Every node records the whitespace in front of it, so `serialize(parse(text))`
 * reproduces `text` byte for byte.
 */
export class SExpressionParser {
  /**
   * Parse a whole file. Throws `SExprSyntaxError` on unbalanced parens,
   * unterminated strings or unknown escapes.
   */
  static parse(input: string): SDocument {
    return new Cursor(input).document();
  }

  /** Parse text holding exactly one expression. */
  static parseNode(input: string): SNode {
    const doc = this.parse(input);
    if (doc.items.length !== 1) {
      throw new SExprSyntaxError(`Expected one expression, found ${doc.items.length}`, 0, 1, 1);
    }
    return doc.items[0];
  }

  static serialize(doc: SDocument | SNode): string {
    return new SExpressionWriter().write(doc);
  }
}

class Cursor {
  private pos = 0;

  constructor(private readonly input: string) {}

  document(): SDocument {
    const top: SNode[] = [];
    const stack: Array<{ list: SList; offset: number }> = [];
    let pending = "";

    const push = (node: SNode) => {
      node.leading = pending;
      pending = "";
      const parent = stack[stack.length - 1];
      (parent ? parent.list.items : top).push(node);
    };

    while (this.pos < this.input.length) {
      const char = this.input[this.pos];

      if (char === "(") {
        const list = new SList();
        push(list);
        stack.push({ list, offset: this.pos });
        this.pos++;
      } else if (char === ")") {
        const open = stack.pop();
        if (!open) throw this.error("Unexpected ')'", this.pos);
        open.list.closing = pending;
        pending = "";
        this.pos++;
      } else if (char === '"') {
        push(this.string());
      } else if (isWhitespace(char)) {
        const start = this.pos;
        while (this.pos < this.input.length && isWhitespace(this.input[this.pos])) this.pos++;
        pending += this.input.slice(start, this.pos);
      } else {
        push(this.atom());
      }
    }

    const unclosed = stack.pop();
    if (unclosed) throw this.error("Unclosed '('", unclosed.offset);

    return new SDocument(top, pending);
  }

  private string(): SString {
    const start = this.pos;
    let value = "";
    this.pos++;
    while (this.pos < this.input.length) {
      const char = this.input[this.pos];
      if (char === '"') {
        this.pos++;
        return new SString(value, this.input.slice(start, this.pos));
      }
      if (char === "\\") {
        const next = this.input[this.pos + 1];
        const decoded = next === undefined ? undefined : ESCAPES[next];
        if (decoded === undefined) throw this.error(`Invalid escape sequence '\\${next ?? ""}'`, this.pos);
        value += decoded;
        this.pos += 2;
      } else {
        value += char;
        this.pos++;
      }
    }
    throw this.error("Unterminated string", start);
  }

  private atom(): SAtom {
    const start = this.pos;
    while (this.pos < this.input.length) {
      const char = this.input[this.pos];
      if (char === "(" || char === ")" || char === '"' || isWhitespace(char)) break;
      this.pos++;
    }
    return new SAtom(this.input.slice(start, this.pos));
  }

  private error(message: string, offset: number): SExprSyntaxError {
    let line = 1;
    let lineStart = 0;
    for (let i = 0; i < offset; i++) {
      if (this.input[i] === "\n") {
        line++;
        lineStart = i + 1;
      }
    }
    return new SExprSyntaxError(message, offset, line, offset - lineStart + 1);
  }
}

function isWhitespace(char: string): boolean {
  return char === " " || char === "\t" || char === "\n" || char === "\r";
}
