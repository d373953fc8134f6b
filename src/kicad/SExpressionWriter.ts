import { SDocument, SList, type SNode, SString, cloneNode, quote } from "./SExpression";

const indentation = "\t";

/** KiCad keeps consecutive `(xy ..)` points on one line until this column. */
const XY_COLUMN_LIMIT = 99;

/**
 * Serializes node trees back to text.
 *
 * Whitespace recorded by the parser is replayed as-is. Nodes without it are
 * laid out the way KiCad writes files:
 * - Lists holding only atoms/strings stay on a single line.
 * - Every nested list starts on a new line, one tab deeper than its parent.
 * - The closing paren of a list with nested lists sits on its own line.
 * - Consecutive `(xy ..)` points share a line.
 * - The file ends with a newline.
 */
export class SExpressionWriter {
  private chunks: string[] = [];
  private column = 0;

  write(target: SDocument | SNode): string {
    this.chunks = [];
    this.column = 0;
    if (target instanceof SDocument) {
      target.items.forEach((item, i) => this.node(item, 0, () => (i === 0 ? "" : "\n")));
      this.emit(target.trailing);
    } else {
      this.node(target, 0, () => "");
    }
    return this.chunks.join("");
  }

  private node(node: SNode, depth: number, fallbackLeading: () => string): void {
    this.emit(node.leading ?? fallbackLeading());
    if (node instanceof SList) {
      this.list(node, depth);
    } else if (node instanceof SString) {
      this.emit(node.raw ?? quote(node.value));
    } else {
      this.emit(node.value);
    }
  }

  private list(list: SList, depth: number): void {
    this.emit("(");
    list.items.forEach((item, i) => this.node(item, depth + 1, () => this.defaultLeading(list, i, depth + 1)));
    this.emit(list.closing ?? (list.hasListChild ? "\n" + indentation.repeat(depth) : ""));
    this.emit(")");
  }

  private defaultLeading(parent: SList, index: number, depth: number): string {
    if (index === 0) return "";
    const item = parent.items[index];
    if (!(item instanceof SList)) return " ";

    const previous = parent.items[index - 1];
    if (item.keyword === "xy" && previous instanceof SList && previous.keyword === "xy") {
      const width = new SExpressionWriter().write(cloneNode(item, true)).length;
      if (this.column + 1 + width <= XY_COLUMN_LIMIT) return " ";
    }
    return "\n" + indentation.repeat(depth);
  }

  private emit(text: string): void {
    if (text.length === 0) return;
    this.chunks.push(text);
    const newline = text.lastIndexOf("\n");
    this.column = newline === -1 ? this.column + text.length : text.length - newline - 1;
  }
}
