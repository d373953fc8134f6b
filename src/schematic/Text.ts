import { InvalidArgumentError } from "@sch/errors";
import { type Point, normalizeRotation } from "@sch/kicad/Geometry";
import { type SList, atom, list, str, yesNo } from "@sch/kicad/SExpression";
import { SchematicItem, uuidNode } from "./SchematicItem";

export interface TextStyle {
  /** Font height and width. Defaults to 1.27. */
  fontSize?: number;
  bold?: boolean;
  italic?: boolean;
  justify?: string[];
}

export interface TextInit extends TextStyle {
  uuid: string;
  text: string;
  position: Point;
  rotation?: number;
}

export interface TextBoxInit extends TextInit {
  size: { width: number; height: number };
  /** Top, right, bottom, left. */
  margins?: [number, number, number, number];
  strokeWidth?: number;
  strokeType?: string;
  fillType?: string;
}

const DEFAULT_FONT_SIZE = 1.27;
const DEFAULT_MARGIN = 0.9525;

function effectsNode(style: TextStyle, defaultJustify: string[]): SList {
  const size = style.fontSize ?? DEFAULT_FONT_SIZE;
  if (!(size > 0)) throw new InvalidArgumentError(`Font size must be positive, got ${size}`, { size });
  const font = list("font", list("size", size, size));
  if (style.bold) font.append(list("bold", yesNo(true)));
  if (style.italic) font.append(list("italic", yesNo(true)));
  const effects = list("effects", font);
  const justify = style.justify ?? defaultJustify;
  if (justify.length > 0) effects.append(list("justify", ...justify.map((j) => atom(j))));
  return effects;
}

/** Accessors shared by free text and text boxes. */
abstract class TextItem extends SchematicItem {
  get text(): string {
    return this.node.text(1) ?? "";
  }

  set text(value: string) {
    this.node.setText(1, value);
    this.changed();
  }

  get position(): Point {
    return this.readAt().position;
  }

  set position(value: Point) {
    this.writeAt(value);
    this.changed();
  }

  get rotation(): number {
    return this.readAt().rotation;
  }

  set rotation(value: number) {
    this.writeAt(this.position, normalizeRotation(value));
    this.changed();
  }

  get fontSize(): number {
    return this.node.child("effects")?.child("font")?.child("size")?.number(1) ?? DEFAULT_FONT_SIZE;
  }

  set fontSize(value: number) {
    if (!(value > 0)) throw new InvalidArgumentError(`Font size must be positive, got ${value}`, { size: value });
    const effects = this.node.child("effects");
    const font = effects?.child("font");
    if (font) font.upsert("size", [value, value]);
    else if (effects) effects.insert(1, list("font", list("size", value, value)));
    else {
      const uuid = this.node.child("uuid");
      this.node.insert(uuid ? this.node.items.indexOf(uuid) : this.node.items.length, effectsNode({ fontSize: value }, []));
    }
    this.changed();
  }

  get bold(): boolean {
    return this.node.child("effects")?.child("font")?.child("bold")?.text(1) === "yes";
  }

  get italic(): boolean {
    return this.node.child("effects")?.child("font")?.child("italic")?.text(1) === "yes";
  }

  get justify(): string[] {
    const justify = this.node.child("effects")?.child("justify");
    if (!justify) return [];
    const result: string[] = [];
    for (let i = 1; i < justify.items.length; i++) result.push(justify.text(i) ?? "");
    return result;
  }

  get excludeFromSim(): boolean {
    return this.node.child("exclude_from_sim")?.text(1) === "yes";
  }
}

/** Free text annotation: `(text "..." (at x y angle) (effects ..) (uuid ..))`. */
export class Text extends TextItem {
  readonly kind = "text";

  static create(init: TextInit): Text {
    const node = list(
      "text",
      str(init.text),
      list("exclude_from_sim", yesNo(false)),
      list("at", init.position.x, init.position.y, normalizeRotation(init.rotation ?? 0)),
      effectsNode(init, []),
      uuidNode(init.uuid),
    );
    return new Text(node);
  }
}

/** Framed text with margins, stroke and fill. */
export class TextBox extends TextItem {
  readonly kind = "text_box";

  static create(init: TextBoxInit): TextBox {
    const { width, height } = init.size;
    if (!(width > 0 && height > 0)) {
      throw new InvalidArgumentError(`Text box size must be positive, got ${width} x ${height}`, { width, height });
    }
    const margins = init.margins ?? [DEFAULT_MARGIN, DEFAULT_MARGIN, DEFAULT_MARGIN, DEFAULT_MARGIN];
    const node = list(
      "text_box",
      str(init.text),
      list("exclude_from_sim", yesNo(false)),
      list("at", init.position.x, init.position.y, normalizeRotation(init.rotation ?? 0)),
      list("size", width, height),
      list("margins", ...margins),
      list("stroke", list("width", init.strokeWidth ?? 0), list("type", atom(init.strokeType ?? "solid"))),
      list("fill", list("type", atom(init.fillType ?? "none"))),
      effectsNode(init, ["left", "top"]),
      uuidNode(init.uuid),
    );
    return new TextBox(node);
  }

  get size(): { width: number; height: number } {
    const size = this.node.child("size");
    return { width: size?.number(1) ?? 0, height: size?.number(2) ?? 0 };
  }

  set size(value: { width: number; height: number }) {
    if (!(value.width > 0 && value.height > 0)) {
      throw new InvalidArgumentError(`Text box size must be positive, got ${value.width} x ${value.height}`, {
        width: value.width,
        height: value.height,
      });
    }
    this.node.upsert("size", [value.width, value.height], this.node.child("at"));
    this.changed();
  }

  /** Top, right, bottom, left. */
  get margins(): [number, number, number, number] {
    const m = this.node.child("margins");
    return [m?.number(1) ?? 0, m?.number(2) ?? 0, m?.number(3) ?? 0, m?.number(4) ?? 0];
  }

  get strokeWidth(): number {
    return this.node.child("stroke")?.child("width")?.number(1) ?? 0;
  }

  get fillType(): string {
    return this.node.child("fill")?.child("type")?.text(1) ?? "none";
  }
}
