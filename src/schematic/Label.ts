import { InvalidArgumentError } from "@sch/errors";
import { type Point, normalizeRotation } from "@sch/kicad/Geometry";
import { type SList, atom, list, str, yesNo } from "@sch/kicad/SExpression";
import { SchematicItem, textEffects, uuidNode } from "./SchematicItem";

export type LabelKind = "label" | "global_label" | "hierarchical_label";

export const LABEL_SHAPES = ["input", "output", "bidirectional", "tri_state", "passive"] as const;
export type LabelShape = (typeof LABEL_SHAPES)[number];

export interface LabelInit {
  uuid: string;
  text: string;
  position: Point;
  kind?: LabelKind;
  rotation?: number;
  /** Only global and hierarchical labels have a shape. Defaults to `input`. */
  shape?: LabelShape;
}

export function isLabelNode(node: SList): boolean {
  return node.keyword === "label" || node.keyword === "global_label" || node.keyword === "hierarchical_label";
}

/** Net label in any of its three flavours. */
export class Label extends SchematicItem {
  readonly kind = "label";

  static create(init: LabelInit): Label {
    const kind = init.kind ?? "label";
    const rotation = normalizeRotation(init.rotation ?? 0);
    const { x, y } = init.position;
    const node = list(kind, str(init.text));

    if (kind === "label") {
      node.append(list("at", x, y, rotation));
      node.append(textEffects({ justify: ["left", "bottom"] }));
      node.append(uuidNode(init.uuid));
    } else {
      node.append(list("shape", atom(init.shape ?? "input")));
      node.append(list("at", x, y, rotation));
      if (kind === "global_label") node.append(list("fields_autoplaced", yesNo(true)));
      node.append(textEffects({ justify: ["left"] }));
      node.append(uuidNode(init.uuid));
      if (kind === "global_label") {
        node.append(
          list(
            "property",
            str("Intersheetrefs"),
            str("${INTERSHEET_REFS}"),
            list("at", x, y, 0),
            textEffects({ justify: ["left"], hide: true }),
          ),
        );
      }
    }
    return new Label(node);
  }

  get labelKind(): LabelKind {
    const keyword = this.node.keyword;
    return keyword === "global_label" || keyword === "hierarchical_label" ? keyword : "label";
  }

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

  get shape(): LabelShape | undefined {
    const shape = this.node.child("shape")?.text(1);
    return LABEL_SHAPES.find((s) => s === shape);
  }

  set shape(value: LabelShape) {
    if (this.labelKind === "label") {
      throw new InvalidArgumentError("Local labels have no shape", { uuid: this.uuid });
    }
    this.node.upsert("shape", [atom(value)], this.node.items[1]);
    this.changed();
  }
}
