import type { Point } from "@sch/kicad/Geometry";
import { list } from "@sch/kicad/SExpression";
import { SchematicItem, uuidNode } from "./SchematicItem";

/** `(junction (at x y) (diameter 0) (color 0 0 0 0) (uuid ..))` */
export class Junction extends SchematicItem {
  readonly kind = "junction";

  static create(position: Point, uuid: string, diameter = 0): Junction {
    return new Junction(
      list("junction", list("at", position.x, position.y), list("diameter", diameter), list("color", 0, 0, 0, 0), uuidNode(uuid)),
    );
  }

  get position(): Point {
    return this.readAt().position;
  }

  set position(value: Point) {
    this.writeAt(value);
    this.changed();
  }

  /** 0 means the editor default. */
  get diameter(): number {
    return this.node.child("diameter")?.number(1) ?? 0;
  }

  set diameter(value: number) {
    this.node.upsert("diameter", [value], this.node.child("at"));
    this.changed();
  }
}
