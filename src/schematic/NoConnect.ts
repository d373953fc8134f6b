import type { Point } from "@sch/kicad/Geometry";
import { list } from "@sch/kicad/SExpression";
import { SchematicItem, uuidNode } from "./SchematicItem";

/** No-connect flag on an unused pin: `(no_connect (at x y) (uuid ..))`. */
export class NoConnect extends SchematicItem {
  readonly kind = "no_connect";

  static create(position: Point, uuid: string): NoConnect {
    return new NoConnect(list("no_connect", list("at", position.x, position.y), uuidNode(uuid)));
  }

  get position(): Point {
    return this.readAt().position;
  }

  set position(value: Point) {
    this.writeAt(value);
    this.changed();
  }
}
