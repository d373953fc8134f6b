import { InvalidArgumentError, NotFoundError } from "@sch/errors";
import { type Point, round } from "@sch/kicad/Geometry";
import { type SList, atom, list, str, yesNo } from "@sch/kicad/SExpression";
import { type LabelShape, LABEL_SHAPES } from "./Label";
import { SchematicItem, textEffects, uuidNode } from "./SchematicItem";

export type SheetPinDirection = LabelShape;

export interface SheetInit {
  uuid: string;
  name: string;
  fileName: string;
  position: Point;
  size: { width: number; height: number };
  /** Instance record written under `(instances ...)`. */
  instance?: { project: string; path: string; page: string };
}

export interface SheetPinInit {
  uuid: string;
  name: string;
  direction: SheetPinDirection;
  /** Must lie on the sheet border. */
  position: Point;
}

/** Hierarchical pin on a sheet symbol. */
export class SheetPin {
  constructor(readonly node: SList) {}

  get uuid(): string {
    return this.node.child("uuid")?.text(1) ?? "";
  }

  get name(): string {
    return this.node.text(1) ?? "";
  }

  get direction(): SheetPinDirection {
    const raw = this.node.text(2);
    return LABEL_SHAPES.find((s) => s === raw) ?? "passive";
  }

  get position(): Point {
    const at = this.node.child("at");
    return { x: at?.number(1) ?? 0, y: at?.number(2) ?? 0 };
  }

  get rotation(): number {
    return this.node.child("at")?.number(3) ?? 0;
  }
}

/**
 * Hierarchical sheet symbol pointing at a child schematic file.
 */
export class Sheet extends SchematicItem {
  readonly kind = "sheet";

  static create(init: SheetInit): Sheet {
    const { x, y } = init.position;
    const { width, height } = init.size;
    if (!(width > 0) || !(height > 0)) {
      throw new InvalidArgumentError(`Sheet size must be positive, got ${width}x${height}`, { width, height });
    }
    const node = list(
      "sheet",
      list("at", x, y),
      list("size", width, height),
      list("exclude_from_sim", yesNo(false)),
      list("in_bom", yesNo(true)),
      list("on_board", yesNo(true)),
      list("dnp", yesNo(false)),
      list("fields_autoplaced", yesNo(true)),
      list("stroke", list("width", 0.1524), list("type", atom("solid"))),
      list("fill", list("color", 0, 0, 0, 0)),
      uuidNode(init.uuid),
      list("property", str("Sheetname"), str(init.name), list("at", x, y - 0.7116, 0), textEffects({ justify: ["left", "bottom"] })),
      list(
        "property",
        str("Sheetfile"),
        str(init.fileName),
        list("at", x, y + height + 0.5846, 0),
        textEffects({ justify: ["left", "top"] }),
      ),
    );
    if (init.instance) {
      const { project, path, page } = init.instance;
      node.append(list("instances", list("project", str(project), list("path", str(path), list("page", str(page))))));
    }
    return new Sheet(node);
  }

  get name(): string {
    return this.property("Sheetname") ?? "";
  }

  set name(value: string) {
    this.setProperty("Sheetname", value);
  }

  get fileName(): string {
    return this.property("Sheetfile") ?? "";
  }

  set fileName(value: string) {
    this.setProperty("Sheetfile", value);
  }

  get position(): Point {
    return this.readAt().position;
  }

  get size(): { width: number; height: number } {
    const size = this.node.child("size");
    return { width: size?.number(1) ?? 0, height: size?.number(2) ?? 0 };
  }

  pins(): SheetPin[] {
    return this.node.children("pin").map((node) => new SheetPin(node));
  }

  /**
   * Adds a pin on the border; its orientation follows from the side it sits on.
   */
  addPin(init: SheetPinInit): SheetPin {
    if (this.pins().some((pin) => pin.name === init.name)) {
      throw new InvalidArgumentError(`Sheet ${this.name} already has a pin named ${init.name}`, { pin: init.name });
    }
    const { rotation, justify } = this.borderSide(init.position);
    const node = list(
      "pin",
      str(init.name),
      atom(init.direction),
      list("at", init.position.x, init.position.y, rotation),
      uuidNode(init.uuid),
      textEffects({ justify: [justify] }),
    );
    const pins = this.node.children("pin");
    const anchor = pins[pins.length - 1] ?? this.node.children("property").pop();
    this.node.insertAfter(anchor, node);
    this.changed();
    return new SheetPin(node);
  }

  /** Removes a pin by name or identifier. */
  removePin(nameOrUuid: string): SheetPin {
    const pin = this.pins().find((p) => p.name === nameOrUuid || p.uuid === nameOrUuid);
    if (!pin) throw new NotFoundError("sheet pin", nameOrUuid, "removePin");
    this.node.remove(pin.node);
    this.released(pin.uuid);
    this.changed();
    return pin;
  }

  private borderSide(p: Point): { rotation: number; justify: string } {
    const { x, y } = this.position;
    const { width, height } = this.size;
    const right = round(x + width);
    const bottom = round(y + height);
    const withinX = p.x >= x && p.x <= right;
    const withinY = p.y >= y && p.y <= bottom;
    if (p.x === x && withinY) return { rotation: 180, justify: "left" };
    if (p.x === right && withinY) return { rotation: 0, justify: "right" };
    if (p.y === y && withinX) return { rotation: 90, justify: "right" };
    if (p.y === bottom && withinX) return { rotation: 270, justify: "left" };
    throw new InvalidArgumentError(`Sheet pin at ${p.x},${p.y} is not on the border of sheet ${this.name}`, {
      x: p.x,
      y: p.y,
    });
  }

  private property(name: string): string | undefined {
    return this.node.children("property").find((p) => p.text(1) === name)?.text(2);
  }

  private setProperty(name: string, value: string): void {
    const prop = this.node.children("property").find((p) => p.text(1) === name);
    if (prop) prop.setText(2, value);
    else this.node.insertAfter(this.node.child("uuid"), list("property", str(name), str(value)));
    this.changed();
  }
}
