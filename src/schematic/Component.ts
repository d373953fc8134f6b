import { InvalidArgumentError } from "@sch/errors";
import { type Mirror, type Placement, type Point, normalizeRotation, round } from "@sch/kicad/Geometry";
import { type SList, atom, list, str, yesNo } from "@sch/kicad/SExpression";
import { SchematicItem, textEffects, uuidNode } from "./SchematicItem";

/** Where a component appears in the sheet hierarchy and what it is called there. */
export interface SymbolInstance {
  project: string;
  /** `/<root uuid>[/<sheet uuid>...]` */
  path: string;
  reference: string;
  unit: number;
}

export interface ReferenceScope {
  path: string;
  reference: string;
}

export interface ComponentInit {
  uuid: string;
  libId: string;
  reference: string;
  value: string;
  position: Point;
  rotation?: number;
  mirror?: Mirror;
  unit?: number;
  footprint?: string;
  datasheet?: string;
  description?: string;
  properties?: Record<string, string>;
  inBom?: boolean;
  onBoard?: boolean;
  dnp?: boolean;
  /** Pin number to pin identifier. */
  pins?: Array<{ number: string; uuid: string }>;
  instances?: SymbolInstance[];
}

const REFERENCE_PATTERN = /^#?[A-Z]+[0-9]*$/;

export function isValidReference(reference: string): boolean {
  return REFERENCE_PATTERN.test(reference);
}

/** Splits `R12` into `R` and 12; unnumbered references yield no number. */
export function splitReference(reference: string): { prefix: string; number?: number } {
  const match = reference.match(/^(#?[A-Z]+)([0-9]+)$/);
  return match ? { prefix: match[1], number: Number(match[2]) } : { prefix: reference };
}

/**
 * A placed symbol instance: `(symbol (lib_id ...) (at ...) ...)`.
 */
export class Component extends SchematicItem {
  readonly kind = "component";

  static create(init: ComponentInit): Component {
    const { x, y } = init.position;
    const rotation = normalizeRotation(init.rotation ?? 0);
    const unit = init.unit ?? 1;
    const node = list("symbol", list("lib_id", str(init.libId)), list("at", x, y, rotation));
    if (init.mirror) node.append(list("mirror", atom(init.mirror)));
    node.append(list("unit", unit));
    node.append(list("exclude_from_sim", yesNo(false)));
    node.append(list("in_bom", yesNo(init.inBom ?? true)));
    node.append(list("on_board", yesNo(init.onBoard ?? true)));
    node.append(list("dnp", yesNo(init.dnp ?? false)));
    node.append(list("fields_autoplaced", yesNo(true)));
    node.append(uuidNode(init.uuid));

    const fields: Array<[string, string, Point, boolean]> = [
      ["Reference", init.reference, { x: x + 2.54, y: y - 1.27 }, false],
      ["Value", init.value, { x: x + 2.54, y: y + 1.27 }, false],
      ["Footprint", init.footprint ?? "", init.position, true],
      ["Datasheet", init.datasheet ?? "~", init.position, true],
      ["Description", init.description ?? "", init.position, true],
    ];
    for (const [name, value, at, hidden] of fields) node.append(propertyNode(name, value, at, hidden));
    for (const [name, value] of Object.entries(init.properties ?? {})) {
      node.append(propertyNode(name, value, init.position, true));
    }

    for (const pin of init.pins ?? []) node.append(list("pin", str(pin.number), uuidNode(pin.uuid)));

    const component = new Component(node);
    for (const instance of init.instances ?? []) component.addInstance(instance);
    return component;
  }

  get libId(): string {
    return this.node.child("lib_id")?.text(1) ?? "";
  }

  get position(): Point {
    return this.readAt().position;
  }

  /** Moves the component; its fields move along with it. */
  set position(value: Point) {
    const previous = this.position;
    const dx = value.x - previous.x;
    const dy = value.y - previous.y;
    this.writeAt(value, this.rotation);
    for (const prop of this.node.children("property")) {
      const at = prop.child("at");
      if (!at) continue;
      at.setNumber(1, round((at.number(1) ?? 0) + dx));
      at.setNumber(2, round((at.number(2) ?? 0) + dy));
    }
    this.changed();
  }

  /** Angle as stored in the file; not guaranteed to be a right angle for loaded data. */
  get rotation(): number {
    return this.readAt().rotation;
  }

  set rotation(value: number) {
    this.writeAt(this.position, normalizeRotation(value));
    this.changed();
  }

  get mirror(): Mirror | undefined {
    const axis = this.node.child("mirror")?.text(1);
    return axis === "x" || axis === "y" ? axis : undefined;
  }

  set mirror(value: Mirror | undefined) {
    const existing = this.node.child("mirror");
    if (value === undefined) {
      if (existing) this.node.remove(existing);
    } else {
      this.node.upsert("mirror", [atom(value)], this.node.child("at"));
    }
    this.changed();
  }

  get placement(): Placement {
    return { position: this.position, rotation: this.rotation, mirror: this.mirror };
  }

  get unit(): number {
    return this.node.child("unit")?.number(1) ?? 1;
  }

  set unit(value: number) {
    if (!Number.isInteger(value) || value < 1) throw new InvalidArgumentError(`Invalid unit ${value}`, { unit: value });
    this.node.upsert("unit", [value], this.node.child("mirror") ?? this.node.child("at"));
    this.changed();
  }

  get reference(): string {
    return this.getProperty("Reference", "");
  }

  /**
   * Renames the component. The owning schematic checks the new name in every
   * scope first; instance records that carried the old name follow.
   */
  set reference(value: string) {
    const previous = this.reference;
    if (value === previous) return;
    this.owner?.referenceChanging(this, value, previous);
    this.writeProperty("Reference", value);
    for (const path of this.instanceNodes()) {
      const reference = path.child("reference");
      if (reference?.text(1) === previous) reference.setText(1, value);
    }
    this.changed();
  }

  get value(): string {
    return this.getProperty("Value", "");
  }

  set value(value: string) {
    this.setProperty("Value", value);
  }

  /** `undefined` when the property is absent, which is not the same as empty. */
  get footprint(): string | undefined {
    return this.getProperty("Footprint");
  }

  set footprint(value: string | undefined) {
    if (value === undefined) this.removeProperty("Footprint");
    else this.setProperty("Footprint", value);
  }

  get inBom(): boolean {
    return this.flag("in_bom", true);
  }

  set inBom(value: boolean) {
    this.setFlag("in_bom", value);
  }

  get onBoard(): boolean {
    return this.flag("on_board", true);
  }

  set onBoard(value: boolean) {
    this.setFlag("on_board", value);
  }

  get dnp(): boolean {
    return this.flag("dnp", false);
  }

  set dnp(value: boolean) {
    this.setFlag("dnp", value);
  }

  /** Property values in file order. */
  get properties(): Map<string, string> {
    const result = new Map<string, string>();
    for (const prop of this.node.children("property")) {
      const name = prop.text(1);
      if (name !== undefined) result.set(name, prop.text(2) ?? "");
    }
    return result;
  }

  getProperty(name: string): string | undefined;
  getProperty(name: string, fallback: string): string;
  getProperty(name: string, fallback?: string): string | undefined {
    return this.propertyNode(name)?.text(2) ?? fallback;
  }

  /** Updates a property, or adds it hidden at the component position. */
  setProperty(name: string, value: string): void {
    if (name === "Reference") {
      this.reference = value;
      return;
    }
    this.writeProperty(name, value);
    this.changed();
  }

  /** Returns false when there was nothing to remove. */
  removeProperty(name: string): boolean {
    if (name === "Reference" || name === "Value") {
      throw new InvalidArgumentError(`Property ${name} cannot be removed`, { property: name });
    }
    const prop = this.propertyNode(name);
    if (!prop) return false;
    this.node.remove(prop);
    this.changed();
    return true;
  }

  /** Pin number to pin identifier, as listed on the instance. */
  get pinIds(): Map<string, string> {
    const result = new Map<string, string>();
    for (const pin of this.node.children("pin")) {
      const number = pin.text(1);
      const uuid = pin.child("uuid")?.text(1);
      if (number !== undefined && uuid !== undefined) result.set(number, uuid);
    }
    return result;
  }

  instances(): SymbolInstance[] {
    const result: SymbolInstance[] = [];
    for (const project of this.node.child("instances")?.children("project") ?? []) {
      for (const path of project.children("path")) {
        result.push({
          project: project.text(1) ?? "",
          path: path.text(1) ?? "",
          reference: path.child("reference")?.text(1) ?? "",
          unit: path.child("unit")?.number(1) ?? this.unit,
        });
      }
    }
    return result;
  }

  /** Adds an instance record, or updates the one with the same project and path. */
  addInstance(instance: SymbolInstance): void {
    let instances = this.node.child("instances");
    if (!instances) {
      instances = list("instances");
      this.node.append(instances);
    }
    let project = instances.children("project").find((p) => p.text(1) === instance.project);
    if (!project) {
      project = list("project", str(instance.project));
      instances.append(project);
    }
    const path = project.children("path").find((p) => p.text(1) === instance.path);
    if (path) {
      path.upsert("reference", [str(instance.reference)]);
      path.upsert("unit", [instance.unit]);
    } else {
      project.append(list("path", str(instance.path), list("reference", str(instance.reference)), list("unit", instance.unit)));
    }
    this.changed();
  }

  removeInstance(path: string): boolean {
    let removed = false;
    for (const project of this.node.child("instances")?.children("project") ?? []) {
      for (const node of project.children("path")) {
        if (node.text(1) === path) removed = project.remove(node) || removed;
      }
    }
    if (removed) this.changed();
    return removed;
  }

  /**
   * The names this component holds: one per instance record, or the
   * Reference field in `rootPath` when it has no records.
   */
  referenceScopes(rootPath: string): ReferenceScope[] {
    const records = this.instances();
    if (records.length === 0) return [{ path: rootPath, reference: this.reference }];
    return records.map(({ path, reference }) => ({ path, reference }));
  }

  private instanceNodes(): SList[] {
    return (this.node.child("instances")?.children("project") ?? []).flatMap((p) => p.children("path"));
  }

  private propertyNode(name: string): SList | undefined {
    return this.node.children("property").find((p) => p.text(1) === name);
  }

  private writeProperty(name: string, value: string): void {
    const existing = this.propertyNode(name);
    if (existing) {
      existing.setText(2, value);
      return;
    }
    const properties = this.node.children("property");
    const anchor = properties[properties.length - 1] ?? this.node.child("uuid");
    this.node.insertAfter(anchor, propertyNode(name, value, this.position, true));
  }

  private flag(keyword: string, fallback: boolean): boolean {
    const value = this.node.child(keyword)?.text(1);
    return value === undefined ? fallback : value === "yes";
  }

  private setFlag(keyword: string, value: boolean): void {
    this.node.upsert(keyword, [yesNo(value)], this.node.child("unit"));
    this.changed();
  }
}

function propertyNode(name: string, value: string, at: Point, hidden: boolean): SList {
  return list(
    "property",
    str(name),
    str(value),
    list("at", at.x, at.y, 0),
    textEffects(hidden ? { hide: true } : { justify: ["left"] }),
  );
}
