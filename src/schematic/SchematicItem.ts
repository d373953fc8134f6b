import type { Point } from "@sch/kicad/Geometry";
import { type SList, type SNode, atom, list, str } from "@sch/kicad/SExpression";

export type EntityKind = "component" | "wire" | "junction" | "no_connect" | "label" | "text" | "text_box" | "sheet";

/** Receives change notifications from the entities it holds. */
export interface ItemOwner {
  itemChanged(item: SchematicItem): void;
  /** Throws when `next` may not replace `previous` as the item's reference. */
  referenceChanging(item: SchematicItem, next: string, previous: string): void;
  /** A nested identifier (e.g. a sheet pin's) is no longer in use. */
  idReleased(uuid: string): void;
}

/**
 * Typed view over one top-level node of a schematic file. All state lives in
 * the node; accessors read it and setters edit it in place, so untouched parts
 * keep their original text.
 */
export abstract class SchematicItem {
  abstract readonly kind: EntityKind;
  protected owner?: ItemOwner;

  constructor(readonly node: SList) {}

  /** Empty when the source node has no identifier. */
  get uuid(): string {
    return this.node.child("uuid")?.text(1) ?? "";
  }

  attach(owner: ItemOwner): void {
    this.owner = owner;
  }

  detach(): void {
    this.owner = undefined;
  }

  protected changed(): void {
    this.owner?.itemChanged(this);
  }

  protected released(uuid: string): void {
    if (uuid) this.owner?.idReleased(uuid);
  }

  protected readAt(): { position: Point; rotation: number } {
    const at = this.node.child("at");
    return {
      position: { x: at?.number(1) ?? 0, y: at?.number(2) ?? 0 },
      rotation: at?.number(3) ?? 0,
    };
  }

  /** Rewrites `(at x y [angle])`, keeping the angle slot only when the node has one. */
  protected writeAt(position: Point, rotation?: number, after?: SNode): void {
    const existing = this.node.child("at");
    const angle = rotation ?? existing?.number(3);
    const values = angle === undefined ? [position.x, position.y] : [position.x, position.y, angle];
    this.node.upsert("at", values, after);
  }
}

export interface EffectsOptions {
  justify?: string[];
  hide?: boolean;
}

/** `(effects (font (size 1.27 1.27)) ...)` as KiCad writes it for new text. */
export function textEffects(options: EffectsOptions = {}): SList {
  const effects = list("effects", list("font", list("size", 1.27, 1.27)));
  if (options.justify && options.justify.length > 0) {
    effects.append(list("justify", ...options.justify.map((j) => atom(j))));
  }
  if (options.hide) effects.append(list("hide", atom("yes")));
  return effects;
}

export function uuidNode(uuid: string): SList {
  return list("uuid", str(uuid));
}
