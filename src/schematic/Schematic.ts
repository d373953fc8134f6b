import * as fs from "fs";
import type { EngineConfig } from "@sch/config";
import {
  DuplicateReferenceError,
  InvalidArgumentError,
  NotFoundError,
  SchematicError,
  SymbolNotFoundError,
  ValidationError,
  type ValidationIssue,
} from "@sch/errors";
import { ConnectivityGraph, type Net } from "@sch/kicad/Connectivity";
import {
  type Box,
  type Mirror,
  type Point,
  boundingBox,
  normalizeRotation,
  pinOrientation,
  pinPosition,
  snapToGrid,
  DEFAULT_GRID,
} from "@sch/kicad/Geometry";
import { type BendPreference, Router, type RouterOptions } from "@sch/kicad/Router";
import { SDocument, SList, atom, cloneNode, list, str } from "@sch/kicad/SExpression";
import { SExpressionParser } from "@sch/kicad/SExpressionParser";
import {
  type PinElectricalType,
  type SymbolDefinition,
  type SymbolResolver,
  SymbolLibrary,
  pinsForUnit,
  readSymbolDefinition,
} from "@sch/kicad/SymbolLibrary";
import { UuidManager } from "@sch/kicad/UuidManager";
import { type Logger, defaultLogger } from "@sch/logger";
import { Component, type SymbolInstance, isValidReference, splitReference } from "./Component";
import { IndexedCollection } from "./IndexedCollection";
import { Junction } from "./Junction";
import { type LabelKind, type LabelShape, Label, isLabelNode } from "./Label";
import { NoConnect } from "./NoConnect";
import { type SheetPin, type SheetPinInit, Sheet } from "./Sheet";
import type { ItemOwner, SchematicItem } from "./SchematicItem";
import { type TextBoxInit, type TextStyle, Text, TextBox } from "./Text";
import { validateSchematic } from "./validation";
import { type WireKind, Wire, isWireNode } from "./Wire";

export interface SchematicOptions {
  /** Consulted for symbols the document does not embed. */
  resolver?: SymbolResolver;
  grid?: number;
  /** Project name written into new instance records. */
  project?: string;
  routing?: Omit<RouterOptions, "grid">;
  logger?: Logger;
  /** Identifier source, e.g. a deterministic one in tests. */
  uuidGenerator?: () => string;
}

export interface CreateSchematicOptions extends SchematicOptions {
  uuid?: string;
  paper?: string;
  title?: string;
}

export interface AddComponentOptions {
  libId: string;
  /** Defaults to the next free `<prefix>N`, the prefix taken from the symbol. */
  reference?: string;
  value?: string;
  position: Point;
  rotation?: number;
  mirror?: Mirror;
  unit?: number;
  footprint?: string;
  properties?: Record<string, string>;
  uuid?: string;
  instances?: SymbolInstance[];
  /** Snap the position to the document grid. Default true. */
  snap?: boolean;
}

export interface PinInfo {
  number: string;
  name: string;
  type: PinElectricalType;
  position: Point;
  orientation: number;
  uuid?: string;
}

export type RouteMode = "direct" | "pathfinding";

export interface RoutePinsOptions {
  mode?: RouteMode;
  bend?: BendPreference;
  /** Defaults to the pin envelopes of every other component. */
  obstacles?: Box[];
  clearance?: number;
}

export interface TitleBlock {
  title?: string;
  date?: string;
  rev?: string;
  company?: string;
  comments: Record<number, string>;
}

export type TitleField = "title" | "date" | "rev" | "company";

export interface SchematicStatistics {
  components: number;
  wires: number;
  buses: number;
  junctions: number;
  noConnects: number;
  labels: number;
  texts: number;
  textBoxes: number;
  sheets: number;
  libSymbols: number;
}

export interface SaveOptions {
  /** Refuse to write when `validate()` reports errors. */
  validate?: boolean;
}

const KICAD_VERSION = 20250114;

// Section order of KiCad's writer; new top-level nodes are slotted in by rank.
const TOP_LEVEL_ORDER: Record<string, number> = {
  version: 0,
  generator: 1,
  generator_version: 2,
  uuid: 3,
  paper: 4,
  title_block: 5,
  lib_symbols: 6,
  bus_alias: 7,
  junction: 10,
  no_connect: 11,
  bus_entry: 12,
  wire: 13,
  bus: 13,
  polyline: 13,
  rectangle: 14,
  circle: 14,
  arc: 14,
  bezier: 14,
  image: 15,
  text_box: 16,
  table: 17,
  text: 18,
  label: 19,
  global_label: 20,
  hierarchical_label: 21,
  rule_area: 22,
  netclass_flag: 23,
  symbol: 30,
  sheet: 31,
  sheet_instances: 40,
  symbol_instances: 41,
  embedded_fonts: 50,
};

/** Engine options derived from a `schematic.yml`. */
export function schematicOptions(config: EngineConfig, extra: SchematicOptions = {}): SchematicOptions {
  return {
    grid: config.grid,
    project: config.project,
    routing: config.routing,
    resolver: config.libraryPaths.length > 0 ? new SymbolLibrary(config.libraryPaths, { logger: extra.logger }) : undefined,
    ...extra,
  };
}

/**
 * A KiCad schematic document.
 *
 * The parsed node tree is the single source of truth; entity objects are typed
 * views onto its nodes. Unknown sections are carried along untouched, and a
 * document that was loaded and not modified serializes to the exact bytes it
 * was read from.
 */
export class Schematic implements ItemOwner {
  readonly components: IndexedCollection<Component>;
  readonly wires: IndexedCollection<Wire>;
  readonly junctions: IndexedCollection<Junction>;
  readonly noConnects: IndexedCollection<NoConnect>;
  readonly labels: IndexedCollection<Label>;
  readonly texts: IndexedCollection<Text>;
  readonly textBoxes: IndexedCollection<TextBox>;
  readonly sheets: IndexedCollection<Sheet>;
  readonly grid: number;
  filePath?: string;

  private readonly doc: SDocument;
  private readonly root: SList;
  private readonly resolver?: SymbolResolver;
  private readonly project: string;
  private readonly routing: Omit<RouterOptions, "grid">;
  private readonly logger: Logger;
  private readonly uuids: UuidManager;
  private embedded?: Map<string, SymbolDefinition>;
  private dirty = false;

  private constructor(doc: SDocument, options: SchematicOptions) {
    const root = doc.root;
    if (!root || root.keyword !== "kicad_sch") {
      throw new SchematicError("NOT_A_SCHEMATIC", "Document root is not (kicad_sch ...)", { root: root?.keyword });
    }
    this.doc = doc;
    this.root = root;
    this.resolver = options.resolver;
    this.grid = options.grid ?? DEFAULT_GRID;
    this.project = options.project ?? "";
    this.routing = options.routing ?? {};
    this.logger = options.logger ?? defaultLogger;
    this.uuids = new UuidManager(options.uuidGenerator);

    const items = root.children();
    const components = items.filter((n) => n.keyword === "symbol").map((n) => new Component(n));
    const wires = items.filter(isWireNode).map((n) => new Wire(n));
    const junctions = items.filter((n) => n.keyword === "junction").map((n) => new Junction(n));
    const noConnects = items.filter((n) => n.keyword === "no_connect").map((n) => new NoConnect(n));
    const labels = items.filter(isLabelNode).map((n) => new Label(n));
    const texts = items.filter((n) => n.keyword === "text").map((n) => new Text(n));
    const textBoxes = items.filter((n) => n.keyword === "text_box").map((n) => new TextBox(n));
    const sheets = items.filter((n) => n.keyword === "sheet").map((n) => new Sheet(n));

    this.components = new IndexedCollection<Component>(
      "component",
      [
        { name: "reference", key: (c) => c.reference || undefined },
        { name: "libId", key: (c) => c.libId },
        { name: "value", key: (c) => c.value },
      ],
      components,
    );
    this.wires = new IndexedCollection<Wire>("wire", [{ name: "kind", key: (w) => w.wireKind }], wires);
    this.junctions = new IndexedCollection<Junction>("junction", [], junctions);
    this.noConnects = new IndexedCollection<NoConnect>("no_connect", [], noConnects);
    this.labels = new IndexedCollection<Label>(
      "label",
      [
        { name: "text", key: (l) => l.text },
        { name: "kind", key: (l) => l.labelKind },
      ],
      labels,
    );
    this.texts = new IndexedCollection<Text>("text", [{ name: "text", key: (t) => t.text }], texts);
    this.textBoxes = new IndexedCollection<TextBox>("text_box", [{ name: "text", key: (t) => t.text }], textBoxes);
    this.sheets = new IndexedCollection<Sheet>("sheet", [{ name: "name", key: (s) => s.name }], sheets);

    const uuid = this.uuid;
    if (uuid) this.uuids.reserve(uuid);
    for (const item of this.allItems()) {
      item.attach(this);
      if (item.uuid) this.uuids.reserve(item.uuid);
    }
    for (const id of this.nestedIds()) this.uuids.reserve(id);
  }

  static parse(text: string, options: SchematicOptions = {}): Schematic {
    return new Schematic(SExpressionParser.parse(text), options);
  }

  static load(filePath: string, options: SchematicOptions = {}): Schematic {
    const schematic = Schematic.parse(fs.readFileSync(filePath, "utf-8"), options);
    schematic.filePath = filePath;
    const stats = schematic.statistics();
    schematic.logger.info(`Loaded ${filePath}: ${stats.components} components, ${stats.wires} wires`);
    return schematic;
  }

  /** Empty document in the current KiCad format. */
  static create(options: CreateSchematicOptions = {}): Schematic {
    const uuids = new UuidManager(options.uuidGenerator);
    const uuid = options.uuid ?? uuids.next();
    const root = list(
      "kicad_sch",
      list("version", KICAD_VERSION),
      list("generator", str("eeschema")),
      list("generator_version", str("9.0")),
      list("uuid", str(uuid)),
      list("paper", str(options.paper ?? "A4")),
    );
    if (options.title !== undefined) root.append(list("title_block", list("title", str(options.title))));
    root.append(list("lib_symbols"));
    root.append(list("sheet_instances", list("path", str("/"), list("page", str("1")))));
    root.append(list("embedded_fonts", atom("no")));
    return new Schematic(new SDocument([root]), options);
  }

  serialize(): string {
    return SExpressionParser.serialize(this.doc);
  }

  save(filePath: string | undefined = this.filePath, options: SaveOptions = {}): void {
    if (!filePath) throw new InvalidArgumentError("No file path to save to");
    if (options.validate) {
      const errors = this.validate().filter((issue) => issue.severity === "error");
      if (errors.length > 0) throw new ValidationError(errors, "save");
    }
    fs.writeFileSync(filePath, this.serialize(), "utf-8");
    this.filePath = filePath;
    this.dirty = false;
    this.logger.info(`Saved ${filePath}`);
  }

  /** True after any mutation since load or the last save. */
  get modified(): boolean {
    return this.dirty;
  }

  // --- metadata -----------------------------------------------------------

  get version(): number | undefined {
    return this.root.child("version")?.number(1);
  }

  get generator(): string | undefined {
    return this.root.child("generator")?.text(1);
  }

  get generatorVersion(): string | undefined {
    return this.root.child("generator_version")?.text(1);
  }

  get uuid(): string {
    return this.root.child("uuid")?.text(1) ?? "";
  }

  /** Instance path of the top sheet. */
  get rootPath(): string {
    return `/${this.uuid}`;
  }

  get paper(): string | undefined {
    return this.root.child("paper")?.text(1);
  }

  set paper(value: string) {
    const paper = this.root.child("paper");
    if (paper) paper.setText(1, value);
    else this.insertTopLevel(list("paper", str(value)));
    this.touch();
  }

  get titleBlock(): TitleBlock {
    const block = this.root.child("title_block");
    const comments: Record<number, string> = {};
    for (const comment of block?.children("comment") ?? []) {
      const index = comment.number(1);
      if (index !== undefined) comments[index] = comment.text(2) ?? "";
    }
    return {
      title: block?.child("title")?.text(1),
      date: block?.child("date")?.text(1),
      rev: block?.child("rev")?.text(1),
      company: block?.child("company")?.text(1),
      comments,
    };
  }

  setTitleField(field: TitleField, value: string): void {
    this.titleBlockNode().upsert(field, [str(value)]);
    this.touch();
  }

  setTitleComment(index: number, value: string): void {
    if (!Number.isInteger(index) || index < 1 || index > 9) {
      throw new InvalidArgumentError(`Title block comment index must be 1..9, got ${index}`, { index });
    }
    const block = this.titleBlockNode();
    const existing = block.children("comment").find((c) => c.number(1) === index);
    if (existing) existing.setText(2, value);
    else block.append(list("comment", index, str(value)));
    this.touch();
  }

  // --- components ---------------------------------------------------------

  getComponent(reference: string): Component | undefined {
    return this.components.findOneBy("reference", reference);
  }

  requireComponent(reference: string): Component {
    const component = this.getComponent(reference);
    if (!component) throw new NotFoundError("component", reference);
    return component;
  }

  /** First unused `<prefix>N` (N from 1) in a scope, the root sheet by default. */
  nextReference(prefix: string, scope: string = this.rootPath): string {
    const used = new Set<number>();
    for (const component of this.components) {
      for (const s of component.referenceScopes(this.rootPath)) {
        const { prefix: p, number } = splitReference(s.reference);
        if (s.path === scope && p === prefix && number !== undefined) used.add(number);
      }
    }
    let n = 1;
    while (used.has(n)) n++;
    return `${prefix}${n}`;
  }

  /**
   * Places a symbol instance. A symbol that cannot be resolved is still placed
   * (without pin records); pin queries on it fail later.
   */
  addComponent(options: AddComponentOptions): Component {
    const { libId } = options;
    if (!libId || !libId.includes(":")) {
      throw new InvalidArgumentError(`Library identifier must look like Library:Symbol, got "${libId}"`, { libId });
    }
    const rotation = normalizeRotation(options.rotation ?? 0);
    const position = options.snap === false ? options.position : snapToGrid(options.position, this.grid);
    const unit = options.unit ?? 1;

    // Nothing is embedded until every check has passed.
    let found: { definition: SymbolDefinition; embedded: boolean } | undefined;
    try {
      found = this.lookupSymbol(libId);
    } catch (e) {
      if (!(e instanceof SymbolNotFoundError)) throw e;
      this.logger.warn(`Placing ${libId} without a symbol definition: ${e.message}`);
    }
    let definition = found?.definition;

    const prefix = (definition?.properties.get("Reference") ?? "U").replace(/\?+$/, "");
    const reference = options.reference ?? this.nextReference(prefix);
    if (!isValidReference(reference)) {
      throw new InvalidArgumentError(`Invalid reference "${reference}"`, { reference });
    }
    const instances = options.instances ?? [{ project: this.project, path: this.rootPath, reference, unit }];
    for (const instance of instances) this.assertReferenceFree(instance.path, instance.reference);

    const uuid = options.uuid === undefined ? this.uuids.next() : this.uuids.claim(options.uuid, "component");
    if (found && !found.embedded) definition = this.embedSymbol(found.definition);
    const pinNumbers = [...new Set((definition ? pinsForUnit(definition, unit) : []).map((pin) => pin.number))];

    const component = Component.create({
      uuid,
      libId,
      reference,
      value: options.value ?? definition?.properties.get("Value") ?? libId.slice(libId.indexOf(":") + 1),
      position,
      rotation,
      mirror: options.mirror,
      unit,
      footprint: options.footprint ?? definition?.properties.get("Footprint"),
      datasheet: definition?.properties.get("Datasheet"),
      description: definition?.properties.get("Description"),
      properties: options.properties,
      pins: pinNumbers.map((number) => ({ number, uuid: this.uuids.next() })),
      instances,
    });
    return this.attachItem(this.components, component);
  }

  /** Removes by identifier, reference or the component itself. */
  removeComponent(target: string | Component): Component {
    const component =
      typeof target === "string" ? (this.components.get(target) ?? this.getComponent(target)) : target;
    if (!component) throw new NotFoundError("component", typeof target === "string" ? target : target.uuid, "remove");
    for (const id of component.pinIds.values()) this.uuids.release(id);
    return this.detachItem(this.components, component);
  }

  // --- other entities -----------------------------------------------------

  addWire(points: readonly Point[], options: { kind?: WireKind; uuid?: string } = {}): Wire {
    const wire = Wire.create(points, this.claimId(options.uuid, "wire"), options.kind);
    return this.attachItem(this.wires, wire);
  }

  removeWire(target: string | Wire): Wire {
    return this.detachItem(this.wires, target);
  }

  addJunction(position: Point, options: { diameter?: number; uuid?: string } = {}): Junction {
    const junction = Junction.create(position, this.claimId(options.uuid, "junction"), options.diameter);
    return this.attachItem(this.junctions, junction);
  }

  removeJunction(target: string | Junction): Junction {
    return this.detachItem(this.junctions, target);
  }

  addNoConnect(position: Point, options: { uuid?: string } = {}): NoConnect {
    return this.attachItem(this.noConnects, NoConnect.create(position, this.claimId(options.uuid, "no_connect")));
  }

  removeNoConnect(target: string | NoConnect): NoConnect {
    return this.detachItem(this.noConnects, target);
  }

  addLabel(
    text: string,
    position: Point,
    options: { kind?: LabelKind; rotation?: number; shape?: LabelShape; uuid?: string } = {},
  ): Label {
    if (!text) throw new InvalidArgumentError("Label text cannot be empty");
    const label = Label.create({ ...options, text, position, uuid: this.claimId(options.uuid, "label") });
    return this.attachItem(this.labels, label);
  }

  removeLabel(target: string | Label): Label {
    return this.detachItem(this.labels, target);
  }

  addText(text: string, position: Point, options: TextStyle & { rotation?: number; uuid?: string } = {}): Text {
    if (!text) throw new InvalidArgumentError("Text cannot be empty");
    const item = Text.create({ ...options, text, position, uuid: this.claimId(options.uuid, "text") });
    return this.attachItem(this.texts, item);
  }

  removeText(target: string | Text): Text {
    return this.detachItem(this.texts, target);
  }

  addTextBox(
    text: string,
    position: Point,
    size: { width: number; height: number },
    options: Omit<TextBoxInit, "text" | "position" | "size" | "uuid"> & { uuid?: string } = {},
  ): TextBox {
    if (!text) throw new InvalidArgumentError("Text cannot be empty");
    const uuid = this.claimId(options.uuid, "text box");
    let item: TextBox;
    try {
      item = TextBox.create({ ...options, text, position, size, uuid });
    } catch (e) {
      this.uuids.release(uuid);
      throw e;
    }
    return this.attachItem(this.textBoxes, item);
  }

  removeTextBox(target: string | TextBox): TextBox {
    return this.detachItem(this.textBoxes, target);
  }

  addSheet(options: {
    name: string;
    fileName: string;
    position: Point;
    size: { width: number; height: number };
    page?: string;
    uuid?: string;
  }): Sheet {
    if (this.sheets.findOneBy("name", options.name)) {
      throw new InvalidArgumentError(`A sheet named ${options.name} already exists`, { name: options.name });
    }
    const sheet = Sheet.create({
      ...options,
      uuid: this.claimId(options.uuid, "sheet"),
      instance: { project: this.project, path: this.rootPath, page: options.page ?? String(this.sheets.size + 2) },
    });
    return this.attachItem(this.sheets, sheet);
  }

  removeSheet(target: string | Sheet): Sheet {
    const sheet = typeof target === "string" ? (this.sheets.get(target) ?? this.sheets.findOneBy("name", target)) : target;
    if (!sheet) throw new NotFoundError("sheet", typeof target === "string" ? target : target.uuid, "remove");
    for (const pin of sheet.pins()) this.uuids.release(pin.uuid);
    return this.detachItem(this.sheets, sheet);
  }

  addSheetPin(sheet: Sheet, pin: Omit<SheetPinInit, "uuid"> & { uuid?: string }): SheetPin {
    const uuid = this.claimId(pin.uuid, "sheet pin");
    try {
      return sheet.addPin({ ...pin, uuid });
    } catch (e) {
      this.uuids.release(uuid);
      throw e;
    }
  }

  /** Removes a sheet pin by name or identifier and frees its identifier. */
  removeSheetPin(sheet: Sheet, nameOrUuid: string): SheetPin {
    if (!this.sheets.has(sheet)) throw new NotFoundError("sheet", sheet.uuid, "removeSheetPin");
    return sheet.removePin(nameOrUuid);
  }

  // --- symbols and pins ---------------------------------------------------

  /**
   * Definition for a library identifier: the copy embedded in `lib_symbols`
   * when there is one, otherwise the resolver's, which is then embedded.
   */
  symbolFor(libId: string): SymbolDefinition {
    const { definition, embedded } = this.lookupSymbol(libId);
    return embedded ? definition : this.embedSymbol(definition);
  }

  /** Whether `symbolFor` would succeed, without embedding anything. */
  hasSymbol(libId: string): boolean {
    try {
      this.lookupSymbol(libId);
      return true;
    } catch (e) {
      if (e instanceof SymbolNotFoundError) return false;
      throw e;
    }
  }

  listPins(reference: string): PinInfo[] {
    const component = this.requireComponent(reference);
    const definition = this.symbolFor(component.libId);
    const placement = component.placement;
    const ids = component.pinIds;
    return pinsForUnit(definition, component.unit).map((pin) => ({
      number: pin.number,
      name: pin.name,
      type: pin.type,
      position: pinPosition(placement, pin.position),
      orientation: pinOrientation(placement, pin.orientation),
      uuid: ids.get(pin.number),
    }));
  }

  pinPosition(reference: string, pinNumber: string): Point {
    const pin = this.listPins(reference).find((p) => p.number === pinNumber);
    if (!pin) throw new NotFoundError("pin", `${reference}.${pinNumber}`);
    return pin.position;
  }

  /** Envelope of a component's pins, or its anchor point when it has none. */
  componentBox(component: Component, padding = 0): Box {
    let points: Point[] = [component.position];
    try {
      const pins = this.listPins(component.reference);
      if (pins.length > 0) points = pins.map((p) => p.position);
    } catch (e) {
      if (!(e instanceof SymbolNotFoundError)) throw e;
      this.logger.debug(`No pins for ${component.reference}; using its position as its extent`);
    }
    return boundingBox(points, padding);
  }

  // --- routing ------------------------------------------------------------

  /**
   * Connects two pins and returns the wires created, one per path segment.
   * Coincident pins need no wire.
   */
  routePins(refA: string, pinA: string, refB: string, pinB: string, options: RoutePinsOptions = {}): Wire[] {
    const start = this.pinPosition(refA, pinA);
    const end = this.pinPosition(refB, pinB);
    const router = new Router({
      ...this.routing,
      grid: this.grid,
      clearance: options.clearance ?? this.routing.clearance,
    });

    let path: Point[];
    if ((options.mode ?? "direct") === "pathfinding") {
      const obstacles =
        options.obstacles ??
        this.components
          .filter((c) => c.reference !== refA && c.reference !== refB)
          .map((c) => this.componentBox(c));
      path = router.route(start, end, obstacles);
    } else {
      path = router.direct(start, end, options.bend);
    }

    const wires: Wire[] = [];
    for (let i = 0; i + 1 < path.length; i++) wires.push(this.addWire([path[i], path[i + 1]]));
    return wires;
  }

  /** A single straight wire from one pin to another. */
  addWireBetweenPins(refA: string, pinA: string, refB: string, pinB: string): Wire {
    return this.addWire([this.pinPosition(refA, pinA), this.pinPosition(refB, pinB)]);
  }

  // --- connectivity -------------------------------------------------------

  /** Snapshot of the current wiring; buses carry no connections. */
  connectivity(): ConnectivityGraph {
    return ConnectivityGraph.build({
      wires: this.wires.findBy("kind", "wire").map((w) => w.points),
      junctions: this.junctions.toArray().map((j) => j.position),
    });
  }

  arePointsConnected(a: Point, b: Point): boolean {
    return this.connectivity().isConnected(a, b);
  }

  /** With `direct`, only a single wire segment between the pins counts. */
  arePinsConnected(refA: string, pinA: string, refB: string, pinB: string, options: { direct?: boolean } = {}): boolean {
    const a = this.pinPosition(refA, pinA);
    const b = this.pinPosition(refB, pinB);
    const graph = this.connectivity();
    return options.direct ? graph.isDirectlyConnected(a, b) : graph.isConnected(a, b);
  }

  traceNets(): Net[] {
    return this.connectivity().traceNets();
  }

  netOf(p: Point): Point[] {
    return this.connectivity().reachable(p);
  }

  // --- checks -------------------------------------------------------------

  validate(): ValidationIssue[] {
    return validateSchematic({
      rootPath: this.rootPath,
      components: this.components.toArray(),
      wires: this.wires.toArray(),
      items: this.allItems(),
      nestedIds: this.nestedIds(),
      hasSymbol: (libId) => this.hasSymbol(libId),
    });
  }

  statistics(): SchematicStatistics {
    return {
      components: this.components.size,
      wires: this.wires.findBy("kind", "wire").length,
      buses: this.wires.findBy("kind", "bus").length,
      junctions: this.junctions.size,
      noConnects: this.noConnects.size,
      labels: this.labels.size,
      texts: this.texts.size,
      textBoxes: this.textBoxes.size,
      sheets: this.sheets.size,
      libSymbols: this.root.child("lib_symbols")?.children("symbol").length ?? 0,
    };
  }

  // --- ItemOwner ----------------------------------------------------------

  itemChanged(item: SchematicItem): void {
    this.collectionOf(item)?.markDirty();
    this.touch();
  }

  idReleased(uuid: string): void {
    this.uuids.release(uuid);
  }

  referenceChanging(item: SchematicItem, next: string, previous: string): void {
    if (!(item instanceof Component)) return;
    if (!isValidReference(next)) throw new InvalidArgumentError(`Invalid reference "${next}"`, { reference: next });
    for (const scope of item.referenceScopes(this.rootPath)) {
      if (scope.reference === previous) this.assertReferenceFree(scope.path, next, item);
    }
  }

  // --- internals ----------------------------------------------------------

  // A scan rather than an index lookup, so adding components never forces a rebuild.
  private assertReferenceFree(path: string, reference: string, self?: Component): void {
    const holder = this.components.find(
      (c) => c !== self && c.referenceScopes(this.rootPath).some((s) => s.path === path && s.reference === reference),
    );
    if (holder) throw new DuplicateReferenceError(reference, path, holder.uuid);
  }

  /** Embedded copy first, then the resolver's, without embedding it. */
  private lookupSymbol(libId: string): { definition: SymbolDefinition; embedded: boolean } {
    const embedded = this.embeddedSymbols().get(libId);
    if (embedded) return { definition: embedded, embedded: true };
    if (!this.resolver) throw new SymbolNotFoundError(libId, "not embedded and no resolver configured");
    return { definition: this.resolver.resolve(libId), embedded: false };
  }

  private claimId(uuid: string | undefined, kind: string): string {
    return uuid === undefined ? this.uuids.next() : this.uuids.claim(uuid, kind);
  }

  private attachItem<T extends SchematicItem>(collection: IndexedCollection<T>, item: T): T {
    collection.add(item);
    this.insertTopLevel(item.node);
    item.attach(this);
    this.touch();
    return item;
  }

  private detachItem<T extends SchematicItem>(collection: IndexedCollection<T>, target: string | T): T {
    const item = collection.remove(target);
    this.root.remove(item.node);
    this.uuids.release(item.uuid);
    item.detach();
    this.touch();
    return item;
  }

  private collectionOf(item: SchematicItem): { markDirty(): void } | undefined {
    if (item instanceof Component) return this.components;
    if (item instanceof Wire) return this.wires;
    if (item instanceof Junction) return this.junctions;
    if (item instanceof NoConnect) return this.noConnects;
    if (item instanceof Label) return this.labels;
    if (item instanceof Text) return this.texts;
    if (item instanceof TextBox) return this.textBoxes;
    if (item instanceof Sheet) return this.sheets;
    return undefined;
  }

  private allItems(): SchematicItem[] {
    return [
      ...this.components,
      ...this.wires,
      ...this.junctions,
      ...this.noConnects,
      ...this.labels,
      ...this.texts,
      ...this.textBoxes,
      ...this.sheets,
    ];
  }

  private nestedIds(): string[] {
    const ids: string[] = [];
    for (const component of this.components) ids.push(...component.pinIds.values());
    for (const sheet of this.sheets) ids.push(...sheet.pins().map((p) => p.uuid).filter((id) => id));
    return ids;
  }

  /** Inserts after the last node of the same or an earlier section. */
  private insertTopLevel(node: SList): void {
    const rank = TOP_LEVEL_ORDER[node.keyword ?? ""] ?? Number.MAX_SAFE_INTEGER;
    let index = 1;
    this.root.items.forEach((item, i) => {
      if (i === 0 || !(item instanceof SList)) return;
      const itemRank = TOP_LEVEL_ORDER[item.keyword ?? ""];
      if (itemRank !== undefined && itemRank <= rank) index = i + 1;
    });
    this.root.insert(index, node);
  }

  private titleBlockNode(): SList {
    const existing = this.root.child("title_block");
    if (existing) return existing;
    const block = list("title_block");
    this.insertTopLevel(block);
    return block;
  }

  private embeddedSymbols(): Map<string, SymbolDefinition> {
    if (!this.embedded) {
      this.embedded = new Map();
      for (const node of this.root.child("lib_symbols")?.children("symbol") ?? []) {
        const libId = node.text(1);
        if (libId !== undefined) this.embedded.set(libId, readSymbolDefinition(node, libId));
      }
    }
    return this.embedded;
  }

  private embedSymbol(definition: SymbolDefinition): SymbolDefinition {
    let libSymbols = this.root.child("lib_symbols");
    if (!libSymbols) {
      libSymbols = list("lib_symbols");
      this.insertTopLevel(libSymbols);
    }
    const node = cloneNode(definition.node, true);
    node.setText(1, definition.libId);

    // lib_symbols is kept sorted by name, as KiCad writes it.
    const next = libSymbols.children("symbol").find((s) => (s.text(1) ?? "") > definition.libId);
    libSymbols.insert(next ? libSymbols.items.indexOf(next) : libSymbols.items.length, node);

    const embedded = readSymbolDefinition(node, definition.libId);
    this.embeddedSymbols().set(definition.libId, embedded);
    this.logger.debug(`Embedded symbol ${definition.libId}`);
    this.touch();
    return embedded;
  }

  private touch(): void {
    this.dirty = true;
  }
}
