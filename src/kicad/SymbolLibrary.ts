import * as fs from "fs";
import * as path from "path";
import { SymbolNotFoundError } from "@sch/errors";
import { type Logger, defaultLogger } from "@sch/logger";
import type { Point } from "./Geometry";
import { SList, SString, cloneNode } from "./SExpression";
import { SExpressionParser } from "./SExpressionParser";

export const PIN_TYPES = [
  "input",
  "output",
  "bidirectional",
  "tri_state",
  "passive",
  "free",
  "unspecified",
  "power_in",
  "power_out",
  "open_collector",
  "open_emitter",
  "no_connect",
] as const;

export type PinElectricalType = (typeof PIN_TYPES)[number];

export interface SymbolPin {
  number: string;
  name: string;
  type: PinElectricalType;
  shape: string;
  /** Connection point in library coordinates (Y up). */
  position: Point;
  /** Library-frame direction in degrees. */
  orientation: number;
  length: number;
  /** 0 when shared by every unit. */
  unit: number;
  /** Body style; 0 when shared, 2 for the alternate (De Morgan) body. */
  style: number;
}

export interface SymbolDefinition {
  libId: string;
  /** The `(symbol "Lib:Name" ...)` node, flattened when it extended another symbol. */
  node: SList;
  pins: SymbolPin[];
  properties: Map<string, string>;
  unitCount: number;
}

/** Supplies symbol definitions by library identifier (`Lib:Name`). */
export interface SymbolResolver {
  /** Throws `SymbolNotFoundError` when the symbol is unknown. */
  resolve(libId: string): SymbolDefinition;
}

/**
 * Reads pins and properties out of a `(symbol ...)` definition node.
 */
export function readSymbolDefinition(node: SList, libId = node.text(1) ?? ""): SymbolDefinition {
  const pins: SymbolPin[] = [];
  const units = new Set<number>();

  const collect = (symbol: SList, unit: number, style: number) => {
    for (const pin of symbol.children("pin")) {
      const at = pin.child("at");
      const rawType = pin.text(1) ?? "unspecified";
      pins.push({
        number: pin.child("number")?.text(1) ?? "",
        name: pin.child("name")?.text(1) ?? "",
        type: isPinType(rawType) ? rawType : "unspecified",
        shape: pin.text(2) ?? "line",
        position: { x: at?.number(1) ?? 0, y: at?.number(2) ?? 0 },
        orientation: at?.number(3) ?? 0,
        length: pin.child("length")?.number(1) ?? 0,
        unit,
        style,
      });
    }
  };

  collect(node, 0, 0);
  for (const sub of node.children("symbol")) {
    const match = (sub.text(1) ?? "").match(/_(\d+)_(\d+)$/);
    const unit = match ? Number(match[1]) : 0;
    const style = match ? Number(match[2]) : 0;
    if (unit > 0) units.add(unit);
    collect(sub, unit, style);
  }

  const properties = new Map<string, string>();
  for (const prop of node.children("property")) {
    const name = prop.text(1);
    if (name !== undefined) properties.set(name, prop.text(2) ?? "");
  }

  return { libId, node, pins, properties, unitCount: Math.max(1, units.size) };
}

/** Pins that belong to one unit (and the normal body style) of a symbol. */
export function pinsForUnit(definition: SymbolDefinition, unit: number): SymbolPin[] {
  return definition.pins.filter((pin) => (pin.unit === 0 || pin.unit === unit) && pin.style <= 1);
}

function isPinType(value: string): value is PinElectricalType {
  return PIN_TYPES.some((type) => type === value);
}

export interface SymbolLibraryOptions {
  logger?: Logger;
}

/**
 * File-backed resolver: `Lib:Name` is looked up in `<Lib>.kicad_sym` on the
 * search paths. Symbols that `extends` another are flattened into a single
 * self-contained definition, ready to embed into a schematic.
 */
export class SymbolLibrary implements SymbolResolver {
  private loadedLibraries = new Map<string, Map<string, SList>>();
  private definitions = new Map<string, SymbolDefinition>();
  private libraryPaths: string[];
  private logger: Logger;

  constructor(libraryPaths: string[] = [], options: SymbolLibraryOptions = {}) {
    this.libraryPaths = libraryPaths;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Set the search paths for symbol libraries. Already loaded libraries stay cached.
   */
  setLibraryPaths(paths: string[]) {
    this.libraryPaths = paths;
  }

  resolve(libId: string): SymbolDefinition {
    const cached = this.definitions.get(libId);
    if (cached) return cached;

    const separator = libId.indexOf(":");
    const libName = libId.slice(0, separator);
    const symName = libId.slice(separator + 1);
    if (separator <= 0 || !symName) throw new SymbolNotFoundError(libId, "expected Library:Symbol");

    const lib = this.ensureLibraryLoaded(libName);
    if (!lib) throw new SymbolNotFoundError(libId, `no ${libName}.kicad_sym on the library paths`);

    const symbol = lib.get(symName);
    if (!symbol) throw new SymbolNotFoundError(libId, `not defined in ${libName}.kicad_sym`);

    const dependencies: SList[] = [];
    this.collectDependencies(lib, symbol, dependencies);
    const definition = readSymbolDefinition(this.flattenSymbol(symbol, dependencies), libId);
    this.definitions.set(libId, definition);
    return definition;
  }

  private ensureLibraryLoaded(libName: string): Map<string, SList> | undefined {
    const loaded = this.loadedLibraries.get(libName);
    if (loaded) return loaded;

    for (const searchPath of this.libraryPaths) {
      const filePath = path.join(searchPath, `${libName}.kicad_sym`);
      if (!fs.existsSync(filePath)) continue;

      let root: SList | undefined;
      try {
        root = SExpressionParser.parse(fs.readFileSync(filePath, "utf-8")).root;
      } catch (e) {
        this.logger.warn(`Failed to parse library ${filePath}:`, e);
        continue;
      }
      if (!root || root.keyword !== "kicad_symbol_lib") {
        this.logger.warn(`Ignoring ${filePath}: not a kicad_symbol_lib file`);
        continue;
      }

      const symbolMap = new Map<string, SList>();
      for (const item of root.children("symbol")) {
        const name = item.text(1);
        if (name === undefined) continue;
        // Only the top-level name is qualified; unit names stay relative to it.
        item.setText(1, `${libName}:${name}`);
        this.qualifyExtends(item, libName);
        symbolMap.set(name, item);
      }
      this.loadedLibraries.set(libName, symbolMap);
      return symbolMap;
    }
    return undefined;
  }

  private qualifyExtends(symbol: SList, libName: string) {
    for (const item of symbol.children()) {
      if (item.keyword === "symbol") {
        this.qualifyExtends(item, libName);
      } else if (item.keyword === "extends") {
        const parent = item.text(1);
        if (parent !== undefined && !parent.includes(":")) item.setText(1, `${libName}:${parent}`);
      }
    }
  }

  /**
   * Merges the extends chain into one symbol. Parents come first, so the
   * child's properties override inherited ones; inherited units are renamed
   * after the child.
   */
  private flattenSymbol(symbol: SList, dependencies: SList[]): SList {
    if (!symbol.child("extends")) return cloneNode(symbol, true);

    const qualifiedName = symbol.text(1) ?? "";
    const childShortName = qualifiedName.split(":").pop() ?? "";
    const mergedProps = new Map<string, SList>();
    const mergedUnits: SList[] = [];

    for (const dep of dependencies) {
      for (const prop of dep.children("property")) mergedProps.set(prop.text(1) ?? "", prop);
      for (const unit of dep.children("symbol")) {
        const renamed = cloneNode(unit, true);
        const suffix = (unit.text(1) ?? "").match(/(_\d+_\d+)$/)?.[1] ?? "";
        renamed.setText(1, `${childShortName}${suffix}`);
        mergedUnits.push(renamed);
      }
    }
    for (const prop of symbol.children("property")) mergedProps.set(prop.text(1) ?? "", prop);
    mergedUnits.push(...symbol.children("symbol"));

    const finalSymbol = new SList([cloneNode(symbol.items[0], true), new SString(qualifiedName)]);
    const excluded = new Set(["property", "symbol", "extends"]);
    for (const item of symbol.children()) {
      if (!excluded.has(item.keyword ?? "")) finalSymbol.append(cloneNode(item, true));
    }
    for (const prop of mergedProps.values()) finalSymbol.append(cloneNode(prop, true));
    for (const unit of mergedUnits) finalSymbol.append(cloneNode(unit, true));
    return finalSymbol;
  }

  private collectDependencies(lib: Map<string, SList>, symbol: SList, dependencies: SList[]) {
    for (const item of symbol.children("extends")) {
      const qualifiedParentName = item.text(1);
      if (qualifiedParentName === undefined) continue;
      const parts = qualifiedParentName.split(":");
      const parentShortName = parts.length > 1 ? parts.slice(1).join(":") : qualifiedParentName;

      const parent = lib.get(parentShortName);
      if (!parent) {
        this.logger.warn(`Dependent symbol "${qualifiedParentName}" (extended by symbol) not found in library.`);
        continue;
      }
      // Post-order, so the root ancestor is merged first; cycles stop here.
      if (!dependencies.includes(parent)) {
        dependencies.push(parent);
        this.collectDependencies(lib, parent, dependencies);
        dependencies.splice(dependencies.indexOf(parent), 1);
        dependencies.push(parent);
      }
    }
  }
}
