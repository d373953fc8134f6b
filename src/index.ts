/**
 * KiCad schematic engine
 *
 * Loads, edits and writes `.kicad_sch` files, keeping untouched content byte-identical.
 */

// Document model
export { Schematic, schematicOptions } from "@sch/schematic/Schematic";
export type {
  SchematicOptions,
  CreateSchematicOptions,
  AddComponentOptions,
  PinInfo,
  RouteMode,
  RoutePinsOptions,
  TitleBlock,
  TitleField,
  SchematicStatistics,
  SaveOptions,
} from "@sch/schematic/Schematic";
export { Component, isValidReference, splitReference } from "@sch/schematic/Component";
export type { SymbolInstance, ReferenceScope } from "@sch/schematic/Component";
export { Wire } from "@sch/schematic/Wire";
export type { WireKind } from "@sch/schematic/Wire";
export { Junction } from "@sch/schematic/Junction";
export { NoConnect } from "@sch/schematic/NoConnect";
export { Label, LABEL_SHAPES } from "@sch/schematic/Label";
export type { LabelKind, LabelShape } from "@sch/schematic/Label";
export { Text, TextBox } from "@sch/schematic/Text";
export type { TextStyle, TextInit, TextBoxInit } from "@sch/schematic/Text";
export { Sheet, SheetPin } from "@sch/schematic/Sheet";
export type { SheetPinDirection } from "@sch/schematic/Sheet";
export { IndexedCollection } from "@sch/schematic/IndexedCollection";
export type { IndexSpec, CollectionStats } from "@sch/schematic/IndexedCollection";

// Engines
export { SExpressionParser } from "@sch/kicad/SExpressionParser";
export { SExpressionWriter } from "@sch/kicad/SExpressionWriter";
export { SAtom, SString, SList, SDocument, atom, str, num, list, formatNumber, quote } from "@sch/kicad/SExpression";
export type { SNode } from "@sch/kicad/SExpression";
export * as geometry from "@sch/kicad/Geometry";
export type { Point, Box, Rotation, Mirror, Placement } from "@sch/kicad/Geometry";
export { Router } from "@sch/kicad/Router";
export type { RouterOptions, BendPreference } from "@sch/kicad/Router";
export { ConnectivityGraph } from "@sch/kicad/Connectivity";
export type { Net } from "@sch/kicad/Connectivity";
export { SymbolLibrary, PIN_TYPES, readSymbolDefinition } from "@sch/kicad/SymbolLibrary";
export type { SymbolDefinition, SymbolPin, SymbolResolver, PinElectricalType } from "@sch/kicad/SymbolLibrary";
export { UuidManager } from "@sch/kicad/UuidManager";

// Ambient
export * from "@sch/errors";
export { loadConfig, parseConfig, defaultConfig } from "@sch/config";
export type { EngineConfig, LoadConfigOptions } from "@sch/config";
export { defaultLogger, silentLogger } from "@sch/logger";
export type { Logger } from "@sch/logger";
