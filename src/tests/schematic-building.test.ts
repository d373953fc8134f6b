import { describe, it, expect, vi, beforeEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fileURLToPath } from "url";
import { Schematic } from "../schematic/Schematic";
import { SymbolLibrary } from "../kicad/SymbolLibrary";
import { SExpressionWriter } from "../kicad/SExpressionWriter";
import { segmentIntersectsBox } from "../kicad/Geometry";
import {
  DuplicateReferenceError,
  InvalidArgumentError,
  NotFoundError,
  SymbolNotFoundError,
} from "../errors";
import { silentLogger } from "../logger";

const symbolsDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "assets", "symbols");
const ROOT = "aaaaaaaa-0000-0000-0000-000000000000";

function sequentialIds(): () => string {
  let n = 0;
  return () => `00000000-0000-0000-0000-${String(++n).padStart(12, "0")}`;
}

function newSchematic(): Schematic {
  return Schematic.create({
    uuid: ROOT,
    project: "demo",
    resolver: new SymbolLibrary([symbolsDir], { logger: silentLogger }),
    logger: silentLogger,
    uuidGenerator: sequentialIds(),
  });
}

describe("Schematic.create", () => {
  it("writes an empty document in the current format", () => {
    expect(Schematic.create({ uuid: ROOT, logger: silentLogger }).serialize()).toBe(
      [
        "(kicad_sch",
        "\t(version 20250114)",
        '\t(generator "eeschema")',
        '\t(generator_version "9.0")',
        `\t(uuid "${ROOT}")`,
        '\t(paper "A4")',
        "\t(lib_symbols)",
        "\t(sheet_instances",
        '\t\t(path "/"',
        '\t\t\t(page "1")',
        "\t\t)",
        "\t)",
        "\t(embedded_fonts no)",
        ")",
        "",
      ].join("\n"),
    );
  });

  it("adds a title block when given a title", () => {
    const sch = Schematic.create({ uuid: ROOT, title: "Demo", paper: "A3", logger: silentLogger });
    expect(sch.titleBlock.title).toBe("Demo");
    expect(sch.paper).toBe("A3");
    expect(sch.serialize()).toContain('\t(title_block\n\t\t(title "Demo")\n\t)\n\t(lib_symbols)');
  });
});

describe("adding components", () => {
  let sch: Schematic;

  beforeEach(() => {
    sch = newSchematic();
  });

  it("places a snapped, numbered instance of the library symbol", () => {
    const r1 = sch.addComponent({ libId: "Device:R", position: { x: 100, y: 100 } });
    expect(r1.reference).toBe("R1");
    expect(r1.uuid).toBe("00000000-0000-0000-0000-000000000001");
    expect(r1.position).toEqual({ x: 100.33, y: 100.33 });
    expect([...r1.properties]).toEqual([
      ["Reference", "R1"],
      ["Value", "R"],
      ["Footprint", ""],
      ["Datasheet", "~"],
      ["Description", "Resistor"],
    ]);
    expect([...r1.pinIds]).toEqual([
      ["1", "00000000-0000-0000-0000-000000000002"],
      ["2", "00000000-0000-0000-0000-000000000003"],
    ]);
    expect(r1.instances()).toEqual([{ project: "demo", path: `/${ROOT}`, reference: "R1", unit: 1 }]);
  });

  it("embeds the symbol definition once", () => {
    sch.addComponent({ libId: "Device:R", position: { x: 100, y: 100 } });
    sch.addComponent({ libId: "Device:R", position: { x: 120, y: 100 } });
    sch.addComponent({ libId: "Device:LED", position: { x: 140, y: 100 } });
    expect(sch.statistics().libSymbols).toBe(2);
    const text = sch.serialize();
    expect(text.indexOf('(symbol "Device:LED"')).toBeLessThan(text.indexOf('(symbol "Device:R"'));
    expect(sch.getComponent("D1")?.value).toBe("LED");
  });

  it("numbers references per prefix and reuses gaps", () => {
    sch.addComponent({ libId: "Device:R", position: { x: 100, y: 100 } });
    sch.addComponent({ libId: "Device:R", position: { x: 120, y: 100 } });
    sch.addComponent({ libId: "Device:R", position: { x: 140, y: 100 } });
    sch.removeComponent("R2");
    expect(sch.nextReference("R")).toBe("R2");
    expect(sch.addComponent({ libId: "Device:R", position: { x: 160, y: 100 } }).reference).toBe("R2");
    expect(sch.nextReference("C")).toBe("C1");
  });

  it("rejects a duplicate reference in the same sheet", () => {
    sch.addComponent({ libId: "Device:R", reference: "R1", position: { x: 100, y: 100 } });
    expect(() => sch.addComponent({ libId: "Device:R", reference: "R1", position: { x: 120, y: 100 } })).toThrow(
      DuplicateReferenceError,
    );
    expect(sch.components.size).toBe(1);
  });

  it("allows the same reference on different sheet instances", () => {
    sch.addComponent({ libId: "Device:R", reference: "R1", position: { x: 100, y: 100 } });
    const other = sch.addComponent({
      libId: "Device:R",
      reference: "R1",
      position: { x: 120, y: 100 },
      instances: [{ project: "demo", path: `/${ROOT}/bbbbbbbb-0000-0000-0000-000000000000`, reference: "R1", unit: 1 }],
    });
    expect(sch.components.findBy("reference", "R1")).toHaveLength(2);
    expect(other.instances()[0].path).toBe(`/${ROOT}/bbbbbbbb-0000-0000-0000-000000000000`);
  });

  it("rejects malformed references and library identifiers", () => {
    expect(() => sch.addComponent({ libId: "Device:R", reference: "r1", position: { x: 0, y: 0 } })).toThrow(
      InvalidArgumentError,
    );
    expect(() => sch.addComponent({ libId: "Resistor", position: { x: 0, y: 0 } })).toThrow(InvalidArgumentError);
    expect(() => sch.addComponent({ libId: "Device:R", position: { x: 0, y: 0 }, rotation: 45 })).toThrow(
      InvalidArgumentError,
    );
  });

  it("places unresolved symbols without pins and reports them", () => {
    const logger = { ...silentLogger, warn: vi.fn() };
    const lonely = Schematic.create({
      uuid: ROOT,
      resolver: new SymbolLibrary([symbolsDir], { logger: silentLogger }),
      logger,
    });
    const u1 = lonely.addComponent({ libId: "Device:Missing", position: { x: 0, y: 0 } });
    expect(u1.reference).toBe("U1");
    expect(u1.value).toBe("Missing");
    expect(u1.pinIds.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(() => lonely.listPins("U1")).toThrow(SymbolNotFoundError);
    expect(lonely.validate().map((issue) => issue.code)).toEqual(["MISSING_SYMBOL"]);
  });

  it("keeps the rotation and pin positions through save and reload", () => {
    const r3 = sch.addComponent({ libId: "Device:R", reference: "R3", position: { x: 150, y: 150 }, rotation: 90 });
    expect(r3.position).toEqual({ x: 149.86, y: 149.86 });
    const before = sch.listPins("R3").map((pin) => pin.position);
    expect(before).toEqual([
      { x: 146.05, y: 149.86 },
      { x: 153.67, y: 149.86 },
    ]);

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "schematic-"));
    try {
      const file = path.join(dir, "rotated.kicad_sch");
      sch.save(file);
      expect(sch.modified).toBe(false);
      const reloaded = Schematic.load(file, { logger: silentLogger });
      expect(reloaded.requireComponent("R3").rotation).toBe(90);
      expect(reloaded.listPins("R3").map((pin) => pin.position)).toEqual(before);
      expect(reloaded.serialize()).toBe(sch.serialize());
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("adds components without rebuilding the component indexes", () => {
    sch.getComponent("R1");
    const before = sch.components.stats.rebuilds;
    for (let i = 0; i < 5; i++) sch.addComponent({ libId: "Device:R", position: { x: 100 + i * 10.16, y: 100 } });
    expect(sch.components.stats).toEqual({ size: 5, dirty: true, rebuilds: before });
    expect(sch.getComponent("R5")?.position).toEqual({ x: 140.97, y: 100.33 });
    expect(sch.components.stats.rebuilds).toBe(before + 1);
  });

  it("mirrors and rotates existing components", () => {
    const r1 = sch.addComponent({ libId: "Device:R", position: { x: 100, y: 100 } });
    r1.mirror = "x";
    expect(sch.pinPosition("R1", "1")).toEqual({ x: 100.33, y: 104.14 });
    r1.mirror = undefined;
    r1.rotation = 270;
    expect(sch.pinPosition("R1", "1")).toEqual({ x: 104.14, y: 100.33 });
    expect(() => (r1.rotation = 30)).toThrow(InvalidArgumentError);
  });
});

describe("routing between pins", () => {
  let sch: Schematic;

  beforeEach(() => {
    sch = newSchematic();
  });

  it("wires two resistors with one bend and disconnects when the wires go", () => {
    sch.addComponent({ libId: "Device:R", position: { x: 100, y: 100 } });
    sch.addComponent({ libId: "Device:R", position: { x: 200, y: 100 } });

    const wires = sch.routePins("R1", "2", "R2", "1");
    expect(wires.map((w) => w.points)).toEqual([
      [
        { x: 100.33, y: 104.14 },
        { x: 199.39, y: 104.14 },
      ],
      [
        { x: 199.39, y: 104.14 },
        { x: 199.39, y: 96.52 },
      ],
    ]);
    expect(sch.arePinsConnected("R1", "2", "R2", "1")).toBe(true);
    expect(sch.arePinsConnected("R1", "1", "R2", "1")).toBe(false);

    for (const wire of wires) sch.removeWire(wire);
    expect(sch.arePinsConnected("R1", "2", "R2", "1")).toBe(false);
  });

  it("can route the vertical leg first", () => {
    sch.addComponent({ libId: "Device:R", position: { x: 100, y: 100 } });
    sch.addComponent({ libId: "Device:R", position: { x: 200, y: 100 } });
    const wires = sch.routePins("R1", "2", "R2", "1", { bend: "vertical-first" });
    expect(wires[0].end).toEqual({ x: 100.33, y: 96.52 });
  });

  it("needs no bend for aligned pins", () => {
    sch.addComponent({ libId: "Device:R", position: { x: 100.33, y: 100.33 } });
    sch.addComponent({ libId: "Device:R", position: { x: 100.33, y: 120.65 } });
    const wires = sch.routePins("R1", "2", "R2", "1");
    expect(wires).toHaveLength(1);
    expect(sch.arePinsConnected("R1", "2", "R2", "1", { direct: true })).toBe(true);
  });

  it("routes around components in the way", () => {
    sch.addComponent({ libId: "Device:R", position: { x: 100.33, y: 100.33 } });
    sch.addComponent({ libId: "Device:R", position: { x: 110.49, y: 100.33 } });
    const blocker = sch.addComponent({ libId: "Device:R", position: { x: 105.41, y: 104.14 } });
    const box = sch.componentBox(blocker);
    expect(box).toEqual({ x: 105.41, y: 100.33, width: 0, height: 7.62 });

    const wires = sch.routePins("R1", "2", "R2", "2", { mode: "pathfinding" });
    expect(wires).toHaveLength(3);
    expect(wires[0].start).toEqual({ x: 100.33, y: 104.14 });
    expect(wires[2].end).toEqual({ x: 110.49, y: 104.14 });
    for (const wire of wires) {
      for (const [a, b] of wire.segments()) expect(segmentIntersectsBox(a, b, box)).toBe(false);
    }
    expect(sch.arePinsConnected("R1", "2", "R2", "2")).toBe(true);
  });

  it("reports when no path exists", () => {
    sch.addComponent({ libId: "Device:R", position: { x: 100.33, y: 100.33 } });
    sch.addComponent({ libId: "Device:R", position: { x: 110.49, y: 100.33 } });
    const wall = { x: 90, y: 103, width: 30, height: 2 };
    expect(() => sch.routePins("R1", "2", "R2", "2", { mode: "pathfinding", obstacles: [wall] })).toThrow(/inside an obstacle/);
    expect(sch.wires.size).toBe(0);
  });

  it("adds a straight wire between two pins", () => {
    sch.addComponent({ libId: "Device:R", position: { x: 100.33, y: 100.33 } });
    sch.addComponent({ libId: "Device:R", position: { x: 110.49, y: 100.33 } });
    const wire = sch.addWireBetweenPins("R1", "1", "R2", "1");
    expect(wire.points).toEqual([
      { x: 100.33, y: 96.52 },
      { x: 110.49, y: 96.52 },
    ]);
    expect(() => sch.pinPosition("R1", "9")).toThrow(NotFoundError);
  });
});

describe("other entities", () => {
  let sch: Schematic;

  beforeEach(() => {
    sch = newSchematic();
  });

  it("writes local labels the way KiCad does", () => {
    const label = sch.addLabel("VOUT", { x: 120.65, y: 83.82 }, { uuid: "label-1" });
    expect(new SExpressionWriter().write(label.node)).toBe(
      '(label "VOUT"\n\t(at 120.65 83.82 0)\n\t(effects\n\t\t(font\n\t\t\t(size 1.27 1.27)\n\t\t)\n\t\t(justify left bottom)\n\t)\n\t(uuid "label-1")\n)',
    );
    expect(() => (label.shape = "output")).toThrow(InvalidArgumentError);
  });

  it("indexes labels by text and kind", () => {
    sch.addLabel("VIN", { x: 0, y: 0 });
    const global = sch.addLabel("VIN", { x: 10, y: 0 }, { kind: "global_label", shape: "output" });
    expect(sch.labels.findBy("text", "VIN")).toHaveLength(2);
    expect(sch.labels.findBy("kind", "global_label")).toEqual([global]);
    expect(global.shape).toBe("output");
    global.text = "VBAT";
    expect(sch.labels.findBy("text", "VIN")).toHaveLength(1);
    expect(() => sch.addLabel("", { x: 0, y: 0 })).toThrow(InvalidArgumentError);
  });

  it("keeps buses out of the connectivity graph", () => {
    sch.addWire(
      [
        { x: 0, y: 0 },
        { x: 10.16, y: 0 },
      ],
      { kind: "bus" },
    );
    expect(sch.statistics().buses).toBe(1);
    expect(sch.arePointsConnected({ x: 0, y: 0 }, { x: 10.16, y: 0 })).toBe(false);
  });

  it("needs two distinct points for a wire", () => {
    expect(() =>
      sch.addWire([
        { x: 1.27, y: 1.27 },
        { x: 1.27, y: 1.27 },
      ]),
    ).toThrow(InvalidArgumentError);
  });

  it("joins a tee through a junction", () => {
    sch.addWire([
      { x: 0, y: 0 },
      { x: 20.32, y: 0 },
    ]);
    sch.addWire([
      { x: 10.16, y: 0 },
      { x: 10.16, y: 10.16 },
    ]);
    expect(sch.arePointsConnected({ x: 0, y: 0 }, { x: 10.16, y: 10.16 })).toBe(false);
    sch.addJunction({ x: 10.16, y: 0 });
    expect(sch.arePointsConnected({ x: 0, y: 0 }, { x: 10.16, y: 10.16 })).toBe(true);
  });

  it("adds sheets with pins on their border", () => {
    const sheet = sch.addSheet({
      name: "Power",
      fileName: "power.kicad_sch",
      position: { x: 50.8, y: 50.8 },
      size: { width: 25.4, height: 20.32 },
    });
    expect(sheet.fileName).toBe("power.kicad_sch");
    expect(sheet.node.child("instances")?.child("project")?.child("path")?.child("page")?.text(1)).toBe("2");

    const vin = sch.addSheetPin(sheet, { name: "VIN", direction: "input", position: { x: 50.8, y: 55.88 } });
    const vout = sch.addSheetPin(sheet, { name: "VOUT", direction: "output", position: { x: 76.2, y: 55.88 } });
    expect([vin.rotation, vout.rotation]).toEqual([180, 0]);
    expect(sheet.pins().map((pin) => pin.name)).toEqual(["VIN", "VOUT"]);
    expect(() => sch.addSheetPin(sheet, { name: "GND", direction: "passive", position: { x: 60, y: 60 } })).toThrow(
      InvalidArgumentError,
    );

    expect(() =>
      sch.addSheet({ name: "Power", fileName: "p2.kicad_sch", position: { x: 0, y: 0 }, size: { width: 10, height: 10 } }),
    ).toThrow(InvalidArgumentError);

    sch.removeSheetPin(sheet, "VIN");
    expect(sheet.pins()).toHaveLength(1);
    // The freed identifier can be claimed again.
    const again = sch.addSheetPin(sheet, {
      name: "VIN",
      direction: "input",
      position: { x: 50.8, y: 58.42 },
      uuid: vin.uuid,
    });
    expect(again.uuid).toBe(vin.uuid);
    sheet.removePin(vout.uuid);
    expect(sch.addJunction({ x: 0, y: 0 }, { uuid: vout.uuid }).uuid).toBe(vout.uuid);
    expect(() => sch.removeSheetPin(sheet, "VOUT")).toThrow(NotFoundError);

    sch.removeSheet("Power");
    expect(() => sch.removeSheetPin(sheet, "VIN")).toThrow(NotFoundError);
    expect(sch.sheets.size).toBe(0);
  });
});

describe("adding text", () => {
  it("writes free text and text boxes in KiCad layout", () => {
    const sch = newSchematic();
    const box = sch.addTextBox("Notes", { x: 25.4, y: 25.4 }, { width: 50.8, height: 12.7 });
    const text = sch.addText("Rev A", { x: 10.16, y: 20.32 }, { bold: true });

    expect(box.size).toEqual({ width: 50.8, height: 12.7 });
    expect(box.margins).toEqual([0.9525, 0.9525, 0.9525, 0.9525]);
    expect(box.fillType).toBe("none");
    expect(box.justify).toEqual(["left", "top"]);
    expect(text.bold).toBe(true);
    expect(sch.statistics()).toMatchObject({ texts: 1, textBoxes: 1 });

    expect(sch.serialize()).toContain(
      [
        "\t(lib_symbols)",
        '\t(text_box "Notes"',
        "\t\t(exclude_from_sim no)",
        "\t\t(at 25.4 25.4 0)",
        "\t\t(size 50.8 12.7)",
        "\t\t(margins 0.9525 0.9525 0.9525 0.9525)",
        "\t\t(stroke",
        "\t\t\t(width 0)",
        "\t\t\t(type solid)",
        "\t\t)",
        "\t\t(fill",
        "\t\t\t(type none)",
        "\t\t)",
        "\t\t(effects",
        "\t\t\t(font",
        "\t\t\t\t(size 1.27 1.27)",
        "\t\t\t)",
        "\t\t\t(justify left top)",
        "\t\t)",
        '\t\t(uuid "00000000-0000-0000-0000-000000000001")',
        "\t)",
        '\t(text "Rev A"',
        "\t\t(exclude_from_sim no)",
        "\t\t(at 10.16 20.32 0)",
        "\t\t(effects",
        "\t\t\t(font",
        "\t\t\t\t(size 1.27 1.27)",
        "\t\t\t\t(bold yes)",
        "\t\t\t)",
        "\t\t)",
        '\t\t(uuid "00000000-0000-0000-0000-000000000002")',
        "\t)",
        "\t(sheet_instances",
      ].join("\n"),
    );
  });

  it("keeps text box edits and removal in step with the document", () => {
    const sch = newSchematic();
    const box = sch.addTextBox("Notes", { x: 25.4, y: 25.4 }, { width: 50.8, height: 12.7 });
    box.size = { width: 25.4, height: 12.7 };
    box.text = "Shorter";
    const reloaded = Schematic.parse(sch.serialize(), { logger: silentLogger });
    const [copy] = reloaded.textBoxes.toArray();
    expect(copy.text).toBe("Shorter");
    expect(copy.size).toEqual({ width: 25.4, height: 12.7 });
    expect(reloaded.textBoxes.findOneBy("text", "Shorter")?.uuid).toBe(box.uuid);

    sch.removeTextBox(box.uuid);
    expect(sch.textBoxes.size).toBe(0);
    expect(() => (box.size = { width: 0, height: 1 })).toThrow(InvalidArgumentError);
  });

  it("releases the identifier of a text box it could not create", () => {
    const sch = newSchematic();
    expect(() =>
      sch.addTextBox("Empty", { x: 0, y: 0 }, { width: 0, height: 5.08 }, { uuid: "box-1" }),
    ).toThrow(InvalidArgumentError);
    expect(sch.addText("Fine", { x: 0, y: 0 }, { uuid: "box-1" }).uuid).toBe("box-1");
    expect(sch.modified).toBe(true);
  });
});
