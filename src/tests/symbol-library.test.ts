import { describe, it, expect, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fileURLToPath } from "url";
import { SymbolLibrary, pinsForUnit, readSymbolDefinition } from "../kicad/SymbolLibrary";
import { SExpressionParser } from "../kicad/SExpressionParser";
import { SList } from "../kicad/SExpression";
import { SymbolNotFoundError } from "../errors";
import { silentLogger } from "../logger";

const symbolsDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "assets", "symbols");

describe("SymbolLibrary", () => {
  const lib = new SymbolLibrary([symbolsDir], { logger: silentLogger });

  it("loads a symbol with its pins", () => {
    const r = lib.resolve("Device:R");
    expect(r.libId).toBe("Device:R");
    expect(r.node.text(1)).toBe("Device:R");
    expect(r.unitCount).toBe(1);
    expect(r.pins.map((p) => [p.number, p.position, p.orientation, p.unit])).toEqual([
      ["1", { x: 0, y: 3.81 }, 270, 1],
      ["2", { x: 0, y: -3.81 }, 90, 1],
    ]);
    expect(r.pins[0]).toMatchObject({ name: "~", type: "passive", shape: "line", length: 1.27, style: 1 });
  });

  it("caches resolved definitions", () => {
    expect(lib.resolve("Device:R")).toBe(lib.resolve("Device:R"));
  });

  it("flattens symbols that extend another", () => {
    const small = lib.resolve("Device:R_Small");
    expect(small.node.child("extends")).toBeUndefined();
    expect(small.node.children("symbol").map((s) => s.text(1))).toEqual(["R_Small_0_1", "R_Small_1_1"]);
    expect([...small.properties]).toEqual([
      ["Reference", "R"],
      ["Value", "R_Small"],
      ["Footprint", ""],
      ["Datasheet", "~"],
      ["Description", "Small resistor"],
    ]);
    expect(small.pins.map((p) => p.number)).toEqual(["1", "2"]);
  });

  it("reads pin names and numbers", () => {
    const led = lib.resolve("Device:LED");
    expect(led.pins.map((p) => `${p.number}:${p.name}`)).toEqual(["1:K", "2:A"]);
    expect(led.properties.get("Reference")).toBe("D");
  });

  it("fails for unknown symbols and libraries", () => {
    expect(() => lib.resolve("Device:Nope")).toThrow(SymbolNotFoundError);
    expect(() => lib.resolve("Missing:R")).toThrow(/no Missing.kicad_sym/);
    expect(() => lib.resolve("NoColon")).toThrow(/expected Library:Symbol/);
  });

  it("warns about and skips library files it cannot parse", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "symbols-"));
    try {
      fs.writeFileSync(path.join(dir, "Broken.kicad_sym"), "(kicad_symbol_lib (symbol \"X\"");
      const logger = { ...silentLogger, warn: vi.fn() };
      const broken = new SymbolLibrary([dir], { logger });
      expect(() => broken.resolve("Broken:X")).toThrow(SymbolNotFoundError);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("readSymbolDefinition", () => {
  const node = SExpressionParser.parseNode(`(symbol "Amp:Dual"
    (property "Reference" "U")
    (symbol "Dual_0_1" (pin power_in line (at 0 5.08 270) (length 2.54) (name "V+") (number "8")))
    (symbol "Dual_1_1" (pin input line (at -5.08 2.54 0) (length 2.54) (name "+") (number "3")))
    (symbol "Dual_1_2" (pin input inverted (at -5.08 2.54 0) (length 2.54) (name "+") (number "3")))
    (symbol "Dual_2_1" (pin input line (at -5.08 2.54 0) (length 2.54) (name "+") (number "5")))
  )`);

  it("counts units and filters pins per unit", () => {
    if (!(node instanceof SList)) throw new Error("expected a list");
    const dual = readSymbolDefinition(node);
    expect(dual.libId).toBe("Amp:Dual");
    expect(dual.unitCount).toBe(2);
    expect(pinsForUnit(dual, 1).map((p) => p.number)).toEqual(["8", "3"]);
    expect(pinsForUnit(dual, 2).map((p) => p.number)).toEqual(["8", "5"]);
    expect(dual.pins[0].type).toBe("power_in");
  });
});
