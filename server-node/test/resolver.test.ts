import { describe, expect, it } from "@jest/globals";
import { ConfigurationResolver, isSupportedSlot } from "../src/cluster/resolver";
import { MaterialCatalog } from "../src/cluster/materials";
import { core, printerStatus, slot } from "./fixtures";

const base = { printerType: "Ultimaker S5", buildplateConfiguration: "glass" };

function guidsOf(combinations: ReturnType<ConfigurationResolver["resolveAvailable"]>): string[][] {
  return (combinations ?? []).map((combo) =>
    combo.extruderConfigurations.map((extruder) => extruder.material?.guid ?? "-"),
  );
}

describe("ConfigurationResolver.resolveActive", () => {
  const resolver = new ConfigurationResolver();

  it("pairs one configuration per extruder in list order", () => {
    const pairs = resolver.resolveActive(printerStatus(), 2);
    expect(pairs.map((pair) => pair.position)).toEqual([0, 1]);
    expect(pairs.map((pair) => pair.configuration.material?.guid)).toEqual(["guid-left", "guid-right"]);
    expect(pairs[1].extruderConfiguration).toEqual({
      position: 1,
      hotendId: "BB 0.4",
      material: { guid: "guid-right", type: "PLA", brand: "Generic", color: "#ffffff", name: "Unknown" },
    });
  });

  it("stops at the extruder count when there are more configurations", () => {
    const status = printerStatus({ configuration: [core(0, "a"), core(1, "b"), core(2, "c")] });
    expect(resolver.resolveActive(status, 2)).toHaveLength(2);
  });

  it("leaves trailing extruders unpaired when configurations run out", () => {
    const status = printerStatus({ configuration: [core(0, "a")] });
    const pairs = resolver.resolveActive(status, 2);
    expect(pairs).toHaveLength(1);
    expect(pairs[0].position).toBe(0);
  });

  it("returns nothing for an empty configuration list", () => {
    expect(resolver.resolveActive(printerStatus({ configuration: [] }), 2)).toEqual([]);
  });

  it("pairs by position rather than by the declared extruder index", () => {
    const status = printerStatus({ configuration: [core(1, "declared-right"), core(0, "declared-left")] });
    const pairs = resolver.resolveActive(status, 2);
    expect(pairs[0].position).toBe(0);
    expect(pairs[0].configuration.extruder_index).toBe(1);
    expect(pairs[0].configuration.material?.guid).toBe("declared-right");
  });
});

describe("isSupportedSlot", () => {
  it("accepts a compatible slot holding material on the requested extruder", () => {
    expect(isSupportedSlot(slot(0, "a"), 0)).toBe(true);
  });

  it("rejects a slot on the other extruder", () => {
    expect(isSupportedSlot(slot(1, "a"), 0)).toBe(false);
  });

  it("rejects an incompatible slot", () => {
    expect(isSupportedSlot(slot(0, "a", { compatible: false }), 0)).toBe(false);
  });

  it("rejects a slot with no material remaining", () => {
    expect(isSupportedSlot(slot(0, "a", { material_remaining: 0 }), 0)).toBe(false);
  });

  it("rejects a slot without material", () => {
    expect(isSupportedSlot(slot(0, "a", { material: undefined }), 0)).toBe(false);
    expect(
      isSupportedSlot(slot(0, "a", { material: { guid: "a", material: "", brand: "", color: "" } }), 0),
    ).toBe(false);
  });

  it("treats an unknown remaining amount as available", () => {
    expect(isSupportedSlot(slot(0, "a", { material_remaining: -1 }), 0)).toBe(true);
  });
});

describe("ConfigurationResolver.resolveAvailable", () => {
  const resolver = new ConfigurationResolver();

  it("skips printers without a material station", () => {
    expect(resolver.resolveAvailable(printerStatus(), base)).toBeUndefined();
  });

  it("skips a material station without slots", () => {
    const status = printerStatus({ material_station: { supported: true, material_slots: [] } });
    expect(resolver.resolveAvailable(status, base)).toBeUndefined();
  });

  it("combines left and right slots with the left side outermost", () => {
    const status = printerStatus({
      material_station: {
        supported: true,
        material_slots: [slot(0, "A"), slot(1, "X"), slot(0, "B"), slot(1, "Y")],
      },
    });
    expect(guidsOf(resolver.resolveAvailable(status, base))).toEqual([
      ["A", "X"],
      ["A", "Y"],
      ["B", "X"],
      ["B", "Y"],
    ]);
  });

  it("drops unsupported slots and unknown extruder indices", () => {
    const status = printerStatus({
      material_station: {
        supported: true,
        material_slots: [
          slot(0, "A"),
          slot(0, "empty-spool", { material_remaining: 0 }),
          slot(0, "wrong-core", { compatible: false }),
          slot(2, "third-extruder"),
          slot(1, "X"),
          slot(1, "unloaded", { material: undefined }),
        ],
      },
    });
    expect(guidsOf(resolver.resolveAvailable(status, base))).toEqual([["A", "X"]]);
  });

  it("yields an empty list when one side has nothing supported", () => {
    const status = printerStatus({
      material_station: {
        supported: true,
        material_slots: [slot(0, "A"), slot(0, "B"), slot(1, "X", { compatible: false })],
      },
    });
    expect(resolver.resolveAvailable(status, base)).toEqual([]);
  });

  it("produces |left| x |right| combinations carrying the printer's type and build plate", () => {
    const status = printerStatus({
      material_station: {
        supported: true,
        material_slots: [slot(0, "A"), slot(0, "B"), slot(0, "C"), slot(1, "X"), slot(1, "Y")],
      },
    });
    const combinations = resolver.resolveAvailable(status, base) ?? [];
    expect(combinations).toHaveLength(6);
    for (const combination of combinations) {
      expect(combination.printerType).toBe("Ultimaker S5");
      expect(combination.buildplateConfiguration).toBe("glass");
      expect(combination.extruderConfigurations.map((extruder) => extruder.position)).toEqual([0, 1]);
    }
  });

  it("names materials from the catalog when the guid is known", () => {
    const catalog = new MaterialCatalog([
      { guid: "A", name: "Generic PLA", brand: "Generic", color: "#ffc924", material: "PLA" },
    ]);
    const status = printerStatus({
      material_station: { supported: true, material_slots: [slot(0, "A"), slot(1, "X")] },
    });
    const [combination] = new ConfigurationResolver(catalog).resolveAvailable(status, base) ?? [];
    expect(combination.extruderConfigurations[0].material?.name).toBe("Generic PLA");
    expect(combination.extruderConfigurations[1].material?.name).toBe("Unknown");
  });

  it("returns deep-equal results for repeated calls on the same snapshot", () => {
    const status = printerStatus({
      material_station: { supported: true, material_slots: [slot(0, "A"), slot(1, "X"), slot(1, "Y")] },
    });
    expect(resolver.resolveAvailable(status, base)).toEqual(resolver.resolveAvailable(status, base));
    expect(resolver.resolveActive(status, 2)).toEqual(resolver.resolveActive(status, 2));
  });
});
