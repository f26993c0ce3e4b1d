import type {
  ClusterPrintCoreConfiguration,
  ClusterPrinterMaterialStationSlot,
  ClusterPrinterStatus,
} from "types/cluster";

export function material(guid: string, type = "PLA") {
  return { guid, material: type, brand: "Generic", color: "#ffffff" };
}

export function core(extruderIndex: number, guid: string, printCoreId = "AA 0.4"): ClusterPrintCoreConfiguration {
  return { extruder_index: extruderIndex, material: material(guid), print_core_id: printCoreId };
}

export function slot(
  extruderIndex: number,
  guid: string,
  overrides: Partial<ClusterPrinterMaterialStationSlot> = {},
): ClusterPrinterMaterialStationSlot {
  return {
    extruder_index: extruderIndex,
    material: material(guid),
    print_core_id: extruderIndex === 0 ? "AA 0.4" : "BB 0.4",
    slot_index: 0,
    compatible: true,
    material_remaining: 0.75,
    material_empty: false,
    ...overrides,
  };
}

export function printerStatus(overrides: Partial<ClusterPrinterStatus> = {}): ClusterPrinterStatus {
  return {
    enabled: true,
    firmware_version: "5.2.11",
    friendly_name: "Lab printer 1",
    ip_address: "192.168.1.50",
    machine_variant: "Ultimaker S5",
    status: "idle",
    unique_name: "lab-printer-1",
    uuid: "printer-uuid-1",
    configuration: [core(0, "guid-left"), core(1, "guid-right", "BB 0.4")],
    ...overrides,
  };
}

/** The same printer as it arrives on the wire, before parsing. */
export function rawPrinterStatus(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    enabled: true,
    firmware_version: "5.2.11",
    friendly_name: "Lab printer 1",
    ip_address: "192.168.1.50",
    machine_variant: "Ultimaker S5",
    status: "idle",
    unique_name: "lab-printer-1",
    uuid: "printer-uuid-1",
    configuration: [
      { extruder_index: 0, material: { guid: "guid-left", material: "PLA" }, print_core_id: "AA 0.4" },
      { extruder_index: 1, material: { guid: "guid-right", material: "PVA" }, print_core_id: "BB 0.4" },
    ],
    ...overrides,
  };
}
