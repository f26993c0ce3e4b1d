import type {
  ClusterPrintCoreConfiguration,
  ClusterPrinterMaterialStationSlot,
  ClusterPrinterStatus,
  ExtruderConfiguration,
  PrinterConfiguration,
} from "types/cluster";
import { MaterialCatalog, createExtruderConfiguration } from "./materials";

export const LEFT_EXTRUDER = 0;
export const RIGHT_EXTRUDER = 1;

export type ActiveConfigurationPair = {
  /** Extruder position on the output model this configuration belongs to. */
  position: number;
  configuration: ClusterPrintCoreConfiguration;
  extruderConfiguration: ExtruderConfiguration;
};

export type BaseConfiguration = Pick<PrinterConfiguration, "printerType" | "buildplateConfiguration">;

/**
 * A slot can be offered for an extruder only when it sits on that extruder,
 * the loaded core accepts it, and it actually holds material.
 */
export function isSupportedSlot(slot: ClusterPrinterMaterialStationSlot, extruderIndex: number): boolean {
  return (
    slot.extruder_index === extruderIndex &&
    slot.compatible &&
    slot.material !== undefined &&
    slot.material.material !== "" &&
    slot.material_remaining !== 0
  );
}

export class ConfigurationResolver {
  constructor(private readonly catalog: MaterialCatalog = new MaterialCatalog()) {}

  /**
   * Pairs configurations with extruders by list position. The configuration's
   * own extruder_index is not consulted; entries beyond the extruder count are
   * dropped and missing ones leave their extruder untouched.
   */
  resolveActive(status: ClusterPrinterStatus, extruderCount: number): ActiveConfigurationPair[] {
    const count = Math.min(status.configuration.length, Math.max(0, extruderCount));
    const pairs: ActiveConfigurationPair[] = [];
    for (let position = 0; position < count; position++) {
      const configuration = status.configuration[position];
      pairs.push({
        position,
        configuration,
        extruderConfiguration: createExtruderConfiguration(configuration, this.catalog),
      });
    }
    return pairs;
  }

  /**
   * Every left/right slot combination the material station can feed, left
   * slots outermost. Returns undefined when there is no station to offer.
   */
  resolveAvailable(status: ClusterPrinterStatus, base: BaseConfiguration): PrinterConfiguration[] | undefined {
    const slots = status.material_station?.material_slots ?? [];
    if (!slots.length) return undefined;

    const left = slots.filter((slot) => isSupportedSlot(slot, LEFT_EXTRUDER));
    const right = slots.filter((slot) => isSupportedSlot(slot, RIGHT_EXTRUDER));

    const combinations: PrinterConfiguration[] = [];
    for (const leftSlot of left) {
      for (const rightSlot of right) {
        combinations.push({
          printerType: base.printerType,
          buildplateConfiguration: base.buildplateConfiguration,
          extruderConfigurations: [
            createExtruderConfiguration(leftSlot, this.catalog),
            createExtruderConfiguration(rightSlot, this.catalog),
          ],
        });
      }
    }
    return combinations;
  }
}
