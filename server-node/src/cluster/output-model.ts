import type {
  ExtruderConfiguration,
  ExtruderOutput,
  OutputModelSnapshot,
  PrinterConfiguration,
} from "types/cluster";
import type { ActiveConfigurationPair } from "./resolver";

/** What the projection adapter needs from a UI-owned printer model. */
export interface PrinterOutputConsumer {
  readonly extruderCount: number;
  readonly printerConfiguration: PrinterConfiguration;
  updateKey(key: string): void;
  updateName(name: string): void;
  updateType(type: string): void;
  updateState(state: string): void;
  updateBuildplate(buildplate: string): void;
  updateFirmwareVersion(version: string): void;
  setCameraUrl(url: string | null): void;
  applyActiveConfiguration(pairs: ActiveConfigurationPair[]): void;
  applyAvailableConfigurations(configurations: PrinterConfiguration[]): void;
}

function emptyExtruderConfiguration(position: number): ExtruderConfiguration {
  return { position, material: null, hotendId: null };
}

export class PrinterOutputModel implements PrinterOutputConsumer {
  key = "";
  name = "";
  type = "";
  state = "unknown";
  buildplate = "";
  cameraUrl: string | null = null;
  firmwareVersion: string;
  readonly extruders: ExtruderOutput[];
  readonly printerConfiguration: PrinterConfiguration;
  private availableConfigurations: PrinterConfiguration[] = [];

  constructor(extruderCount: number, firmwareVersion = "") {
    this.firmwareVersion = firmwareVersion;
    this.extruders = Array.from({ length: Math.max(0, extruderCount) }, (_, position) => ({
      position,
      hotendId: null,
      activeMaterial: null,
    }));
    this.printerConfiguration = {
      printerType: "",
      buildplateConfiguration: "",
      extruderConfigurations: this.extruders.map((extruder) => emptyExtruderConfiguration(extruder.position)),
    };
  }

  get extruderCount(): number {
    return this.extruders.length;
  }

  get available(): readonly PrinterConfiguration[] {
    return this.availableConfigurations;
  }

  updateKey(key: string): void {
    this.key = key;
  }

  updateName(name: string): void {
    this.name = name;
  }

  updateType(type: string): void {
    this.type = type;
    this.printerConfiguration.printerType = type;
  }

  updateState(state: string): void {
    this.state = state;
  }

  updateBuildplate(buildplate: string): void {
    this.buildplate = buildplate;
    this.printerConfiguration.buildplateConfiguration = buildplate;
  }

  updateFirmwareVersion(version: string): void {
    this.firmwareVersion = version;
  }

  setCameraUrl(url: string | null): void {
    this.cameraUrl = url;
  }

  applyActiveConfiguration(pairs: ActiveConfigurationPair[]): void {
    for (const { position, configuration, extruderConfiguration } of pairs) {
      const extruder = this.extruders[position];
      if (!extruder) continue;
      if (configuration.print_core_id !== undefined) {
        extruder.hotendId = configuration.print_core_id;
      }
      const material = extruderConfiguration.material;
      if (!material) {
        extruder.activeMaterial = null;
      } else if (extruder.activeMaterial?.guid !== material.guid) {
        extruder.activeMaterial = { ...material };
      }
      this.printerConfiguration.extruderConfigurations[position] = {
        ...extruderConfiguration,
        material: extruderConfiguration.material ? { ...extruderConfiguration.material } : null,
      };
    }
  }

  applyAvailableConfigurations(configurations: PrinterConfiguration[]): void {
    this.availableConfigurations = [...configurations];
  }

  toJSON(): OutputModelSnapshot {
    return structuredClone({
      key: this.key,
      name: this.name,
      type: this.type,
      state: this.state,
      buildplate: this.buildplate,
      cameraUrl: this.cameraUrl,
      firmwareVersion: this.firmwareVersion,
      extruders: this.extruders,
      printerConfiguration: this.printerConfiguration,
      availableConfigurations: this.availableConfigurations,
    });
  }
}
