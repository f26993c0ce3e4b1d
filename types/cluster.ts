export type FirmwareUpdateStatus =
  | "up_to_date"
  | "pending_update"
  | "update_available"
  | "update_in_progress"
  | "update_failed"
  | "update_impossible";

export interface ClusterPrinterConfigurationMaterial {
  readonly guid: string;
  readonly material: string;
  readonly brand: string;
  readonly color: string;
}

export interface ClusterPrintCoreConfiguration {
  readonly extruder_index: number;
  readonly material?: ClusterPrinterConfigurationMaterial;
  readonly print_core_id?: string;
}

export interface ClusterPrinterMaterialStationSlot extends ClusterPrintCoreConfiguration {
  readonly slot_index: number;
  readonly compatible: boolean;
  readonly material_remaining: number;
  readonly material_empty: boolean;
}

export interface ClusterPrinterMaterialStation {
  readonly id?: number;
  readonly supported: boolean;
  readonly material_slots: readonly ClusterPrinterMaterialStationSlot[];
}

export interface ClusterBuildPlate {
  readonly type: string;
}

export interface ClusterPrinterStatus {
  readonly enabled: boolean;
  readonly firmware_version: string;
  readonly friendly_name: string;
  readonly ip_address: string;
  readonly machine_variant: string;
  readonly status: string;
  readonly unique_name: string;
  readonly uuid: string;
  readonly configuration: readonly ClusterPrintCoreConfiguration[];
  readonly reserved_by?: string;
  readonly maintenance_required?: boolean;
  readonly firmware_update_status?: FirmwareUpdateStatus;
  readonly latest_available_firmware?: string;
  readonly build_plate?: ClusterBuildPlate;
  readonly material_station?: ClusterPrinterMaterialStation;
}

export interface MaterialOutput {
  guid: string;
  type: string;
  brand: string;
  color: string;
  name: string;
}

export interface ExtruderConfiguration {
  position: number;
  material: MaterialOutput | null;
  hotendId: string | null;
}

export interface PrinterConfiguration {
  printerType: string;
  buildplateConfiguration: string;
  extruderConfigurations: ExtruderConfiguration[];
}

export interface ExtruderOutput {
  position: number;
  hotendId: string | null;
  activeMaterial: MaterialOutput | null;
}

export interface OutputModelSnapshot {
  key: string;
  name: string;
  type: string;
  state: string;
  buildplate: string;
  cameraUrl: string | null;
  firmwareVersion: string;
  extruders: ExtruderOutput[];
  printerConfiguration: PrinterConfiguration;
  availableConfigurations: PrinterConfiguration[];
}

export interface MaterialCatalogEntry {
  guid: string;
  name: string;
  brand: string;
  color: string;
  material: string;
}
