import type { ClusterPrinterStatus } from "types/cluster";
import { settings } from "../settings";
import { MaterialCatalog } from "./materials";
import { PrinterOutputConsumer, PrinterOutputModel } from "./output-model";
import { ConfigurationResolver } from "./resolver";

export const DEFAULT_BUILDPLATE = "glass";
export const DISABLED_STATE = "disabled";

export type ProjectionOptions = {
  catalog?: MaterialCatalog;
  cameraStreamPort?: number;
};

export function displayState(status: ClusterPrinterStatus): string {
  return status.enabled ? status.status : DISABLED_STATE;
}

export function cameraStreamUrl(ipAddress: string, port: number = settings.cameraStreamPort): string {
  return `http://${ipAddress}:${port}/?action=stream`;
}

export function createOutputModel(status: ClusterPrinterStatus, options: ProjectionOptions = {}): PrinterOutputModel {
  const model = new PrinterOutputModel(status.configuration.length, status.firmware_version);
  updateOutputModel(status, model, options);
  return model;
}

/**
 * Push a status snapshot into a UI model. A printer without a material station
 * leaves the model's selectable configurations as they were.
 */
export function updateOutputModel(
  status: ClusterPrinterStatus,
  model: PrinterOutputConsumer,
  options: ProjectionOptions = {},
): void {
  const resolver = new ConfigurationResolver(options.catalog);

  model.updateKey(status.uuid);
  model.updateName(status.friendly_name);
  model.updateType(status.machine_variant);
  model.updateState(displayState(status));
  model.updateBuildplate(status.build_plate?.type ?? DEFAULT_BUILDPLATE);
  model.updateFirmwareVersion(status.firmware_version);
  model.setCameraUrl(cameraStreamUrl(status.ip_address, options.cameraStreamPort));

  const available = resolver.resolveAvailable(status, {
    printerType: model.printerConfiguration.printerType,
    buildplateConfiguration: model.printerConfiguration.buildplateConfiguration,
  });
  if (available) {
    model.applyAvailableConfigurations(available);
  }
  model.applyActiveConfiguration(resolver.resolveActive(status, model.extruderCount));
}
