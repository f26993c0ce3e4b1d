import { z } from "zod";
import type {
  ClusterBuildPlate,
  ClusterPrintCoreConfiguration,
  ClusterPrinterConfigurationMaterial,
  ClusterPrinterMaterialStation,
  ClusterPrinterMaterialStationSlot,
  ClusterPrinterStatus,
  MaterialCatalogEntry,
  OutputModelSnapshot,
  PrinterConfiguration,
} from "types/cluster";

// Payload schemas take loosely typed JSON in, so their input side is `unknown`.
type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** Printers send `null` for fields they do not report; both null and a missing key come out as undefined. */
function absentWhenNull<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

export const FirmwareUpdateStatusSchema = z.enum([
  "up_to_date",
  "pending_update",
  "update_available",
  "update_in_progress",
  "update_failed",
  "update_impossible",
]);

export const ConfigurationMaterialSchema: PayloadSchema<ClusterPrinterConfigurationMaterial> = z.object({
  guid: z.string().default(""),
  material: z.string(),
  brand: z.string().default(""),
  color: z.string().default(""),
});

const printCoreShape = {
  extruder_index: z.number().int(),
  material: absentWhenNull(ConfigurationMaterialSchema),
  print_core_id: absentWhenNull(z.string()),
};

export const PrintCoreConfigurationSchema: PayloadSchema<ClusterPrintCoreConfiguration> =
  z.object(printCoreShape);

export const MaterialStationSlotSchema: PayloadSchema<ClusterPrinterMaterialStationSlot> = z.object({
  ...printCoreShape,
  slot_index: z.number().int(),
  compatible: z.boolean(),
  material_remaining: z.number(),
  material_empty: z.boolean().default(false),
});

export const MaterialStationSchema: PayloadSchema<ClusterPrinterMaterialStation> = z.object({
  id: z.number().int().optional(),
  supported: z.boolean().default(false),
  material_slots: z.array(MaterialStationSlotSchema).default([]),
});

export const BuildPlateSchema: PayloadSchema<ClusterBuildPlate> = z.object({
  type: z.string(),
});

export const PrinterStatusSchema: PayloadSchema<ClusterPrinterStatus> = z.object({
  enabled: z.boolean(),
  firmware_version: z.string(),
  friendly_name: z.string(),
  ip_address: z.string(),
  machine_variant: z.string(),
  status: z.string(),
  unique_name: z.string(),
  uuid: z.string(),
  configuration: z.array(PrintCoreConfigurationSchema),
  reserved_by: absentWhenNull(z.string()),
  maintenance_required: absentWhenNull(z.boolean()),
  firmware_update_status: absentWhenNull(FirmwareUpdateStatusSchema),
  latest_available_firmware: absentWhenNull(z.string()),
  build_plate: absentWhenNull(BuildPlateSchema),
  material_station: absentWhenNull(MaterialStationSchema),
});

export const ClusterStatusSchema = z.object({
  printers: z.array(PrinterStatusSchema),
});

// --------------------------- responses ---------------------------

const MaterialOutputSchema = z.object({
  guid: z.string(),
  type: z.string(),
  brand: z.string(),
  color: z.string(),
  name: z.string(),
});

const ExtruderConfigurationSchema = z.object({
  position: z.number(),
  material: MaterialOutputSchema.nullable(),
  hotendId: z.string().nullable(),
});

export const PrinterConfigurationSchema: z.ZodType<PrinterConfiguration> = z.object({
  printerType: z.string(),
  buildplateConfiguration: z.string(),
  extruderConfigurations: z.array(ExtruderConfigurationSchema),
});

export const OutputModelSnapshotSchema: z.ZodType<OutputModelSnapshot> = z.object({
  key: z.string(),
  name: z.string(),
  type: z.string(),
  state: z.string(),
  buildplate: z.string(),
  cameraUrl: z.string().nullable(),
  firmwareVersion: z.string(),
  extruders: z.array(
    z.object({
      position: z.number(),
      hotendId: z.string().nullable(),
      activeMaterial: MaterialOutputSchema.nullable(),
    }),
  ),
  printerConfiguration: PrinterConfigurationSchema,
  availableConfigurations: z.array(PrinterConfigurationSchema),
});

export const ClusterPrintersResponseSchema = z.object({
  printers: z.array(OutputModelSnapshotSchema),
});

export const ConfigurationsResponseSchema = z.object({
  active: z.array(ExtruderConfigurationSchema),
  available: z.array(PrinterConfigurationSchema).nullable(),
});

export const MaterialCatalogEntrySchema: z.ZodType<MaterialCatalogEntry> = z.object({
  guid: z.string().min(1),
  name: z.string(),
  brand: z.string(),
  color: z.string(),
  material: z.string(),
});

export const MaterialsResponseSchema = z.object({
  materials: z.array(MaterialCatalogEntrySchema),
});

export const HealthResponseSchema = z.object({
  status: z.literal("ok"),
  uptime_ms: z.number(),
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  issues: z
    .array(
      z.object({
        path: z.string(),
        message: z.string(),
      }),
    )
    .optional(),
});
