import fs from "node:fs";
import { z } from "zod";
import type {
  ClusterPrintCoreConfiguration,
  ClusterPrinterConfigurationMaterial,
  ExtruderConfiguration,
  MaterialCatalogEntry,
  MaterialOutput,
} from "types/cluster";
import { MaterialCatalogEntrySchema } from "../schemas";

const CatalogFileSchema = z.object({
  materials: z.array(MaterialCatalogEntrySchema),
});

export class MaterialCatalog {
  private byGuid = new Map<string, MaterialCatalogEntry>();

  constructor(entries: MaterialCatalogEntry[] = []) {
    for (const entry of entries) {
      this.byGuid.set(entry.guid, entry);
    }
  }

  /** An unreadable or malformed file yields an empty catalog. */
  static fromFile(file: string): MaterialCatalog {
    if (!fs.existsSync(file)) return new MaterialCatalog();
    try {
      const parsed = CatalogFileSchema.parse(JSON.parse(fs.readFileSync(file, "utf-8")));
      return new MaterialCatalog(parsed.materials);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(`Failed to load material catalog ${file}:`, err);
      return new MaterialCatalog();
    }
  }

  get(guid: string): MaterialCatalogEntry | undefined {
    return this.byGuid.get(guid);
  }

  entries(): MaterialCatalogEntry[] {
    return Array.from(this.byGuid.values()).sort((a, b) => a.name.localeCompare(b.name));
  }

  get size(): number {
    return this.byGuid.size;
  }
}

export function createMaterialOutput(
  material: ClusterPrinterConfigurationMaterial,
  catalog: MaterialCatalog,
): MaterialOutput {
  const known = catalog.get(material.guid);
  if (known) {
    return {
      guid: material.guid,
      type: known.material,
      brand: known.brand,
      color: known.color,
      name: known.name,
    };
  }
  return {
    guid: material.guid,
    type: material.material,
    brand: material.brand,
    color: material.color,
    name: material.material === "empty" ? "Empty" : "Unknown",
  };
}

export function createExtruderConfiguration(
  configuration: ClusterPrintCoreConfiguration,
  catalog: MaterialCatalog,
): ExtruderConfiguration {
  return {
    position: configuration.extruder_index,
    material: configuration.material ? createMaterialOutput(configuration.material, catalog) : null,
    hotendId: configuration.print_core_id ?? null,
  };
}
