import * as fs from 'node:fs';
import * as path from 'node:path';

import { createProvisioningError, describeError, PROVISIONING_ERROR_KIND } from '../../domain/errors/provisioning-error';

/** Injection token for the SKU display-name table. */
export const SKU_CATALOG = 'SKU_CATALOG';

export const DEFAULT_SKU_NAMES_FILE = path.resolve(__dirname, '..', '..', '..', 'config', 'sku-names.json');

/** Friendly product names keyed by SKU part number. */
export class SkuCatalog {
  private readonly names: ReadonlyMap<string, string>;

  constructor(names: Record<string, string>) {
    this.names = new Map(Object.entries(names).map(([part, name]) => [part.toUpperCase(), name]));
  }

  /** Friendly name when known, otherwise the part number itself. */
  label(skuPartNumber: string): string {
    return this.names.get(skuPartNumber.toUpperCase()) ?? skuPartNumber;
  }
}

export function loadSkuCatalog(filePath: string = DEFAULT_SKU_NAMES_FILE): SkuCatalog {
  let document: unknown;
  try {
    document = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw createProvisioningError({
      kind: PROVISIONING_ERROR_KIND.CONFIGURATION,
      detail: `Could not read SKU names "${filePath}": ${describeError(err)}`,
      cause: err,
    });
  }

  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw createProvisioningError({
      kind: PROVISIONING_ERROR_KIND.CONFIGURATION,
      detail: `SKU names "${filePath}" must be an object of part number → name.`,
    });
  }

  const names: Record<string, string> = {};
  for (const [part, name] of Object.entries(document)) {
    if (typeof name === 'string') names[part] = name;
  }
  return new SkuCatalog(names);
}
