/**
 * Per-category mitigation economics: base cost (EUR), expected effectiveness,
 * and the recommended action. Unknown categories resolve to the default profile.
 */
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import type { AssetCategory, CategoryProfile, KnownAssetCategory } from '../models/attack-surface.js';

export type CategoryCatalog = ReadonlyMap<string, CategoryProfile>;

export const DEFAULT_CATEGORY_PROFILE: CategoryProfile = {
  baseCost: 1000,
  effectiveness: 0.7,
  recommendation: 'Review security configuration',
};

const BUILTIN_PROFILES: Record<KnownAssetCategory, CategoryProfile> = {
  pos: {
    baseCost: 500,
    effectiveness: 0.7,
    recommendation: 'Update POS firmware, implement network segmentation',
  },
  server: {
    baseCost: 5000,
    effectiveness: 0.8,
    recommendation: 'OS hardening, automated patch management, advanced monitoring',
  },
  network: {
    baseCost: 3000,
    effectiveness: 0.85,
    recommendation: 'Micro-segmentation, zero trust architecture, traffic monitoring',
  },
  iot: {
    baseCost: 200,
    effectiveness: 0.6,
    recommendation: 'Firmware update, VLAN isolation, anomaly monitoring',
  },
  database: {
    baseCost: 8000,
    effectiveness: 0.9,
    recommendation: 'Encryption at rest and in transit, access control, audit logging',
  },
};

export const DEFAULT_CATEGORY_CATALOG: CategoryCatalog = new Map(Object.entries(BUILTIN_PROFILES));

const categoryOverridesSchema = z.record(
  z.string().min(1),
  z.object({
    baseCost: z.number().positive(),
    effectiveness: z.number().min(0).max(1),
    recommendation: z.string().min(1),
  }),
);

/** Built-in catalog with the given categories replaced or added. */
export function createCategoryCatalog(overrides: unknown = {}): CategoryCatalog {
  const result = categoryOverridesSchema.safeParse(overrides);
  if (!result.success) {
    throw ConfigurationError.fromZodIssues('Invalid category profiles', result.error.issues);
  }
  return new Map([...DEFAULT_CATEGORY_CATALOG, ...Object.entries(result.data)]);
}

export function resolveCategoryProfile(
  category: AssetCategory,
  catalog: CategoryCatalog = DEFAULT_CATEGORY_CATALOG,
): CategoryProfile {
  return catalog.get(category) ?? DEFAULT_CATEGORY_PROFILE;
}
