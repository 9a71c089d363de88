import { z } from "zod";

/**
 * Shape of the static specialist catalog (registry/catalog.json).
 */
export const CatalogSpecialist = z.object({
  id: z.string().regex(/^[a-z0-9_]+$/, "specialist id must be snake_case"),
  subParameter: z.string().min(1),
  weight: z.number().positive(),
  dependencies: z.array(z.string().min(1)).default([]),
  role: z.string().min(1).optional(),
});

export const CatalogParameter = z.object({
  name: z.string().min(1),
  specialists: z.array(CatalogSpecialist).min(1),
});

export const CatalogCluster = z.object({
  name: z.string().min(1),
  displayName: z.string().min(1).optional(),
  weight: z.number().nonnegative(),
  persona: z.string().min(1),
  parameters: z.array(CatalogParameter).min(1),
});

export const SpecialistCatalog = z.object({
  version: z.string().default("1.0.0"),
  clusters: z.array(CatalogCluster).min(1),
});

export type SpecialistCatalogInput = z.input<typeof SpecialistCatalog>;
