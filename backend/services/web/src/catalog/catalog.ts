// backend/services/web/src/catalog/catalog.ts
/**
 * Read-only guitar catalog backing the page routes.
 *
 * The production catalog lives elsewhere; this service only needs the
 * `GuitarCatalog` seam. `loadCatalogFile` reads a JSON snapshot for local
 * runs and tests.
 */

import fs from "node:fs/promises";
import { z } from "zod";

export const guitarSchema = z.object({
  slug: z.string().regex(/^[a-z0-9-]+$/),
  name: z.string().min(1),
  maker: z.string().min(1),
  body: z.enum(["solid", "semi-hollow", "hollow", "acoustic"]),
  priceCents: z.number().int().nonnegative(),
  featured: z.boolean().default(false),
  summary: z.string().default(""),
});

export type Guitar = z.infer<typeof guitarSchema>;

const catalogFileSchema = z.object({ guitars: z.array(guitarSchema) });

export interface GuitarCatalog {
  featured(): readonly Guitar[];
  bySlug(slug: string): Guitar | undefined;
}

export class InMemoryCatalog implements GuitarCatalog {
  private readonly bySlugMap: ReadonlyMap<string, Guitar>;

  constructor(private readonly guitars: readonly Guitar[]) {
    this.bySlugMap = new Map(guitars.map((g) => [g.slug, g]));
  }

  featured(): readonly Guitar[] {
    return this.guitars.filter((g) => g.featured);
  }

  bySlug(slug: string): Guitar | undefined {
    return this.bySlugMap.get(slug);
  }
}

export async function loadCatalogFile(file: string): Promise<InMemoryCatalog> {
  const raw: unknown = JSON.parse(await fs.readFile(file, "utf8"));
  return new InMemoryCatalog(catalogFileSchema.parse(raw).guitars);
}

export function formatPrice(cents: number): string {
  const whole = Math.floor(cents / 100).toLocaleString("en-US");
  return `$${whole}.${String(cents % 100).padStart(2, "0")}`;
}
