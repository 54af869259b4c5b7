import { z } from "zod";

export const Supplier = z.object({
  companyName: z.string().trim().min(1).max(200),
  contactPerson: z.string().trim().max(200).default(""),
  email: z.string().trim().email().or(z.literal("")).default(""),
  phone: z.string().trim().max(50).default(""),
  address: z.string().trim().max(500).default(""),
  country: z.string().trim().max(100).default(""),
  specialization: z.string().trim().max(500).default(""),
  establishedYear: z
    .number()
    .int()
    .min(1800)
    .max(2100)
    .nullable()
    .default(null),
  // free text, e.g. "Valves, Flanges"
  materialCategories: z.string().trim().max(500).default(""),
});

export type Supplier = z.infer<typeof Supplier>;

/** What an order keeps about each supplier it was sent to. */
export const SupplierContact = z.object({
  country: z.string().trim().max(100).optional(),
  materials: z.string().max(500).optional(),
});

export type SupplierContact = z.infer<typeof SupplierContact>;

const EUROPEAN_COUNTRIES: readonly string[] = Object.freeze([
  "Germany",
  "France",
  "Austria",
  "Denmark",
  "Finland",
  "Italy",
  "Netherlands",
  "Norway",
  "United Kingdom",
  "Belgium",
]);

export const RECENT_SINCE_YEAR = 2020;

// "finned_tubes" is listed by suppliers as "finned tubes"
const materialTerm = (category: string) =>
  category.replace(/_/g, " ").toLowerCase();

export function suppliersByMaterial<
  T extends Pick<Supplier, "materialCategories">
>(suppliers: readonly T[], material: string): T[] {
  const term = materialTerm(material);
  return suppliers.filter((s) =>
    s.materialCategories.toLowerCase().includes(term)
  );
}

export function suppliersByCountry<T extends Pick<Supplier, "country">>(
  suppliers: readonly T[],
  country: string
): T[] {
  return suppliers.filter((s) => s.country === country);
}

/**
 * Suppliers carrying any of `materials` (all of them when the list is empty),
 * minus those based in one of `excludeOrigins`.
 */
export function filterSuppliers<
  T extends Pick<Supplier, "materialCategories" | "country">
>(
  suppliers: readonly T[],
  materials: readonly string[],
  excludeOrigins: readonly string[] = []
): T[] {
  const terms = materials.map(materialTerm);
  return suppliers.filter((s) => {
    if (excludeOrigins.includes(s.country)) return false;
    if (!terms.length) return true;
    const carried = s.materialCategories.toLowerCase();
    return terms.some((t) => carried.includes(t));
  });
}

/** Case-insensitive match on company name or specialization. */
export function searchSuppliers<
  T extends Pick<Supplier, "companyName" | "specialization">
>(suppliers: readonly T[], term: string): T[] {
  const needle = term.trim().toLowerCase();
  if (!needle) return [...suppliers];
  return suppliers.filter(
    (s) =>
      s.companyName.toLowerCase().includes(needle) ||
      s.specialization.toLowerCase().includes(needle)
  );
}

export type SupplierStatistics = {
  totalSuppliers: number;
  totalCountries: number;
  chineseSuppliers: number;
  emiratiSuppliers: number;
  europeanSuppliers: number;
  recentSuppliers: number;
};

export function supplierStatistics(
  suppliers: readonly Supplier[]
): SupplierStatistics {
  const countries = new Set(suppliers.map((s) => s.country).filter(Boolean));
  const count = (pred: (s: Supplier) => boolean) =>
    suppliers.filter(pred).length;
  return {
    totalSuppliers: suppliers.length,
    totalCountries: countries.size,
    chineseSuppliers: count((s) => s.country === "China"),
    emiratiSuppliers: count((s) => s.country === "UAE"),
    europeanSuppliers: count((s) => EUROPEAN_COUNTRIES.includes(s.country)),
    recentSuppliers: count(
      (s) =>
        s.establishedYear !== null && s.establishedYear >= RECENT_SINCE_YEAR
    ),
  };
}

export function supplierContact(supplier: Supplier): SupplierContact {
  return {
    country: supplier.country || undefined,
    materials: supplier.materialCategories,
  };
}
