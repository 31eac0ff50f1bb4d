/**
 * Report sections, in the order they are printed. A benchmark lands in the
 * first category whose tag occurs in its name, so the order matters when a
 * name contains more than one tag.
 */
export const CATEGORIES = [
  "prefix_fast_path",
  "bulk_insertion",
  "cow_clone",
  "pattern_matching",
  "rule_matching",
  "type_lookup",
  "evaluation",
  "scalability",
  "other",
] as const;

export type Category = (typeof CATEGORIES)[number];

export const FALLBACK_CATEGORY: Category = "other";

export function categorizeBenchmark(name: string): Category {
  return CATEGORIES.find((category) => name.includes(category)) ?? FALLBACK_CATEGORY;
}

export function groupByCategory(names: Iterable<string>): Map<Category, string[]> {
  const groups = new Map<Category, string[]>();
  for (const category of CATEGORIES) {
    groups.set(category, []);
  }

  for (const name of names) {
    groups.get(categorizeBenchmark(name))?.push(name);
  }

  return groups;
}

/** `prefix_fast_path` → `Prefix Fast Path` */
export function categoryTitle(category: Category): string {
  return category
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}
