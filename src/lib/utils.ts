/**
 * Joins optional class names, skipping falsy values.
 */
export function cn(...classes: Array<string | false | null | undefined>) {
  return classes.filter(Boolean).join(" ");
}

export function toggleItem<T>(items: readonly T[], item: T): T[] {
  return items.includes(item) ? items.filter((entry) => entry !== item) : [...items, item];
}

/**
 * Narrows a raw form value to one of the allowed options.
 */
export function pickOption<T extends string>(options: readonly T[], value: string): T | undefined {
  return options.find((option) => option === value);
}
