import type { NavigationEntry } from "@chapterwise/translation-types";

// "3. ", "12) ", "IV. ". Roman numerals need punctuation so "I Am" is left alone.
const ORDINAL_PREFIX = /^\s*((?:\d+[.)]?|[IVXLCDM]+[.)])\s+)/;

export function hrefFileName(href: string): string {
  const withoutFragment = href.split("#")[0].split("?")[0];
  const segments = withoutFragment.split("/");
  return segments[segments.length - 1];
}

export function ordinalPrefix(label: string): string {
  const match = ORDINAL_PREFIX.exec(label);
  return match ? match[1].trimStart() : "";
}

const resolveContainerId = (
  entry: NavigationEntry,
  derivedTitles: ReadonlyMap<string, string>,
): string | null => {
  if (entry.containerId && derivedTitles.has(entry.containerId)) {
    return entry.containerId;
  }
  if (!entry.href) return null;
  const file = hrefFileName(entry.href);
  if (!file) return null;
  for (const containerId of derivedTitles.keys()) {
    if (containerId === file || containerId.endsWith(`/${file}`)) {
      return containerId;
    }
  }
  return null;
};

/**
 * Returns a copy of the navigation tree with labels replaced by translated
 * container titles. A leading ordinal such as "3. " survives the rewrite.
 */
export function patchNavigationTitles(
  entries: readonly NavigationEntry[],
  derivedTitles: ReadonlyMap<string, string>,
): NavigationEntry[] {
  return entries.map((entry) => {
    const children = entry.children
      ? patchNavigationTitles(entry.children, derivedTitles)
      : undefined;
    const containerId = resolveContainerId(entry, derivedTitles);
    const title = containerId ? derivedTitles.get(containerId)?.trim() : undefined;

    let label = entry.label;
    if (title) {
      const prefix = ordinalPrefix(entry.label);
      label = prefix && !title.startsWith(prefix.trim()) ? `${prefix}${title}` : title;
    }

    return {
      ...entry,
      label,
      ...(children ? { children } : {}),
    };
  });
}
