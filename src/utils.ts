export function ensureAbsoluteUrl(baseUrl: string, href: string | undefined | null): string | null {
  if (!href) return null;
  try {
    const url = new URL(href, baseUrl);
    return url.toString();
  } catch {
    return null;
  }
}

export function isPdfHref(href: string): boolean {
  return href.toLowerCase().endsWith('.pdf');
}

export function sortedLinks(links: Iterable<string>): string[] {
  return Array.from(links).sort();
}

export function difference(current: Set<string>, old: Set<string>): Set<string> {
  const out = new Set<string>();
  for (const link of current) {
    if (!old.has(link)) out.add(link);
  }
  return out;
}
