/**
 * Names derived from a district name: default names, output directory and
 * email domain
 */

export function districtNameAt(names: readonly string[], index: number): string {
  return names[index] ?? `District ${index + 1}`;
}

export function districtDirectoryName(districtName: string): string {
  const base = districtName.trim().replace(/[^A-Za-z0-9]+/g, '_').replace(/^_+|_+$/g, '');
  return `${base || 'District'}_Data`;
}

/**
 * `district1.net` style domain derived from the district name
 */
export function emailDomainFor(name: string): string {
  const slug = name.toLowerCase().replace(/[^a-z0-9]+/g, '');
  return `${slug || 'district'}.net`;
}
