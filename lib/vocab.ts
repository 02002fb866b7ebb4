import type { Series } from './records';

/** Location types offered per series, as [stored value, display label]. */
export const LOCATION_TYPES: Readonly<Record<Series, ReadonlyArray<readonly [string, string]>>> = {
  m: [
    ['document', 'document'],
    ['website', 'website'],
    ['RDA-MIG', 'RDA MIG Schema'],
    ['DTD', 'XML/SGML DTD'],
    ['XSD', 'XML Schema'],
    ['RDFS', 'RDF Schema'],
  ],
  g: [
    ['website', 'website'],
    ['email', 'email address'],
  ],
  t: [
    ['document', 'document'],
    ['website', 'website'],
    ['application', 'application'],
    ['service', 'service endpoint'],
  ],
  c: [
    ['document', 'document'],
    ['library', 'library'],
    ['executable', 'executable'],
  ],
  e: [['document', 'document']],
};

export function locationTypeLabel(series: Series, type: string | undefined): string {
  if (!type) return 'link';
  return LOCATION_TYPES[series].find(([value]) => value === type)?.[1] ?? type;
}

/** Email locations may be stored bare or with the mailto: scheme. */
export function locationHref(url: string, type: string | undefined): string {
  if (type === 'email' && !url.startsWith('mailto:')) return `mailto:${url}`;
  return url;
}
