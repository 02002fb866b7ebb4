import { formatMscid } from './mscid';
import type { Series } from './records';

/** Summary of a related record as supplied by the data layer. */
export interface RelatedRecord {
  doc_id: number;
  series: Series;
  name?: string;
  title?: string;
}

export type RelationsMap = Readonly<Record<string, readonly RelatedRecord[] | undefined>>;

export interface RelationField {
  /** Key in the relations dictionary and name of the edit-form control. */
  name: string;
  /** Edit-form label. */
  label: string;
  /** Heading on the display page. */
  heading: string;
  /** Series of the records on the other end. */
  target: Series;
  /** Predicate stored in the relations table. */
  predicate: string;
  /** True when this record is the object, not the subject, of the predicate. */
  inverse: boolean;
}

const field = (
  name: string,
  label: string,
  heading: string,
  target: Series,
  predicate: string,
  inverse = false
): RelationField => ({ name, label, heading, target, predicate, inverse });

export const RELATION_FIELDS: Readonly<Record<Series, readonly RelationField[]>> = {
  m: [
    field('parent_schemes', 'Parent metadata schemes', 'Parent schemes', 'm', 'parent scheme'),
    field('child_schemes', 'Profiles of this scheme', 'Profiles of this scheme', 'm', 'parent scheme', true),
    field('input_to_mappings', 'Mappings that take this scheme as input', 'Mappings from this scheme', 'c', 'input scheme', true),
    field('output_from_mappings', 'Mappings that give this scheme as output', 'Mappings to this scheme', 'c', 'output scheme', true),
    field('maintainers', 'Organizations that maintain this scheme', 'Maintained by', 'g', 'maintainer'),
    field('funders', 'Organizations that funded this scheme', 'Funded by', 'g', 'funder'),
    field('users', 'Organizations that use this scheme', 'Used by', 'g', 'user'),
    field('tools', 'Tools that support this scheme', 'Tools', 't', 'supported scheme', true),
    field('endorsements', 'Endorsements of this scheme', 'Endorsements', 'e', 'endorsed scheme', true),
  ],
  g: [
    field('maintained_schemes', 'Schemes maintained by this organization', 'Maintained schemes', 'm', 'maintainer', true),
    field('funded_schemes', 'Schemes funded by this organization', 'Funded schemes', 'm', 'funder', true),
    field('used_schemes', 'Schemes used by this organization', 'Used schemes', 'm', 'user', true),
    field('maintained_tools', 'Tools maintained by this organization', 'Maintained tools', 't', 'maintainer', true),
    field('funded_tools', 'Tools funded by this organization', 'Funded tools', 't', 'funder', true),
    field('used_tools', 'Tools used by this organization', 'Used tools', 't', 'user', true),
    field('maintained_mappings', 'Mappings maintained by this organization', 'Maintained mappings', 'c', 'maintainer', true),
    field('funded_mappings', 'Mappings funded by this organization', 'Funded mappings', 'c', 'funder', true),
    field('used_mappings', 'Mappings used by this organization', 'Used mappings', 'c', 'user', true),
    field('endorsements', 'Endorsements made by this organization', 'Endorsements', 'e', 'originator', true),
  ],
  t: [
    field('supported_schemes', 'Metadata schemes supported by this tool', 'Supported schemes', 'm', 'supported scheme'),
    field('maintainers', 'Organizations that maintain this tool', 'Maintained by', 'g', 'maintainer'),
    field('funders', 'Organizations that funded this tool', 'Funded by', 'g', 'funder'),
    field('users', 'Organizations that use this tool', 'Used by', 'g', 'user'),
  ],
  c: [
    field('input_schemes', 'Input metadata schemes', 'Input schemes', 'm', 'input scheme'),
    field('output_schemes', 'Output metadata schemes', 'Output schemes', 'm', 'output scheme'),
    field('maintainers', 'Organizations that maintain this mapping', 'Maintained by', 'g', 'maintainer'),
    field('funders', 'Organizations that funded this mapping', 'Funded by', 'g', 'funder'),
    field('users', 'Organizations that use this mapping', 'Used by', 'g', 'user'),
  ],
  e: [
    field('endorsed_schemes', 'Endorsed schemes', 'Endorsed schemes', 'm', 'endorsed scheme'),
    field('originators', 'Endorsing organizations', 'Endorsed by', 'g', 'originator'),
  ],
};

/** Predicates that link one scheme to another, grouped under one heading. */
export const SCHEME_TO_SCHEME_PREDICATES: readonly string[] = [
  'parent scheme',
  'input scheme',
  'output scheme',
];

export function relationField(series: Series, name: string): RelationField | undefined {
  return RELATION_FIELDS[series].find((f) => f.name === name);
}

export function relatedLabel(related: RelatedRecord): string {
  return related.name || related.title || formatMscid(related.series, related.doc_id);
}

/**
 * Keeps only the relationships the series knows about, in registry order,
 * and drops empty lists.
 */
export function filterRelations(
  series: Series,
  relations: RelationsMap | undefined
): Record<string, RelatedRecord[]> {
  const filtered: Record<string, RelatedRecord[]> = {};
  if (!relations) return filtered;
  for (const { name } of RELATION_FIELDS[series]) {
    const list = relations[name];
    if (list && list.length > 0) filtered[name] = [...list];
  }
  return filtered;
}

export function hasRelatedSchemes(
  series: Series,
  relations: Record<string, readonly RelatedRecord[]>
): boolean {
  if (series !== 'm') return false;
  return RELATION_FIELDS.m.some(
    (f) => SCHEME_TO_SCHEME_PREDICATES.includes(f.predicate) && (relations[f.name]?.length ?? 0) > 0
  );
}
