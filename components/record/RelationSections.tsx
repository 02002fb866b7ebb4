import * as React from 'react';
import type { Series } from '../../lib/records';
import { RELATION_FIELDS, type RelatedRecord } from '../../lib/relations';
import type { UrlHelper } from '../../services/routing';
import { Section } from '../ui';
import { RelatedList } from './lists';

export interface RelationSectionsProps {
  series: Series;
  relations: Readonly<Record<string, readonly RelatedRecord[]>>;
  /** Relationship names to show, in order; defaults to the whole registry. */
  names?: readonly string[];
  urls: UrlHelper;
}

/** One nested section per non-empty relationship, headed by its display label. */
export function RelationSections({ series, relations, names, urls }: RelationSectionsProps) {
  const fields = RELATION_FIELDS[series].filter(
    (f) => (!names || names.includes(f.name)) && (relations[f.name]?.length ?? 0) > 0
  );
  if (fields.length === 0) return null;

  return (
    <>
      {fields.map((f) => (
        <Section key={f.name} id={f.name} variant="nested" header={f.heading}>
          <RelatedList records={relations[f.name]} urls={urls} />
        </Section>
      ))}
    </>
  );
}

export function hasAnyRelation(
  relations: Readonly<Record<string, readonly RelatedRecord[]>>,
  names: readonly string[]
): boolean {
  return names.some((name) => (relations[name]?.length ?? 0) > 0);
}
