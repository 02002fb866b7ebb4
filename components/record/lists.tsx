import * as React from 'react';
import {
  creatorName,
  type Creator,
  type Identifier,
  type Location,
  type Namespace,
  type Sample,
  type Series,
} from '../../lib/records';
import { relatedLabel, type RelatedRecord } from '../../lib/relations';
import { locationHref, locationTypeLabel } from '../../lib/vocab';
import type { UrlHelper } from '../../services/routing';

/*
  Small presentational lists shared by the record pages. Each returns null
  for an absent or empty list so the caller's section can be skipped.
*/

export function Description({ html }: { html: string | undefined }) {
  if (!html) return null;
  return <div className="description" dangerouslySetInnerHTML={{ __html: html }} />;
}

export function TagList({ items, className }: { items: readonly string[] | undefined; className?: string }) {
  if (!items || items.length === 0) return null;
  return (
    <ul className={className ?? 'tag-list'}>
      {items.map((item, i) => (
        <li key={i}>{item}</li>
      ))}
    </ul>
  );
}

export function RelatedList({ records, urls }: { records: readonly RelatedRecord[] | undefined; urls: UrlHelper }) {
  if (!records || records.length === 0) return null;
  return (
    <ul className="relation-list">
      {records.map((related) => (
        <li key={`${related.series}${related.doc_id}`}>
          <a href={urls.display(related.series, related.doc_id)}>{relatedLabel(related)}</a>
        </li>
      ))}
    </ul>
  );
}

export function LocationList({ series, locations }: { series: Series; locations: readonly Location[] | undefined }) {
  if (!locations || locations.length === 0) return null;
  return (
    <ul className="link-list">
      {locations.map((location, i) => (
        <li key={`${location.url}-${i}`}>
          <span className="link-type">{locationTypeLabel(series, location.type)}</span>:{' '}
          <a href={locationHref(location.url, location.type)}>{location.url}</a>
        </li>
      ))}
    </ul>
  );
}

export function IdentifierList({
  mscid,
  identifiers,
}: {
  mscid?: string;
  identifiers: readonly Identifier[] | undefined;
}) {
  const list = identifiers ?? [];
  if (!mscid && list.length === 0) return null;
  return (
    <ul className="identifier-list">
      {mscid && (
        <li>
          <span className="id-scheme">MSC ID</span>: <code>{mscid}</code>
        </li>
      )}
      {list.map((identifier, i) => (
        <li key={`${identifier.id}-${i}`}>
          {identifier.scheme && (
            <>
              <span className="id-scheme">{identifier.scheme}</span>:{' '}
            </>
          )}
          <code>{identifier.id}</code>
        </li>
      ))}
    </ul>
  );
}

export function NamespaceList({ namespaces }: { namespaces: readonly Namespace[] | undefined }) {
  if (!namespaces || namespaces.length === 0) return null;
  return (
    <ul className="namespace-list">
      {namespaces.map((namespace, i) => (
        <li key={`${namespace.uri}-${i}`}>
          {namespace.prefix && (
            <>
              <code>{namespace.prefix}</code>:{' '}
            </>
          )}
          <a href={namespace.uri}>{namespace.uri}</a>
        </li>
      ))}
    </ul>
  );
}

export function SampleList({ samples }: { samples: readonly Sample[] | undefined }) {
  if (!samples || samples.length === 0) return null;
  return (
    <ul className="sample-list">
      {samples.map((sample, i) => (
        <li key={`${sample.url}-${i}`}>
          <a href={sample.url}>{sample.title || sample.url}</a>
        </li>
      ))}
    </ul>
  );
}

export function CreatorList({ creators }: { creators: readonly Creator[] | undefined }) {
  const names = (creators ?? []).map(creatorName).filter(Boolean);
  if (names.length === 0) return null;
  return <TagList items={names} className="creator-list" />;
}
