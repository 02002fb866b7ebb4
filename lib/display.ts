import { z } from 'zod';
import { createInvalidRecordError, createRecordNotFoundError } from './errors';
import { formatMscid } from './mscid';
import { RECORD_SCHEMAS, SERIES, VersionSchema, recordName, type RecordsBySeries, type Series } from './records';
import { filterRelations, hasRelatedSchemes, type RelatedRecord, type RelationsMap } from './relations';
import type { Thesaurus } from './thesaurus';
import { prepareVersions, type VersionView } from './versions';

export interface DisplayInput<S extends Series = Series> {
  series: S;
  docId: number;
  record: unknown;
  relations?: RelationsMap;
  thesaurus?: Thesaurus;
  /** Data type labels keyed by the MSC ID stored on scheme records. */
  dataTypes?: Readonly<Record<string, string>>;
}

export interface DisplayView<S extends Series = Series> {
  series: S;
  docId: number;
  mscid: string;
  name: string;
  record: RecordsBySeries[S];
  keywords: string[];
  dataTypes: string[];
  versions: VersionView[];
  relations: Record<string, RelatedRecord[]>;
  hasRelatedSchemes: boolean;
}

function translateKeywords(uris: readonly string[] | undefined, thesaurus: Thesaurus | undefined): string[] {
  if (!uris) return [];
  if (!thesaurus) return [...uris];
  const labels: string[] = [];
  for (const uri of uris) {
    const label = thesaurus.getLabel(uri);
    if (label) labels.push(label);
    else console.warn(`[display] No keyword for ${uri}.`);
  }
  return labels;
}

/** Reads an already-validated field back out of a record of unknown series. */
function readField<T>(record: object, key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
  const parsed = schema.safeParse(Reflect.get(record, key));
  return parsed.success ? parsed.data : undefined;
}

const StringListSchema = z.array(z.string());
const VersionListSchema = z.array(VersionSchema);

export function prepareDisplay<S extends Series>(input: DisplayInput<S>): DisplayView<S> {
  const { series, docId } = input;
  if (!Number.isInteger(docId) || docId < 1) {
    throw createRecordNotFoundError(SERIES[series], docId);
  }

  const mscid = formatMscid(series, docId);
  const schema = RECORD_SCHEMAS[series];
  const parsed = schema.safeParse(input.record);
  if (!parsed.success) {
    throw createInvalidRecordError(mscid, parsed.error.issues);
  }
  const record = parsed.data;

  const dataTypes = (readField(record, 'dataTypes', StringListSchema) ?? []).map(
    (id) => input.dataTypes?.[id] ?? id
  );
  const relations = filterRelations(series, input.relations);

  return {
    series,
    docId,
    mscid,
    name: recordName(series, record),
    record,
    keywords: translateKeywords(readField(record, 'keywords', StringListSchema), input.thesaurus),
    dataTypes,
    versions: prepareVersions(readField(record, 'versions', VersionListSchema), mscid),
    relations,
    hasRelatedSchemes: hasRelatedSchemes(series, relations),
  };
}

/** Human-readable validity period of an endorsement, if any bound is known. */
export function validityPeriod(validFrom: string | undefined, validTo: string | undefined): string | undefined {
  if (validFrom && validTo) return `valid from ${validFrom} until ${validTo}`;
  if (validFrom) return `valid from ${validFrom}`;
  if (validTo) return `no longer valid after ${validTo}`;
  return undefined;
}
