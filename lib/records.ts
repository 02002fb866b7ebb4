import { z } from 'zod';
import { createUnknownSeriesError } from './errors';

/*
  Record shapes as stored by the catalog. Every field is optional; the
  persistence layer strips empty strings, empty lists and empty objects
  before saving, so absence is the normal way of saying "not recorded".
*/

export const SERIES = {
  m: 'scheme',
  g: 'organization',
  t: 'tool',
  c: 'mapping',
  e: 'endorsement',
} as const;

export type Series = keyof typeof SERIES;
export type SeriesName = (typeof SERIES)[Series];

export function isSeries(code: string): code is Series {
  return Object.prototype.hasOwnProperty.call(SERIES, code);
}

export function seriesFromCode(code: string): Series {
  if (!isSeries(code)) throw createUnknownSeriesError(code);
  return code;
}

export const LocationSchema = z
  .object({
    url: z.string(),
    type: z.string().optional(),
  })
  .passthrough();

export const NamespaceSchema = z
  .object({
    prefix: z.string().optional(),
    uri: z.string(),
  })
  .passthrough();

export const IdentifierSchema = z
  .object({
    id: z.string(),
    scheme: z.string().optional(),
  })
  .passthrough();

export const SampleSchema = z
  .object({
    url: z.string(),
    title: z.string().optional(),
  })
  .passthrough();

export const CreatorSchema = z
  .object({
    fullName: z.string().optional(),
    givenName: z.string().optional(),
    familyName: z.string().optional(),
  })
  .passthrough();

export const VersionSchema = z
  .object({
    number: z.string().optional(),
    date: z.string().optional(),
    status: z.string().optional(),
    note: z.string().optional(),
    issued: z.string().optional(),
    available: z.string().optional(),
    valid_from: z.string().optional(),
    valid_to: z.string().optional(),
    identifiers: z.array(IdentifierSchema).optional(),
    samples: z.array(SampleSchema).optional(),
    namespaces: z.array(NamespaceSchema).optional(),
    locations: z.array(LocationSchema).optional(),
  })
  .passthrough();

const common = {
  slug: z.string().optional(),
  description: z.string().optional(),
  locations: z.array(LocationSchema).optional(),
  identifiers: z.array(IdentifierSchema).optional(),
};

export const SchemeRecordSchema = z
  .object({
    ...common,
    title: z.string().optional(),
    keywords: z.array(z.string()).optional(),
    dataTypes: z.array(z.string()).optional(),
    namespaces: z.array(NamespaceSchema).optional(),
    samples: z.array(SampleSchema).optional(),
    versions: z.array(VersionSchema).optional(),
  })
  .passthrough();

export const OrganizationRecordSchema = z
  .object({
    ...common,
    name: z.string().optional(),
    types: z.array(z.string()).optional(),
  })
  .passthrough();

export const ToolRecordSchema = z
  .object({
    ...common,
    title: z.string().optional(),
    types: z.array(z.string()).optional(),
    creators: z.array(CreatorSchema).optional(),
    versions: z.array(VersionSchema).optional(),
  })
  .passthrough();

export const MappingRecordSchema = z
  .object({
    ...common,
    name: z.string().optional(),
    creators: z.array(CreatorSchema).optional(),
    versions: z.array(VersionSchema).optional(),
  })
  .passthrough();

export const EndorsementRecordSchema = z
  .object({
    ...common,
    title: z.string().optional(),
    creators: z.array(CreatorSchema).optional(),
    publication: z.string().optional(),
    issued: z.string().optional(),
    valid_from: z.string().optional(),
    valid_to: z.string().optional(),
  })
  .passthrough();

export type Location = z.infer<typeof LocationSchema>;
export type Namespace = z.infer<typeof NamespaceSchema>;
export type Identifier = z.infer<typeof IdentifierSchema>;
export type Sample = z.infer<typeof SampleSchema>;
export type Creator = z.infer<typeof CreatorSchema>;
export type Version = z.infer<typeof VersionSchema>;
export type SchemeRecord = z.infer<typeof SchemeRecordSchema>;
export type OrganizationRecord = z.infer<typeof OrganizationRecordSchema>;
export type ToolRecord = z.infer<typeof ToolRecordSchema>;
export type MappingRecord = z.infer<typeof MappingRecordSchema>;
export type EndorsementRecord = z.infer<typeof EndorsementRecordSchema>;

export interface RecordsBySeries {
  m: SchemeRecord;
  g: OrganizationRecord;
  t: ToolRecord;
  c: MappingRecord;
  e: EndorsementRecord;
}

export type CatalogRecord = RecordsBySeries[Series];

export const RECORD_SCHEMAS: { [S in Series]: z.ZodType<RecordsBySeries[S], z.ZodTypeDef, unknown> } = {
  m: SchemeRecordSchema,
  g: OrganizationRecordSchema,
  t: ToolRecordSchema,
  c: MappingRecordSchema,
  e: EndorsementRecordSchema,
};

const NAME_FIELDS: Record<Series, { field: 'title' | 'name'; fallback: string }> = {
  m: { field: 'title', fallback: 'Untitled' },
  g: { field: 'name', fallback: 'Unnamed' },
  t: { field: 'title', fallback: 'Untitled' },
  c: { field: 'name', fallback: 'Unnamed' },
  e: { field: 'title', fallback: 'Untitled' },
};

/** Display name of a record, falling back when the naming field is blank. */
export function recordName(series: Series, record: object): string {
  const { field, fallback } = NAME_FIELDS[series];
  const value: unknown = Reflect.get(record, field);
  return typeof value === 'string' && value.trim() ? value : fallback;
}

export function creatorName(creator: Creator): string {
  if (creator.fullName) return creator.fullName;
  return [creator.givenName, creator.familyName].filter(Boolean).join(' ');
}
