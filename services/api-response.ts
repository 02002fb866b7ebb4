import { z } from 'zod';
import { getConfig } from '../lib/config';
import { createInvalidOriginError, createInvalidPagingError, createPageNotFoundError } from '../lib/errors';
import { formatMscid } from '../lib/mscid';
import type { Series } from '../lib/records';
import { filterRelations, type RelatedRecord, type RelationsMap } from '../lib/relations';
import { createUrlHelper, type UrlHelper } from './routing';

/*
  JSON envelopes for the read API. Records go out as stored, with their
  MSC ID, absolute URI and related entities added alongside.
*/

export const API_VERSION = '2.0.0';

export interface ApiEntry {
  series: Series;
  docId: number;
  record: Readonly<Record<string, unknown>>;
  relations?: RelationsMap;
}

export interface RelatedSummary {
  name?: string;
  title?: string;
  mscid: string;
  uri: string;
}

export interface RelatedEntity {
  id: string;
  role: string;
  data?: RelatedSummary;
}

export type ApiRecord = Record<string, unknown> & {
  mscid: string;
  uri: string;
  relatedEntities?: RelatedEntity[];
};

export interface ApiItemResponse {
  apiVersion: string;
  data: ApiRecord;
}

export interface ApiPageData {
  itemsPerPage: number;
  currentItemCount: number;
  startIndex: number;
  totalItems: number;
  pageIndex: number;
  totalPages: number;
  nextLink?: string;
  previousLink?: string;
  items: ApiRecord[];
}

export interface ApiPageResponse {
  apiVersion: string;
  data: ApiPageData;
}

export interface PageOptions {
  pageSize?: number;
  /** 1-based index of the first item; takes precedence over `page`. */
  start?: number;
  /** 1-based page number. */
  page?: number;
}

const OriginSchema = z.string().url().regex(/^https?:\/\//i);

const PositiveInt = z.number().int().positive();

/** URL helper rooted at `origin`, which must be an absolute http(s) URL. */
export function apiUrls(origin: string): UrlHelper {
  const parsed = OriginSchema.safeParse(origin);
  if (!parsed.success) throw createInvalidOriginError(origin);
  return createUrlHelper(parsed.data);
}

function checkPositive(parameter: 'pageSize' | 'start' | 'page', value: number): void {
  if (!PositiveInt.safeParse(value).success) throw createInvalidPagingError(parameter, value);
}

function summarize(related: RelatedRecord, mscid: string, urls: UrlHelper): RelatedSummary {
  const summary: RelatedSummary = { mscid, uri: urls.apiRecord(related.series, related.doc_id) };
  if (related.name) summary.name = related.name;
  if (related.title) summary.title = related.title;
  return summary;
}

export function embellishRecord(
  entry: ApiEntry,
  origin: string,
  { withEmbedded = false }: { withEmbedded?: boolean } = {}
): ApiRecord {
  return embellish(entry, apiUrls(origin), withEmbedded);
}

function embellish(entry: ApiEntry, urls: UrlHelper, withEmbedded: boolean): ApiRecord {
  const result: ApiRecord = {
    ...entry.record,
    mscid: formatMscid(entry.series, entry.docId),
    uri: urls.apiRecord(entry.series, entry.docId),
  };

  const relations = filterRelations(entry.series, entry.relations);
  const seen = new Map<string, RelatedSummary>();
  const relatedEntities: RelatedEntity[] = [];

  for (const role of Object.keys(relations).sort()) {
    for (const related of relations[role]) {
      const id = formatMscid(related.series, related.doc_id);
      const entity: RelatedEntity = { id, role };
      if (withEmbedded) {
        let data = seen.get(id);
        if (!data) {
          data = summarize(related, id, urls);
          seen.set(id, data);
        }
        entity.data = data;
      }
      relatedEntities.push(entity);
    }
  }
  if (relatedEntities.length > 0) result.relatedEntities = relatedEntities;

  return result;
}

export function asResponseItem(entry: ApiEntry, origin: string): ApiItemResponse {
  return { apiVersion: API_VERSION, data: embellishRecord(entry, origin, { withEmbedded: true }) };
}

/**
 * Wraps one page of `entries` in a list envelope. `link` is the collection
 * URL that next and previous links are built on; record URIs are built on
 * `origin`.
 *
 * @throws CatalogViewException INVALID_PAGING when `pageSize`, `start` or `page` is not a positive integer
 * @throws CatalogViewException PAGE_NOT_FOUND when `start` or `page` is out of range
 */
export function asResponsePage(
  entries: readonly ApiEntry[],
  link: string,
  origin: string,
  { pageSize = getConfig().apiPageSize, start, page }: PageOptions = {}
): ApiPageResponse {
  const urls = apiUrls(origin);
  checkPositive('pageSize', pageSize);
  if (start !== undefined) checkPositive('start', start);
  if (page !== undefined) checkPositive('page', page);

  const totalItems = entries.length;
  let totalPages = Math.ceil(totalItems / pageSize);

  let startIndex = 1;
  let pageIndex = 1;
  if (start !== undefined) {
    if (start < 1 || start > totalItems) throw createPageNotFoundError('start', start, totalItems);
    startIndex = start;
    pageIndex = Math.floor((start - 1) / pageSize) + 1;
  } else if (page !== undefined) {
    if (page < 1 || page > totalPages) throw createPageNotFoundError('page', page, totalPages);
    pageIndex = page;
    startIndex = (page - 1) * pageSize + 1;
  }

  // A window that straddles page boundaries leaves a partial page at the front.
  if ((startIndex - 1) % pageSize > 0) totalPages += 1;

  const items = entries
    .slice(startIndex - 1, startIndex - 1 + pageSize)
    .map((entry) => embellish(entry, urls, false));

  const data: ApiPageData = {
    itemsPerPage: pageSize,
    currentItemCount: items.length,
    startIndex,
    totalItems,
    pageIndex,
    totalPages,
    items,
  };

  if (page !== undefined && start === undefined) {
    if (pageIndex < totalPages) data.nextLink = `${link}?page=${page + 1}&pageSize=${pageSize}`;
    if (pageIndex > 1) data.previousLink = `${link}?page=${page - 1}&pageSize=${pageSize}`;
  } else {
    if (startIndex + pageSize <= totalItems) {
      data.nextLink = `${link}?start=${startIndex + pageSize}&pageSize=${pageSize}`;
    }
    if (startIndex > 1) {
      const previousStart = startIndex - pageSize;
      data.previousLink =
        previousStart < 1
          ? `${link}?start=1&pageSize=${startIndex - 1}`
          : `${link}?start=${previousStart}&pageSize=${pageSize}`;
    }
  }

  return { apiVersion: API_VERSION, data };
}
