import { isSeries, type Series } from './records';

export const MSCID_PREFIX = 'msc:';

const MSCID_FORMAT = /^msc:(?<table>[a-z]+)(?<docId>\d+)(?:#v(?<version>.*))?$/;

export interface ParsedMscid {
  series: Series;
  docId: number;
  version?: string;
}

export function formatMscid(series: Series, docId: number, version?: string): string {
  const base = `${MSCID_PREFIX}${series}${docId}`;
  return version ? `${base}#v${version}` : base;
}

/** Returns null for malformed IDs and for tables that are not record series. */
export function parseMscid(mscid: string): ParsedMscid | null {
  const match = MSCID_FORMAT.exec(mscid);
  if (!match?.groups) return null;
  const { table, docId, version } = match.groups;
  if (!table || !docId || !isSeries(table)) return null;
  const parsed: ParsedMscid = { series: table, docId: Number(docId) };
  if (version) parsed.version = version;
  return parsed;
}

/**
 * Sort key used by the relations table: prefix and table code, then the
 * number zero-padded so that msc:m2 sorts before msc:m10.
 */
export function mscidSortKey(mscid: string): string {
  const n = MSCID_PREFIX.length + 1;
  return mscid.slice(0, n) + mscid.slice(n).padStart(5, '0');
}
