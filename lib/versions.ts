import type { Version } from './records';

export interface VersionView extends Version {
  number: string;
  date?: string;
  status: string;
}

function derive(version: Version & { number: string }): VersionView {
  const view: VersionView = { ...version, status: version.status ?? '' };
  if (version.date) {
    view.date = version.date;
  }
  if (version.status) return view;

  if (version.issued) {
    view.date ??= version.issued;
    if (version.valid_to) view.status = `deprecated on ${version.valid_to}`;
    else if (version.valid_from) view.status = 'current';
  } else if (version.valid_from) {
    view.date ??= version.valid_from;
    view.status = version.valid_to ? `deprecated on ${version.valid_to}` : 'current';
  } else if (version.available) {
    view.date ??= version.available;
    view.status = 'proposed';
  }
  return view;
}

const byNumberDescending = (a: VersionView, b: VersionView): number =>
  b.number.localeCompare(a.number, 'en', { numeric: true });

const byDateDescending = (a: VersionView, b: VersionView): number =>
  (b.date ?? '').localeCompare(a.date ?? '');

/**
 * Dates versions, orders them newest first and marks the latest released
 * version as current when no version already claims that status.
 */
export function prepareVersions(versions: readonly Version[] | undefined, mscid: string): VersionView[] {
  if (!versions) return [];

  const prepared: VersionView[] = [];
  for (const version of versions) {
    if (!version.number) continue;
    prepared.push(derive({ ...version, number: version.number }));
  }

  if (prepared.every((v) => v.date)) {
    prepared.sort(byDateDescending);
  } else {
    console.warn(`[display] Record ${mscid} has missing version date.`);
    prepared.sort(byNumberDescending);
  }

  for (const version of prepared) {
    if (version.status === 'current') break;
    if (version.status === 'proposed') continue;
    if (version.status === '') {
      version.status = 'current';
      break;
    }
  }

  return prepared;
}
