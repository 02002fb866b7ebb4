import * as React from 'react';
import type { Series } from '../../lib/records';
import type { VersionView } from '../../lib/versions';
import { isAuthenticated, type Viewer } from '../../services/auth';
import type { UrlHelper } from '../../services/routing';
import { DataTable, VersionStatusChip, type DataTableColumn } from '../ui';
import { IdentifierList, LocationList, NamespaceList, SampleList } from './lists';

export interface VersionTableProps {
  series: Series;
  docId: number;
  versions: readonly VersionView[];
  viewer: Viewer;
  urls: UrlHelper;
}

function VersionDetails({ series, version }: { series: Series; version: VersionView }) {
  return (
    <>
      {version.note && <p className="version-note">{version.note}</p>}
      <LocationList series={series} locations={version.locations} />
      <IdentifierList identifiers={version.identifiers} />
      <NamespaceList namespaces={version.namespaces} />
      <SampleList samples={version.samples} />
    </>
  );
}

export function VersionTable({ series, docId, versions, viewer, urls }: VersionTableProps) {
  const columns: DataTableColumn<VersionView>[] = [
    { key: 'number', header: 'Version' },
    { key: 'date', header: 'Date' },
    { key: 'status', header: 'Status', render: (v) => <VersionStatusChip status={v.status} /> },
    { key: 'details', header: 'Details', render: (v) => <VersionDetails series={series} version={v} /> },
  ];
  if (isAuthenticated(viewer)) {
    columns.push({
      key: 'edit',
      header: 'Edit',
      render: (v) => (
        <a href={urls.editVersion(series, docId, v.number)} className="edit-version">
          Edit version {v.number}
        </a>
      ),
    });
  }

  return (
    <DataTable
      className="version-table"
      columns={columns}
      data={versions}
      rowKey={(v, i) => `${v.number}-${i}`}
    />
  );
}
