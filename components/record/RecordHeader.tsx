import * as React from 'react';
import type { DisplayView } from '../../lib/display';
import { isAuthenticated, type Viewer } from '../../services/auth';
import type { UrlHelper } from '../../services/routing';
import { ButtonLink, PageHeader } from '../ui';
import { Description } from './lists';

export interface DisplayPageProps<V extends DisplayView = DisplayView> {
  view: V;
  viewer: Viewer;
  urls: UrlHelper;
}

/** Title, edit affordance and description shared by every record page. */
export function RecordHeader({ view, viewer, urls }: DisplayPageProps) {
  return (
    <>
      <PageHeader
        title={view.name}
        actions={
          isAuthenticated(viewer) ? (
            <ButtonLink href={urls.edit(view.series, view.docId)} variant="secondary" size="sm">
              Edit
            </ButtonLink>
          ) : undefined
        }
      />
      <Description html={view.record.description} />
    </>
  );
}
