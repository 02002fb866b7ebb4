import type { ReactElement, ReactNode } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import RootLayout from '../app/layout';
import DatatypeEditPage, { datatypeHeading } from '../app/edit/datatype/page';
import EndorsementEditPage from '../app/edit/endorsement/page';
import MappingEditPage from '../app/edit/mapping/page';
import OrganizationEditPage from '../app/edit/organization/page';
import SchemeEditPage from '../app/edit/scheme/page';
import ToolEditPage from '../app/edit/tool/page';
import VersionEditPage, { versionHeading } from '../app/edit/version/page';
import EndorsementPage from '../app/msc/endorsement/page';
import MappingPage from '../app/msc/mapping/page';
import OrganizationPage from '../app/msc/organization/page';
import SchemePage from '../app/msc/scheme/page';
import ToolPage from '../app/msc/tool/page';
import { editHeading } from '../components/forms/EditForm';
import { ANONYMOUS, type Viewer } from '../services/auth';
import { createUrlHelper, type UrlHelper } from '../services/routing';
import { getConfig, type CatalogConfig } from './config';
import { prepareDisplay, type DisplayInput } from './display';
import type {
  DatatypeForm,
  EndorsementForm,
  MappingForm,
  OrganizationForm,
  SchemeForm,
  ToolForm,
  VersionForm,
} from './forms';
import type { FlashMessage } from './messages';
import { seriesFromCode, type Series } from './records';

export interface RenderContext {
  viewer?: Viewer;
  urls?: UrlHelper;
  messages?: readonly FlashMessage[];
  config?: CatalogConfig;
}

/** Display input as it arrives from a route, with the series still a raw table code. */
export type DisplayRequest = Omit<DisplayInput, 'series'> & { series: string };

interface EditBase {
  docId: number;
}

export type EditRequest =
  | (EditBase & { series: 'm'; form: SchemeForm; subjects?: readonly string[] })
  | (EditBase & { series: 'g'; form: OrganizationForm })
  | (EditBase & { series: 't'; form: ToolForm })
  | (EditBase & { series: 'c'; form: MappingForm })
  | (EditBase & { series: 'e'; form: EndorsementForm });

export interface VersionEditRequest extends EditBase {
  series: Series;
  recordName: string;
  form: VersionForm;
}

export interface DatatypeEditRequest extends EditBase {
  form: DatatypeForm;
}

interface Resolved {
  viewer: Viewer;
  urls: UrlHelper;
  messages: readonly FlashMessage[];
  config: CatalogConfig;
}

function resolve(context: RenderContext): Resolved {
  const config = context.config ?? getConfig();
  return {
    viewer: context.viewer ?? ANONYMOUS,
    urls: context.urls ?? createUrlHelper(config.baseUrl),
    messages: context.messages ?? [],
    config,
  };
}

export function renderDocument(element: ReactElement): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(element)}`;
}

function renderInLayout(title: string, ctx: Resolved, body: ReactNode): string {
  return renderDocument(
    <RootLayout
      title={title}
      site={{ name: ctx.config.siteName, stylesheet: ctx.config.stylesheet }}
      viewer={ctx.viewer}
      urls={ctx.urls}
      messages={ctx.messages}
    >
      {body}
    </RootLayout>
  );
}

function displayBody(input: DisplayInput, viewer: Viewer, urls: UrlHelper): { title: string; body: ReactNode } {
  switch (input.series) {
    case 'm': {
      const view = prepareDisplay({ ...input, series: input.series });
      return { title: view.name, body: <SchemePage view={view} viewer={viewer} urls={urls} /> };
    }
    case 'g': {
      const view = prepareDisplay({ ...input, series: input.series });
      return { title: view.name, body: <OrganizationPage view={view} viewer={viewer} urls={urls} /> };
    }
    case 't': {
      const view = prepareDisplay({ ...input, series: input.series });
      return { title: view.name, body: <ToolPage view={view} viewer={viewer} urls={urls} /> };
    }
    case 'c': {
      const view = prepareDisplay({ ...input, series: input.series });
      return { title: view.name, body: <MappingPage view={view} viewer={viewer} urls={urls} /> };
    }
    case 'e': {
      const view = prepareDisplay({ ...input, series: input.series });
      return { title: view.name, body: <EndorsementPage view={view} viewer={viewer} urls={urls} /> };
    }
  }
}

/**
 * Renders the display page of one record as a complete HTML document.
 *
 * @throws CatalogViewException UNKNOWN_SERIES, RECORD_NOT_FOUND or INVALID_RECORD
 */
export function renderDisplayPage(request: DisplayRequest, context: RenderContext = {}): string {
  const ctx = resolve(context);
  const series = seriesFromCode(request.series);
  const { title, body } = displayBody({ ...request, series }, ctx.viewer, ctx.urls);
  return renderInLayout(title, ctx, body);
}

function editBody(request: EditRequest, urls: UrlHelper): ReactNode {
  const { docId } = request;
  switch (request.series) {
    case 'm':
      return <SchemeEditPage form={request.form} docId={docId} urls={urls} subjects={request.subjects} />;
    case 'g':
      return <OrganizationEditPage form={request.form} docId={docId} urls={urls} />;
    case 't':
      return <ToolEditPage form={request.form} docId={docId} urls={urls} />;
    case 'c':
      return <MappingEditPage form={request.form} docId={docId} urls={urls} />;
    case 'e':
      return <EndorsementEditPage form={request.form} docId={docId} urls={urls} />;
  }
}

export function renderEditPage(request: EditRequest, context: RenderContext = {}): string {
  const ctx = resolve(context);
  return renderInLayout(editHeading(request.series, request.docId), ctx, editBody(request, ctx.urls));
}

export function renderVersionEditPage(request: VersionEditRequest, context: RenderContext = {}): string {
  const ctx = resolve(context);
  return renderInLayout(
    versionHeading(request.form.number_old.data, request.recordName),
    ctx,
    <VersionEditPage
      form={request.form}
      series={request.series}
      docId={request.docId}
      recordName={request.recordName}
      urls={ctx.urls}
    />
  );
}

export function renderDatatypeEditPage(request: DatatypeEditRequest, context: RenderContext = {}): string {
  const ctx = resolve(context);
  return renderInLayout(
    datatypeHeading(request.docId),
    ctx,
    <DatatypeEditPage form={request.form} docId={request.docId} urls={ctx.urls} />
  );
}
