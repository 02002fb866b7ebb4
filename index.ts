export {
  renderDisplayPage,
  renderDocument,
  renderDatatypeEditPage,
  renderEditPage,
  renderVersionEditPage,
} from './lib/render';
export type { DatatypeEditRequest, DisplayRequest, EditRequest, RenderContext, VersionEditRequest } from './lib/render';

export { prepareDisplay, validityPeriod } from './lib/display';
export type { DisplayInput, DisplayView } from './lib/display';

export { SERIES, RECORD_SCHEMAS, isSeries, seriesFromCode, recordName, creatorName } from './lib/records';
export type {
  CatalogRecord,
  Creator,
  EndorsementRecord,
  Identifier,
  Location,
  MappingRecord,
  Namespace,
  OrganizationRecord,
  RecordsBySeries,
  Sample,
  SchemeRecord,
  Series,
  SeriesName,
  ToolRecord,
  Version,
} from './lib/records';
export { formatMscid, parseMscid, mscidSortKey, MSCID_PREFIX } from './lib/mscid';
export { RELATION_FIELDS, filterRelations, relatedLabel, relationField } from './lib/relations';
export type { RelatedRecord, RelationField, RelationsMap } from './lib/relations';
export { prepareVersions } from './lib/versions';
export type { VersionView } from './lib/versions';
export { createThesaurus } from './lib/thesaurus';
export type { Thesaurus, ThesaurusTerm } from './lib/thesaurus';
export { cleanErrorList, saveErrorSummary } from './lib/messages';
export type { FlashCategory, FlashMessage } from './lib/messages';
export { countFormErrors } from './lib/forms';
export type {
  Choice,
  ChoiceFieldState,
  DatatypeForm,
  EndorsementForm,
  FieldErrorList,
  FieldListState,
  FieldState,
  MappingForm,
  OrganizationForm,
  SchemeForm,
  TextField,
  ToolForm,
  VersionForm,
} from './lib/forms';
export { getConfig, loadConfig, resetConfigCache } from './lib/config';
export type { CatalogConfig } from './lib/config';
export { CatalogViewException, isCatalogViewException } from './lib/errors';
export type { CatalogViewError, CatalogViewErrorCode } from './lib/errors';

export { formStateClass } from './components/forms/form-state';
export { FieldErrors } from './components/forms/FieldErrors';

export { createUrlHelper } from './services/routing';
export type { UrlHelper } from './services/routing';
export { ANONYMOUS, isAuthenticated, viewerFromSession } from './services/auth';
export type { Viewer } from './services/auth';
export { API_VERSION, apiUrls, asResponseItem, asResponsePage, embellishRecord } from './services/api-response';
export type { ApiEntry, ApiItemResponse, ApiPageResponse, ApiRecord, PageOptions } from './services/api-response';
