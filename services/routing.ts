import type { Series } from '../lib/records';

/*
  URL builder the views call into. The host framework owns routing; this
  default mirrors its canonical paths so pages can be rendered on their own.
*/
export interface UrlHelper {
  home(): string;
  display(series: Series, docId: number): string;
  edit(series: Series, docId: number): string;
  editVersion(series: Series, docId: number, number: string): string;
  addVersion(series: Series, docId: number): string;
  editDatatype(docId: number): string;
  apiRecord(series: Series, docId: number): string;
  apiList(series: Series): string;
  asset(path: string): string;
  login(): string;
  logout(): string;
}

export function createUrlHelper(baseUrl = ''): UrlHelper {
  const base = baseUrl.replace(/\/+$/, '');
  const at = (path: string) => `${base}${path}`;

  return {
    home: () => at('/'),
    display: (series, docId) => at(`/msc/${series}${docId}`),
    edit: (series, docId) => at(`/edit/${series}${docId}`),
    editVersion: (series, docId, number) =>
      at(`/edit/${series}${docId}/v/${encodeURIComponent(number)}`),
    addVersion: (series, docId) => at(`/edit/${series}${docId}/add-version`),
    editDatatype: (docId) => at(`/edit/datatype${docId}`),
    apiRecord: (series, docId) => at(`/api2/${series}${docId}`),
    apiList: (series) => at(`/api2/${series}`),
    asset: (path) => (/^[a-z]+:\/\//i.test(path) ? path : at(path.startsWith('/') ? path : `/${path}`)),
    login: () => at('/login'),
    logout: () => at('/logout'),
  };
}
