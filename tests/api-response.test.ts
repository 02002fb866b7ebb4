import { isCatalogViewException } from '../lib/errors';
import { API_VERSION, apiUrls, asResponseItem, asResponsePage, embellishRecord, type ApiEntry, type PageOptions } from '../services/api-response';
import { thrownBy } from './helpers';

const origin = 'https://example.org/';
const link = 'https://example.org/api2/m';

const entries: ApiEntry[] = Array.from({ length: 25 }, (_, i): ApiEntry => ({
  series: 'm',
  docId: i + 1,
  record: { title: `Scheme ${i + 1}` },
}));

describe('embellishRecord', () => {
  const entry: ApiEntry = {
    series: 'm',
    docId: 1,
    record: { title: 'Darwin Core' },
    relations: {
      tools: [{ doc_id: 7, series: 't', title: 'Validator' }],
      maintainers: [{ doc_id: 5, series: 'g', name: 'Example Org' }],
      endorsements: [],
    },
  };

  test('adds MSC ID, URI and related entities ordered by role', () => {
    expect(embellishRecord(entry, origin)).toEqual({
      title: 'Darwin Core',
      mscid: 'msc:m1',
      uri: 'https://example.org/api2/m1',
      relatedEntities: [
        { id: 'msc:g5', role: 'maintainers' },
        { id: 'msc:t7', role: 'tools' },
      ],
    });
  });

  test('asResponseItem embeds related summaries', () => {
    const response = asResponseItem(entry, origin);
    expect(response.apiVersion).toBe(API_VERSION);
    expect(response.data.relatedEntities).toEqual([
      {
        id: 'msc:g5',
        role: 'maintainers',
        data: { mscid: 'msc:g5', uri: 'https://example.org/api2/g5', name: 'Example Org' },
      },
      {
        id: 'msc:t7',
        role: 'tools',
        data: { mscid: 'msc:t7', uri: 'https://example.org/api2/t7', title: 'Validator' },
      },
    ]);
  });

  test('an entity under two roles is embedded once', () => {
    const related = { doc_id: 3, series: 'm' as const, title: 'Dublin Core' };
    const response = asResponseItem(
      { series: 'm', docId: 1, record: {}, relations: { parent_schemes: [related], child_schemes: [related] } },
      origin
    );
    const [first, second] = response.data.relatedEntities ?? [];
    expect(first.role).toBe('child_schemes');
    expect(second.role).toBe('parent_schemes');
    expect(second.data).toBe(first.data);
  });

  test('records without relations have no relatedEntities key', () => {
    const data = embellishRecord({ series: 'g', docId: 2, record: { name: 'Example Org' } }, origin);
    expect('relatedEntities' in data).toBe(false);
  });

  test('URIs are absolute under the origin', () => {
    const { data } = asResponseItem(entry, 'http://localhost:8080');
    expect(data.uri).toMatch(/^https?:\/\//);
    expect(data.uri).toBe('http://localhost:8080/api2/m1');
    expect(data.relatedEntities?.map((entity) => entity.data?.uri)).toEqual([
      'http://localhost:8080/api2/g5',
      'http://localhost:8080/api2/t7',
    ]);
  });

  test('a relative or non-http origin is rejected', () => {
    for (const bad of ['', '/api2', 'example.org', 'ftp://example.org']) {
      const error = thrownBy(() => asResponseItem(entry, bad));
      expect(isCatalogViewException(error) && error.code).toBe('INVALID_ORIGIN');
    }
  });
});

describe('asResponsePage', () => {
  test('first page by default', () => {
    const { data } = asResponsePage(entries, link, origin, { pageSize: 10 });
    expect(data).toMatchObject({
      itemsPerPage: 10,
      currentItemCount: 10,
      startIndex: 1,
      totalItems: 25,
      pageIndex: 1,
      totalPages: 3,
      nextLink: `${link}?start=11&pageSize=10`,
    });
    expect(data.previousLink).toBeUndefined();
    expect(data.items[0]).toEqual({ title: 'Scheme 1', mscid: 'msc:m1', uri: 'https://example.org/api2/m1' });
  });

  test('page-based navigation', () => {
    const middle = asResponsePage(entries, link, origin, { pageSize: 10, page: 2 }).data;
    expect(middle.startIndex).toBe(11);
    expect(middle.nextLink).toBe(`${link}?page=3&pageSize=10`);
    expect(middle.previousLink).toBe(`${link}?page=1&pageSize=10`);

    const last = asResponsePage(entries, link, origin, { pageSize: 10, page: 3 }).data;
    expect(last.startIndex).toBe(21);
    expect(last.currentItemCount).toBe(5);
    expect(last.nextLink).toBeUndefined();
    expect(last.items.map((item) => item.mscid)).toEqual(['msc:m21', 'msc:m22', 'msc:m23', 'msc:m24', 'msc:m25']);
  });

  test('a start off a page boundary adds a partial page', () => {
    const { data } = asResponsePage(entries, link, origin, { pageSize: 10, start: 5 });
    expect(data.pageIndex).toBe(1);
    expect(data.totalPages).toBe(4);
    expect(data.currentItemCount).toBe(10);
    expect(data.items[0].mscid).toBe('msc:m5');
    expect(data.nextLink).toBe(`${link}?start=15&pageSize=10`);
    expect(data.previousLink).toBe(`${link}?start=1&pageSize=4`);
  });

  test('a start on a page boundary', () => {
    const { data } = asResponsePage(entries, link, origin, { pageSize: 10, start: 21 });
    expect(data.pageIndex).toBe(3);
    expect(data.totalPages).toBe(3);
    expect(data.previousLink).toBe(`${link}?start=11&pageSize=10`);
    expect(data.nextLink).toBeUndefined();
  });

  test('an empty collection is a single empty page', () => {
    const { data } = asResponsePage([], link, origin, { pageSize: 10 });
    expect(data).toEqual({
      itemsPerPage: 10,
      currentItemCount: 0,
      startIndex: 1,
      totalItems: 0,
      pageIndex: 1,
      totalPages: 0,
      items: [],
    });
  });

  test('out-of-range windows are not found', () => {
    for (const options of [{ start: 26 }, { start: 0 }, { page: 4 }, { page: 0 }]) {
      const error = thrownBy(() => asResponsePage(entries, link, origin, { pageSize: 10, ...options }));
      expect(isCatalogViewException(error) && error.code).toBe('PAGE_NOT_FOUND');
    }
  });

  const invalidPaging: Array<[string, PageOptions]> = [
    ['pageSize', { pageSize: 0 }],
    ['pageSize', { pageSize: -5 }],
    ['pageSize', { pageSize: Number.NaN }],
    ['pageSize', { pageSize: 2.5 }],
    ['start', { pageSize: 10, start: 1.5 }],
    ['start', { pageSize: 10, start: Number.NaN }],
    ['page', { pageSize: 10, page: Number.NaN }],
    ['page', { pageSize: 10, page: 1.5 }],
  ];

  test.each(invalidPaging)('a %s that is not a positive integer is rejected: %p', (parameter, options) => {
    const error = thrownBy(() => asResponsePage(entries.slice(0, 3), link, origin, options));
    expect(isCatalogViewException(error) && error.code).toBe('INVALID_PAGING');
    expect(isCatalogViewException(error) && error.error.details?.parameter).toBe(parameter);
  });
});

describe('apiUrls', () => {
  test('builds record and list URLs on the origin', () => {
    const api = apiUrls('https://example.org/catalog/');
    expect(api.apiRecord('t', 4)).toBe('https://example.org/catalog/api2/t4');
    expect(api.apiList('g')).toBe('https://example.org/catalog/api2/g');
  });
});
