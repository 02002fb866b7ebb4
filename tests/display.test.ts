import { prepareDisplay, validityPeriod } from '../lib/display';
import { isCatalogViewException } from '../lib/errors';
import { createThesaurus } from '../lib/thesaurus';
import { darwinCore, thesaurusTerms, thrownBy } from './helpers';

describe('prepareDisplay', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
  });

  test('builds the scheme view model', () => {
    const view = prepareDisplay({
      series: 'm',
      docId: 1,
      record: darwinCore,
      relations: {
        parent_schemes: [{ doc_id: 3, series: 'm', title: 'Dublin Core' }],
        not_a_relation: [{ doc_id: 4, series: 'm' }],
      },
      thesaurus: createThesaurus(thesaurusTerms),
      dataTypes: { 'msc:datatype1': 'Dataset' },
    });

    expect(view.mscid).toBe('msc:m1');
    expect(view.name).toBe('Darwin Core');
    expect(view.keywords).toEqual(['Biology']);
    expect(view.dataTypes).toEqual(['Dataset']);
    expect(view.versions.map((v) => v.status)).toEqual(['proposed', 'current', 'deprecated on 2015-06-02']);
    expect(Object.keys(view.relations)).toEqual(['parent_schemes']);
    expect(view.hasRelatedSchemes).toBe(true);
    expect(view.record.title).toBe('Darwin Core');
  });

  test('keywords without a thesaurus entry are dropped with a warning', () => {
    const view = prepareDisplay({
      series: 'm',
      docId: 2,
      record: { keywords: ['http://example.org/thes/zoology', 'http://example.org/thes/unknown'] },
      thesaurus: createThesaurus(thesaurusTerms),
    });
    expect(view.keywords).toEqual(['Zoology']);
    expect(warn).toHaveBeenCalledWith('[display] No keyword for http://example.org/thes/unknown.');
  });

  test('without a thesaurus or lookup, stored values are shown', () => {
    const view = prepareDisplay({
      series: 'm',
      docId: 2,
      record: { keywords: ['http://example.org/thes/zoology'], dataTypes: ['msc:datatype9'] },
      dataTypes: { 'msc:datatype1': 'Dataset' },
    });
    expect(view.keywords).toEqual(['http://example.org/thes/zoology']);
    expect(view.dataTypes).toEqual(['msc:datatype9']);
    expect(view.name).toBe('Untitled');
    expect(view.hasRelatedSchemes).toBe(false);
  });

  test('unknown fields survive validation', () => {
    const view = prepareDisplay({ series: 'g', docId: 5, record: { name: 'Example Org', legacy: 'kept' } });
    expect(view.record).toEqual({ name: 'Example Org', legacy: 'kept' });
  });

  test('a doc_id that is not a positive integer is not found', () => {
    for (const docId of [0, -3, 1.5]) {
      const error = thrownBy(() => prepareDisplay({ series: 't', docId, record: {} }));
      expect(isCatalogViewException(error) && error.code).toBe('RECORD_NOT_FOUND');
    }
  });

  test('a record of the wrong shape is rejected', () => {
    const error = thrownBy(() => prepareDisplay({ series: 'm', docId: 1, record: { title: 5 } }));
    expect(isCatalogViewException(error) && error.code).toBe('INVALID_RECORD');
    expect(isCatalogViewException(error) && error.error.context).toBe('msc:m1');
  });
});

describe('validityPeriod', () => {
  test('describes each combination of bounds', () => {
    expect(validityPeriod('2020-01-01', '2022-01-01')).toBe('valid from 2020-01-01 until 2022-01-01');
    expect(validityPeriod('2020-01-01', undefined)).toBe('valid from 2020-01-01');
    expect(validityPeriod(undefined, '2022-01-01')).toBe('no longer valid after 2022-01-01');
    expect(validityPeriod(undefined, undefined)).toBeUndefined();
  });
});
