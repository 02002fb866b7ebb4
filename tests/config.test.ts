import { getConfig, loadConfig, resetConfigCache } from '../lib/config';
import { isCatalogViewException } from '../lib/errors';
import { thrownBy } from './helpers';

describe('loadConfig', () => {
  test('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      siteName: 'Metadata Standards Catalog',
      baseUrl: '',
      stylesheet: '/static/css/catalog.css',
      apiPageSize: 10,
    });
  });

  test('reads and normalises environment values', () => {
    const config = loadConfig({
      CATALOG_SITE_NAME: 'Test Catalog',
      CATALOG_BASE_URL: 'https://example.org/catalog/',
      CATALOG_API_PAGE_SIZE: '25',
    });
    expect(config.siteName).toBe('Test Catalog');
    expect(config.baseUrl).toBe('https://example.org/catalog');
    expect(config.apiPageSize).toBe(25);
  });

  test('rejects a page size that is not positive', () => {
    const error = thrownBy(() => loadConfig({ CATALOG_API_PAGE_SIZE: '0' }));
    expect(isCatalogViewException(error) && error.code).toBe('INVALID_CONFIG');
  });
});

describe('getConfig', () => {
  const saved = process.env.CATALOG_SITE_NAME;

  afterEach(() => {
    if (saved === undefined) delete process.env.CATALOG_SITE_NAME;
    else process.env.CATALOG_SITE_NAME = saved;
    resetConfigCache();
  });

  test('reads the environment once until the cache is reset', () => {
    process.env.CATALOG_SITE_NAME = 'First';
    resetConfigCache();
    expect(getConfig().siteName).toBe('First');

    process.env.CATALOG_SITE_NAME = 'Second';
    expect(getConfig().siteName).toBe('First');

    resetConfigCache();
    expect(getConfig().siteName).toBe('Second');
  });
});
