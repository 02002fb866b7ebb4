import { prepareVersions } from '../lib/versions';

describe('prepareVersions', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
  });

  test('absent versions give an empty list', () => {
    expect(prepareVersions(undefined, 'msc:m1')).toEqual([]);
    expect(warn).not.toHaveBeenCalled();
  });

  test('derives dates and statuses, newest first', () => {
    const versions = prepareVersions(
      [
        { number: '1.0', issued: '2009-10-09', valid_from: '2009-10-09', valid_to: '2015-06-02' },
        { number: '1.1', issued: '2015-06-02' },
        { number: '2.0', available: '2021-01-01' },
      ],
      'msc:m1'
    );
    expect(versions.map((v) => [v.number, v.date, v.status])).toEqual([
      ['2.0', '2021-01-01', 'proposed'],
      ['1.1', '2015-06-02', 'current'],
      ['1.0', '2009-10-09', 'deprecated on 2015-06-02'],
    ]);
    expect(warn).not.toHaveBeenCalled();
  });

  test('validity dates stand in for a missing issue date', () => {
    const [version] = prepareVersions([{ number: '3', valid_from: '2020-01-01', valid_to: '2021-01-01' }], 'msc:m1');
    expect(version).toMatchObject({ date: '2020-01-01', status: 'deprecated on 2021-01-01' });
  });

  test('stored status and date are kept', () => {
    const [version] = prepareVersions(
      [{ number: '1', date: '2001-01-01', status: 'withdrawn', issued: '2000-01-01' }],
      'msc:m1'
    );
    expect(version).toMatchObject({ date: '2001-01-01', status: 'withdrawn' });
  });

  test('an existing current version stops the marking walk', () => {
    const versions = prepareVersions(
      [
        { number: '1', issued: '2010-01-01' },
        { number: '2', issued: '2012-01-01', valid_from: '2012-01-01' },
      ],
      'msc:m1'
    );
    expect(versions.map((v) => v.status)).toEqual(['current', '']);
  });

  test('undated versions are ordered by number with a warning', () => {
    const versions = prepareVersions([{ number: '2' }, { number: '10' }, { number: '9' }, { note: 'no number' }], 'msc:t4');
    expect(versions.map((v) => v.number)).toEqual(['10', '9', '2']);
    expect(versions[0].status).toBe('current');
    expect(warn).toHaveBeenCalledWith('[display] Record msc:t4 has missing version date.');
  });
});
