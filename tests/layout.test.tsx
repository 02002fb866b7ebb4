import RootLayout, { pageTitle } from '../app/layout';
import { renderDocument } from '../lib/render';
import { ANONYMOUS } from '../services/auth';
import { createUrlHelper } from '../services/routing';
import { attrs, parse, texts, urls } from './helpers';

const site = { name: 'Test Catalog', stylesheet: '/static/test.css' };

describe('RootLayout', () => {
  test('document shell', () => {
    const html = renderDocument(
      <RootLayout title="Darwin Core" site={site} viewer={ANONYMOUS} urls={urls}>
        <p id="content">Body</p>
      </RootLayout>
    );
    expect(html.startsWith('<!DOCTYPE html><html lang="en">')).toBe(true);

    const doc = parse(html);
    expect(doc.title).toBe('Darwin Core – Test Catalog');
    expect(doc.querySelector('link[rel="stylesheet"]')?.getAttribute('href')).toBe('/static/test.css');
    expect(doc.querySelector('main #content')?.textContent).toBe('Body');
    expect(doc.querySelector('.flashed-messages')).toBeNull();
  });

  test('page title falls back to the site name', () => {
    expect(pageTitle('', 'Test Catalog')).toBe('Test Catalog');
    expect(pageTitle('Edit scheme', 'Test Catalog')).toBe('Edit scheme – Test Catalog');
  });

  test('navigation offers sign in to anonymous viewers', () => {
    const doc = parse(
      renderDocument(
        <RootLayout title="" site={site} viewer={ANONYMOUS} urls={urls}>
          {null}
        </RootLayout>
      )
    );
    expect(texts(doc, '.navbar-nav a')).toEqual(['Home', 'Sign in']);
    expect(attrs(doc, '.navbar-nav a', 'href')).toEqual(['/', '/login']);
  });

  test('navigation offers sign out when authenticated', () => {
    const doc = parse(
      renderDocument(
        <RootLayout title="" site={site} viewer={{ authenticated: true }} urls={createUrlHelper('/catalog')}>
          {null}
        </RootLayout>
      )
    );
    expect(texts(doc, '.navbar-nav a')).toEqual(['Home', 'Sign out']);
    expect(attrs(doc, '.navbar-nav a', 'href')).toEqual(['/catalog/', '/catalog/logout']);
    expect(doc.querySelector('link[rel="stylesheet"]')?.getAttribute('href')).toBe('/catalog/static/test.css');
  });

  test('flashed messages map categories to alert classes', () => {
    const doc = parse(
      renderDocument(
        <RootLayout
          title=""
          site={site}
          viewer={ANONYMOUS}
          urls={urls}
          messages={[
            { category: 'error', text: 'Could not save.' },
            { category: 'success', text: 'Successfully updated record.' },
            { category: 'info', text: 'Note.' },
          ]}
        >
          {null}
        </RootLayout>
      )
    );
    expect(attrs(doc, '.flashed-messages > div', 'class')).toEqual([
      'alert alert-danger',
      'alert alert-success',
      'alert alert-info',
    ]);
    expect(attrs(doc, '.flashed-messages > div', 'role')).toEqual(['alert', 'alert', 'alert']);
    expect(texts(doc, '.flashed-messages > div')).toEqual([
      'Could not save.',
      'Successfully updated record.',
      'Note.',
    ]);
  });
});
