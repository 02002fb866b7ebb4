import type { CatalogConfig } from '../lib/config';
import type {
  Choice,
  CreatorSubform,
  DatatypeForm,
  EndorsementForm,
  FieldErrorList,
  FieldListState,
  IdentifierSubform,
  LocationSubform,
  MappingForm,
  MultiChoiceField,
  NamespaceSubform,
  OrganizationForm,
  SampleSubform,
  SchemeForm,
  TextField,
  ToolForm,
  VersionForm,
} from '../lib/forms';
import { createUrlHelper } from '../services/routing';

export const testConfig: CatalogConfig = {
  siteName: 'Test Catalog',
  baseUrl: '',
  stylesheet: '/static/test.css',
  apiPageSize: 10,
};

export const urls = createUrlHelper('');

export function parse(html: string): Document {
  return new DOMParser().parseFromString(html, 'text/html');
}

export function texts(root: ParentNode, selector: string): string[] {
  return Array.from(root.querySelectorAll(selector), (el) => el.textContent ?? '');
}

export function attrs(root: ParentNode, selector: string, name: string): Array<string | null> {
  return Array.from(root.querySelectorAll(selector), (el) => el.getAttribute(name));
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

// Form fixtures

export function field(name: string, data = '', overrides: Partial<TextField> = {}): TextField {
  return { id: name, name, label: name, data, errors: [], ...overrides };
}

export function multi(
  name: string,
  choices: Choice[] = [],
  data: string[] = [],
  overrides: Partial<MultiChoiceField> = {}
): MultiChoiceField {
  return { id: name, name, label: name, data, choices, errors: [], ...overrides };
}

export function fieldList<E>(name: string, entries: E[] = [], errors: FieldErrorList = []): FieldListState<E> {
  return { id: name, name, label: name, entries, errors };
}

export function locationEntry(list: string, index: number, url = '', type = ''): LocationSubform {
  return { url: field(`${list}-${index}-url`, url), type: field(`${list}-${index}-type`, type) };
}

export function identifierEntry(list: string, index: number, id = '', scheme = ''): IdentifierSubform {
  return { id: field(`${list}-${index}-id`, id), scheme: field(`${list}-${index}-scheme`, scheme) };
}

export function creatorEntry(list: string, index: number, fullName = ''): CreatorSubform {
  return {
    fullName: field(`${list}-${index}-fullName`, fullName),
    givenName: field(`${list}-${index}-givenName`),
    familyName: field(`${list}-${index}-familyName`),
  };
}

const base = () => ({ submitted: false, csrf_token: field('csrf_token', 'test-token') });

export function schemeForm(overrides: Partial<SchemeForm> = {}): SchemeForm {
  return {
    ...base(),
    title: field('title'),
    description: field('description'),
    keywords: fieldList<TextField>('keywords'),
    dataTypes: multi('dataTypes'),
    locations: fieldList<LocationSubform>('locations'),
    samples: fieldList<SampleSubform>('samples'),
    identifiers: fieldList<IdentifierSubform>('identifiers'),
    parent_schemes: multi('parent_schemes'),
    child_schemes: multi('child_schemes'),
    input_to_mappings: multi('input_to_mappings'),
    output_from_mappings: multi('output_from_mappings'),
    maintainers: multi('maintainers'),
    funders: multi('funders'),
    users: multi('users'),
    tools: multi('tools'),
    endorsements: multi('endorsements'),
    ...overrides,
  };
}

export function organizationForm(overrides: Partial<OrganizationForm> = {}): OrganizationForm {
  return {
    ...base(),
    name: field('name'),
    description: field('description'),
    types: multi('types'),
    locations: fieldList<LocationSubform>('locations'),
    identifiers: fieldList<IdentifierSubform>('identifiers'),
    ...overrides,
  };
}

export function toolForm(overrides: Partial<ToolForm> = {}): ToolForm {
  return {
    ...base(),
    title: field('title'),
    description: field('description'),
    types: multi('types'),
    creators: fieldList<CreatorSubform>('creators'),
    locations: fieldList<LocationSubform>('locations'),
    identifiers: fieldList<IdentifierSubform>('identifiers'),
    supported_schemes: multi('supported_schemes'),
    maintainers: multi('maintainers'),
    funders: multi('funders'),
    users: multi('users'),
    ...overrides,
  };
}

export function mappingForm(overrides: Partial<MappingForm> = {}): MappingForm {
  return {
    ...base(),
    name: field('name'),
    description: field('description'),
    creators: fieldList<CreatorSubform>('creators'),
    locations: fieldList<LocationSubform>('locations'),
    identifiers: fieldList<IdentifierSubform>('identifiers'),
    input_schemes: multi('input_schemes'),
    output_schemes: multi('output_schemes'),
    maintainers: multi('maintainers'),
    funders: multi('funders'),
    users: multi('users'),
    ...overrides,
  };
}

export function endorsementForm(overrides: Partial<EndorsementForm> = {}): EndorsementForm {
  return {
    ...base(),
    title: field('title'),
    description: field('description'),
    creators: fieldList<CreatorSubform>('creators'),
    publication: field('publication'),
    issued: field('issued'),
    valid_from: field('valid_from'),
    valid_to: field('valid_to'),
    locations: fieldList<TextField>('locations'),
    identifiers: fieldList<IdentifierSubform>('identifiers'),
    endorsed_schemes: multi('endorsed_schemes'),
    originators: multi('originators'),
    ...overrides,
  };
}

export function versionForm(overrides: Partial<VersionForm> = {}): VersionForm {
  return {
    ...base(),
    number: field('number'),
    number_old: field('number_old'),
    issued: field('issued'),
    available: field('available'),
    valid_from: field('valid_from'),
    valid_to: field('valid_to'),
    note: field('note'),
    locations: fieldList<LocationSubform>('locations'),
    identifiers: fieldList<IdentifierSubform>('identifiers'),
    namespaces: fieldList<NamespaceSubform>('namespaces'),
    samples: fieldList<SampleSubform>('samples'),
    ...overrides,
  };
}

export function datatypeForm(overrides: Partial<DatatypeForm> = {}): DatatypeForm {
  return {
    ...base(),
    id: field('id'),
    label: field('label'),
    ...overrides,
  };
}

// Record fixtures

export const darwinCore = {
  title: 'Darwin Core',
  description: '<p>Biodiversity <em>terms</em>.</p>',
  keywords: ['http://example.org/thes/biology'],
  dataTypes: ['msc:datatype1'],
  locations: [
    { url: 'https://example.org/dwc', type: 'website' },
    { url: 'https://example.org/dwc.xsd', type: 'XSD' },
  ],
  namespaces: [{ prefix: 'dwc', uri: 'http://example.org/dwc/terms/' }],
  identifiers: [{ id: '10.1234/dwc', scheme: 'DOI' }],
  samples: [{ url: 'https://example.org/sample.xml', title: 'Sample occurrence' }],
  versions: [
    { number: '1.0', issued: '2009-10-09', valid_from: '2009-10-09', valid_to: '2015-06-02' },
    { number: '1.1', issued: '2015-06-02' },
    { number: '2.0', available: '2021-01-01' },
  ],
};

export const thesaurusTerms = [
  { uri: 'http://example.org/thes/science', label: 'Science' },
  { uri: 'http://example.org/thes/biology', label: 'Biology', broader: 'http://example.org/thes/science' },
  { uri: 'http://example.org/thes/zoology', label: 'Zoology', broader: 'http://example.org/thes/biology' },
];
