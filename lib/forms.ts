/*
  Form objects handed to the edit views. Field construction and validation
  happen upstream; these types only describe what a view needs to draw a
  field: its identity, label, current data and the errors found on submit.
*/

/** Errors may arrive nested one level deep when a sub-form reports them. */
export type FieldErrorList = ReadonlyArray<string | readonly string[]>;

export interface FieldState<V = string> {
  id: string;
  name: string;
  label: string;
  data: V;
  errors: FieldErrorList;
  description?: string;
  required?: boolean;
}

export interface Choice {
  value: string;
  label: string;
}

export interface ChoiceFieldState<V = string> extends FieldState<V> {
  choices: readonly Choice[];
}

export type TextField = FieldState<string>;
export type MultiChoiceField = ChoiceFieldState<string[]>;

export interface FieldListState<E> {
  id: string;
  name: string;
  label: string;
  entries: readonly E[];
  errors: FieldErrorList;
}

export interface LocationSubform {
  url: TextField;
  type: TextField | ChoiceFieldState<string>;
}

export interface SampleSubform {
  title: TextField;
  url: TextField;
}

export interface IdentifierSubform {
  id: TextField;
  scheme: TextField;
}

export interface NamespaceSubform {
  prefix: TextField;
  uri: TextField;
}

export interface CreatorSubform {
  fullName: TextField;
  givenName: TextField;
  familyName: TextField;
}

interface FormBase {
  /** True once the form has been posted back; valid fields then show as valid. */
  submitted: boolean;
  csrf_token?: TextField;
  old_relations?: TextField;
}

export interface SchemeForm extends FormBase {
  title: TextField;
  description: TextField;
  keywords: FieldListState<TextField>;
  dataTypes: MultiChoiceField;
  locations: FieldListState<LocationSubform>;
  samples: FieldListState<SampleSubform>;
  identifiers: FieldListState<IdentifierSubform>;
  parent_schemes: MultiChoiceField;
  child_schemes: MultiChoiceField;
  input_to_mappings: MultiChoiceField;
  output_from_mappings: MultiChoiceField;
  maintainers: MultiChoiceField;
  funders: MultiChoiceField;
  users: MultiChoiceField;
  tools: MultiChoiceField;
  endorsements: MultiChoiceField;
}

export interface OrganizationForm extends FormBase {
  name: TextField;
  description: TextField;
  types: MultiChoiceField;
  locations: FieldListState<LocationSubform>;
  identifiers: FieldListState<IdentifierSubform>;
}

export interface ToolForm extends FormBase {
  title: TextField;
  description: TextField;
  types: MultiChoiceField;
  creators: FieldListState<CreatorSubform>;
  locations: FieldListState<LocationSubform>;
  identifiers: FieldListState<IdentifierSubform>;
  supported_schemes: MultiChoiceField;
  maintainers: MultiChoiceField;
  funders: MultiChoiceField;
  users: MultiChoiceField;
}

export interface MappingForm extends FormBase {
  name: TextField;
  description: TextField;
  creators: FieldListState<CreatorSubform>;
  locations: FieldListState<LocationSubform>;
  identifiers: FieldListState<IdentifierSubform>;
  input_schemes: MultiChoiceField;
  output_schemes: MultiChoiceField;
  maintainers: MultiChoiceField;
  funders: MultiChoiceField;
  users: MultiChoiceField;
}

export interface EndorsementForm extends FormBase {
  title: TextField;
  description: TextField;
  creators: FieldListState<CreatorSubform>;
  publication: TextField;
  issued: TextField;
  valid_from: TextField;
  valid_to: TextField;
  /** Endorsement links are always documents, so only the URL is asked for. */
  locations: FieldListState<TextField>;
  identifiers: FieldListState<IdentifierSubform>;
  endorsed_schemes: MultiChoiceField;
  originators: MultiChoiceField;
}

export interface VersionForm extends FormBase {
  number: TextField;
  number_old: TextField;
  issued: TextField;
  available: TextField;
  valid_from: TextField;
  valid_to: TextField;
  note: TextField;
  locations: FieldListState<LocationSubform>;
  identifiers: FieldListState<IdentifierSubform>;
  namespaces: FieldListState<NamespaceSubform>;
  samples: FieldListState<SampleSubform>;
}

/** Entry in the data-type vocabulary that schemes pick from. */
export interface DatatypeForm extends FormBase {
  id: TextField;
  label: TextField;
}

type AnyField = FieldState<unknown> | FieldListState<unknown>;

function isField(value: unknown): value is AnyField {
  return typeof value === 'object' && value !== null && 'errors' in value && Array.isArray(value.errors);
}

function entryHasErrors(entry: unknown): boolean {
  if (isField(entry)) return fieldHasErrors(entry);
  if (typeof entry !== 'object' || entry === null) return false;
  return Object.values(entry).some(entryHasErrors);
}

function fieldHasErrors(field: AnyField): boolean {
  if (field.errors.length > 0) return true;
  if ('entries' in field) return field.entries.some(entryHasErrors);
  return false;
}

/** Number of top-level fields reporting at least one error, sub-forms included. */
export function countFormErrors(form: object): number {
  return Object.values(form).filter((value) => isField(value) && fieldHasErrors(value)).length;
}
