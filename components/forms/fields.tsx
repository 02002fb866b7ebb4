import * as React from 'react';
import type {
  ChoiceFieldState,
  CreatorSubform,
  FieldListState,
  IdentifierSubform,
  LocationSubform,
  MultiChoiceField,
  NamespaceSubform,
  SampleSubform,
  TextField,
} from '../../lib/forms';
import { Input, Select, Textarea } from '../ui';
import { FieldErrors } from './FieldErrors';

/*
  Widgets bound to upstream form objects. Each one takes the field as
  delivered (id, name, label, data, errors) plus whether the form has been
  posted back, and draws the matching control.
*/

interface BoundProps<F> {
  field: F;
  submitted: boolean;
}

export function TextInput({
  field,
  submitted,
  type = 'text',
  list,
}: BoundProps<TextField> & { type?: 'text' | 'url' | 'date' | 'email'; list?: string }) {
  return (
    <Input
      id={field.id}
      name={field.name}
      type={type}
      list={list}
      label={field.label}
      hint={field.description}
      defaultValue={field.data}
      errors={field.errors}
      submitted={submitted}
      required={field.required}
    />
  );
}

export function DateInput(props: BoundProps<TextField>) {
  return <TextInput {...props} type="date" />;
}

export function TextAreaInput({ field, submitted, rows }: BoundProps<TextField> & { rows?: number }) {
  return (
    <Textarea
      id={field.id}
      name={field.name}
      rows={rows}
      label={field.label}
      hint={field.description}
      defaultValue={field.data}
      errors={field.errors}
      submitted={submitted}
      required={field.required}
    />
  );
}

export function ChoiceInput({ field, submitted }: BoundProps<ChoiceFieldState<string>>) {
  return (
    <Select
      id={field.id}
      name={field.name}
      label={field.label}
      hint={field.description}
      options={field.choices}
      defaultValue={field.data}
      errors={field.errors}
      submitted={submitted}
      required={field.required}
    />
  );
}

/**
 * Multi-select over related records or vocabulary terms. `omit` removes
 * one value from the choices, used to stop a scheme being related to itself.
 */
export function MultiChoiceInput({ field, submitted, omit }: BoundProps<MultiChoiceField> & { omit?: string }) {
  const options = omit ? field.choices.filter((choice) => choice.value !== omit) : field.choices;
  return (
    <Select
      id={field.id}
      name={field.name}
      label={field.label}
      hint={field.description}
      options={options}
      multiple
      defaultValue={[...field.data]}
      errors={field.errors}
      submitted={submitted}
      required={field.required}
    />
  );
}

export function HiddenInput({ field }: { field: TextField | undefined }) {
  if (!field) return null;
  return <input type="hidden" id={field.id} name={field.name} value={field.data} />;
}

export function Datalist({ id, options }: { id: string; options: readonly string[] }) {
  if (options.length === 0) return null;
  return (
    <datalist id={id}>
      {options.map((option) => (
        <option key={option} value={option} />
      ))}
    </datalist>
  );
}

/*
  FieldListGroup: Repeating sub-forms, one numbered block per entry.
*/
export interface FieldListGroupProps<E> {
  list: FieldListState<E>;
  children: (entry: E, index: number) => React.ReactNode;
}

export function FieldListGroup<E>({ list, children }: FieldListGroupProps<E>) {
  return (
    <fieldset id={list.id} className="field-list">
      <legend>{list.label}</legend>
      {list.entries.map((entry, index) => (
        <div key={index} className="field-list-entry" data-index={index}>
          {children(entry, index)}
        </div>
      ))}
      <FieldErrors fieldId={list.id} errors={list.errors} />
    </fieldset>
  );
}

export function LocationInputs({ entry, submitted }: { entry: LocationSubform; submitted: boolean }) {
  const { type } = entry;
  return (
    <div className="form-row">
      <TextInput field={entry.url} submitted={submitted} type="url" />
      {'choices' in type ? (
        <ChoiceInput field={type} submitted={submitted} />
      ) : (
        <TextInput field={type} submitted={submitted} />
      )}
    </div>
  );
}

export function SampleInputs({ entry, submitted }: { entry: SampleSubform; submitted: boolean }) {
  return (
    <div className="form-row">
      <TextInput field={entry.title} submitted={submitted} />
      <TextInput field={entry.url} submitted={submitted} type="url" />
    </div>
  );
}

export function IdentifierInputs({ entry, submitted }: { entry: IdentifierSubform; submitted: boolean }) {
  return (
    <div className="form-row">
      <TextInput field={entry.id} submitted={submitted} />
      <TextInput field={entry.scheme} submitted={submitted} />
    </div>
  );
}

export function NamespaceInputs({ entry, submitted }: { entry: NamespaceSubform; submitted: boolean }) {
  return (
    <div className="form-row">
      <TextInput field={entry.prefix} submitted={submitted} />
      <TextInput field={entry.uri} submitted={submitted} type="url" />
    </div>
  );
}

export function CreatorInputs({ entry, submitted }: { entry: CreatorSubform; submitted: boolean }) {
  return (
    <div className="form-row">
      <TextInput field={entry.fullName} submitted={submitted} />
      <TextInput field={entry.givenName} submitted={submitted} />
      <TextInput field={entry.familyName} submitted={submitted} />
    </div>
  );
}
