import {
  Datalist,
  FieldListGroup,
  IdentifierInputs,
  LocationInputs,
  MultiChoiceInput,
  SampleInputs,
  TextAreaInput,
  TextInput,
} from '../../../components/forms/fields';
import { EditForm, editHeading, type EditPageProps } from '../../../components/forms/EditForm';
import { PageHeader } from '../../../components/ui';
import type { SchemeForm } from '../../../lib/forms';
import { formatMscid } from '../../../lib/mscid';

export interface SchemeEditPageProps extends EditPageProps<SchemeForm> {
  /** Thesaurus long labels offered while typing a subject area. */
  subjects?: readonly string[];
}

export default function SchemeEditPage({ form, docId, urls, subjects = [] }: SchemeEditPageProps) {
  const { submitted } = form;
  // A scheme cannot be its own parent or profile.
  const self = docId > 0 ? formatMscid('m', docId) : undefined;

  return (
    <>
      <PageHeader title={editHeading('m', docId)} />
      <EditForm
        action={urls.edit('m', docId)}
        form={form}
        cancelHref={docId > 0 ? urls.display('m', docId) : undefined}
      >
        <TextInput field={form.title} submitted={submitted} />
        <TextAreaInput field={form.description} submitted={submitted} rows={6} />

        <FieldListGroup list={form.keywords}>
          {(keyword) => <TextInput field={keyword} submitted={submitted} list="subjects" />}
        </FieldListGroup>
        <Datalist id="subjects" options={subjects} />

        <MultiChoiceInput field={form.dataTypes} submitted={submitted} />

        <FieldListGroup list={form.locations}>
          {(location) => <LocationInputs entry={location} submitted={submitted} />}
        </FieldListGroup>
        <FieldListGroup list={form.samples}>
          {(sample) => <SampleInputs entry={sample} submitted={submitted} />}
        </FieldListGroup>
        <FieldListGroup list={form.identifiers}>
          {(identifier) => <IdentifierInputs entry={identifier} submitted={submitted} />}
        </FieldListGroup>

        <fieldset className="relations">
          <legend>Relationships</legend>
          <MultiChoiceInput field={form.parent_schemes} submitted={submitted} omit={self} />
          <MultiChoiceInput field={form.child_schemes} submitted={submitted} omit={self} />
          <MultiChoiceInput field={form.input_to_mappings} submitted={submitted} />
          <MultiChoiceInput field={form.output_from_mappings} submitted={submitted} />
          <MultiChoiceInput field={form.maintainers} submitted={submitted} />
          <MultiChoiceInput field={form.funders} submitted={submitted} />
          <MultiChoiceInput field={form.users} submitted={submitted} />
          <MultiChoiceInput field={form.tools} submitted={submitted} />
          <MultiChoiceInput field={form.endorsements} submitted={submitted} />
        </fieldset>
      </EditForm>
    </>
  );
}
