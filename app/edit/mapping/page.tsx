import {
  CreatorInputs,
  FieldListGroup,
  IdentifierInputs,
  LocationInputs,
  MultiChoiceInput,
  TextAreaInput,
  TextInput,
} from '../../../components/forms/fields';
import { EditForm, editHeading, type EditPageProps } from '../../../components/forms/EditForm';
import { PageHeader } from '../../../components/ui';
import type { MappingForm } from '../../../lib/forms';

export default function MappingEditPage({ form, docId, urls }: EditPageProps<MappingForm>) {
  const { submitted } = form;

  return (
    <>
      <PageHeader title={editHeading('c', docId)} />
      <EditForm
        action={urls.edit('c', docId)}
        form={form}
        cancelHref={docId > 0 ? urls.display('c', docId) : undefined}
      >
        <TextInput field={form.name} submitted={submitted} />
        <TextAreaInput field={form.description} submitted={submitted} rows={6} />
        <FieldListGroup list={form.creators}>
          {(creator) => <CreatorInputs entry={creator} submitted={submitted} />}
        </FieldListGroup>
        <FieldListGroup list={form.locations}>
          {(location) => <LocationInputs entry={location} submitted={submitted} />}
        </FieldListGroup>
        <FieldListGroup list={form.identifiers}>
          {(identifier) => <IdentifierInputs entry={identifier} submitted={submitted} />}
        </FieldListGroup>

        <fieldset className="relations">
          <legend>Relationships</legend>
          <MultiChoiceInput field={form.input_schemes} submitted={submitted} />
          <MultiChoiceInput field={form.output_schemes} submitted={submitted} />
          <MultiChoiceInput field={form.maintainers} submitted={submitted} />
          <MultiChoiceInput field={form.funders} submitted={submitted} />
          <MultiChoiceInput field={form.users} submitted={submitted} />
        </fieldset>
      </EditForm>
    </>
  );
}
