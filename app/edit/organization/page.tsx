import {
  FieldListGroup,
  IdentifierInputs,
  LocationInputs,
  MultiChoiceInput,
  TextAreaInput,
  TextInput,
} from '../../../components/forms/fields';
import { EditForm, editHeading, type EditPageProps } from '../../../components/forms/EditForm';
import { PageHeader } from '../../../components/ui';
import type { OrganizationForm } from '../../../lib/forms';

export default function OrganizationEditPage({ form, docId, urls }: EditPageProps<OrganizationForm>) {
  const { submitted } = form;

  return (
    <>
      <PageHeader title={editHeading('g', docId)} />
      <EditForm
        action={urls.edit('g', docId)}
        form={form}
        cancelHref={docId > 0 ? urls.display('g', docId) : undefined}
      >
        <TextInput field={form.name} submitted={submitted} />
        <TextAreaInput field={form.description} submitted={submitted} rows={6} />
        <MultiChoiceInput field={form.types} submitted={submitted} />
        <FieldListGroup list={form.locations}>
          {(location) => <LocationInputs entry={location} submitted={submitted} />}
        </FieldListGroup>
        <FieldListGroup list={form.identifiers}>
          {(identifier) => <IdentifierInputs entry={identifier} submitted={submitted} />}
        </FieldListGroup>
      </EditForm>
    </>
  );
}
