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
import type { ToolForm } from '../../../lib/forms';

export default function ToolEditPage({ form, docId, urls }: EditPageProps<ToolForm>) {
  const { submitted } = form;

  return (
    <>
      <PageHeader title={editHeading('t', docId)} />
      <EditForm
        action={urls.edit('t', docId)}
        form={form}
        cancelHref={docId > 0 ? urls.display('t', docId) : undefined}
      >
        <TextInput field={form.title} submitted={submitted} />
        <TextAreaInput field={form.description} submitted={submitted} rows={6} />
        <MultiChoiceInput field={form.types} submitted={submitted} />
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
          <MultiChoiceInput field={form.supported_schemes} submitted={submitted} />
          <MultiChoiceInput field={form.maintainers} submitted={submitted} />
          <MultiChoiceInput field={form.funders} submitted={submitted} />
          <MultiChoiceInput field={form.users} submitted={submitted} />
        </fieldset>
      </EditForm>
    </>
  );
}
