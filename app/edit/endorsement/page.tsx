import {
  CreatorInputs,
  DateInput,
  FieldListGroup,
  IdentifierInputs,
  MultiChoiceInput,
  TextAreaInput,
  TextInput,
} from '../../../components/forms/fields';
import { EditForm, editHeading, type EditPageProps } from '../../../components/forms/EditForm';
import { PageHeader } from '../../../components/ui';
import type { EndorsementForm } from '../../../lib/forms';

export default function EndorsementEditPage({ form, docId, urls }: EditPageProps<EndorsementForm>) {
  const { submitted } = form;

  return (
    <>
      <PageHeader title={editHeading('e', docId)} />
      <EditForm
        action={urls.edit('e', docId)}
        form={form}
        cancelHref={docId > 0 ? urls.display('e', docId) : undefined}
      >
        <TextInput field={form.title} submitted={submitted} />
        <TextAreaInput field={form.description} submitted={submitted} rows={6} />
        <FieldListGroup list={form.creators}>
          {(creator) => <CreatorInputs entry={creator} submitted={submitted} />}
        </FieldListGroup>
        <TextAreaInput field={form.publication} submitted={submitted} rows={3} />

        <div className="form-row">
          <DateInput field={form.issued} submitted={submitted} />
          <DateInput field={form.valid_from} submitted={submitted} />
          <DateInput field={form.valid_to} submitted={submitted} />
        </div>

        {/* Endorsement links are stored with type "document". */}
        <FieldListGroup list={form.locations}>
          {(url) => <TextInput field={url} submitted={submitted} type="url" />}
        </FieldListGroup>
        <FieldListGroup list={form.identifiers}>
          {(identifier) => <IdentifierInputs entry={identifier} submitted={submitted} />}
        </FieldListGroup>

        <fieldset className="relations">
          <legend>Relationships</legend>
          <MultiChoiceInput field={form.endorsed_schemes} submitted={submitted} />
          <MultiChoiceInput field={form.originators} submitted={submitted} />
        </fieldset>
      </EditForm>
    </>
  );
}
