import {
  DateInput,
  FieldListGroup,
  HiddenInput,
  IdentifierInputs,
  LocationInputs,
  NamespaceInputs,
  SampleInputs,
  TextAreaInput,
  TextInput,
} from '../../../components/forms/fields';
import { EditForm, type EditPageProps } from '../../../components/forms/EditForm';
import { PageHeader } from '../../../components/ui';
import type { VersionForm } from '../../../lib/forms';
import type { Series } from '../../../lib/records';

export interface VersionEditPageProps extends EditPageProps<VersionForm> {
  series: Series;
  /** Display name of the record the version belongs to. */
  recordName: string;
}

export function versionHeading(number: string, recordName: string): string {
  return number ? `Edit version ${number} of ${recordName}` : `Add version to ${recordName}`;
}

export default function VersionEditPage({ form, series, docId, recordName, urls }: VersionEditPageProps) {
  const { submitted } = form;
  const previous = form.number_old.data;

  return (
    <>
      <PageHeader title={versionHeading(previous, recordName)} />
      <EditForm
        action={previous ? urls.editVersion(series, docId, previous) : urls.addVersion(series, docId)}
        form={form}
        cancelHref={urls.display(series, docId)}
      >
        <TextInput field={form.number} submitted={submitted} />
        <HiddenInput field={form.number_old} />

        <div className="form-row">
          <DateInput field={form.issued} submitted={submitted} />
          <DateInput field={form.available} submitted={submitted} />
          <DateInput field={form.valid_from} submitted={submitted} />
          <DateInput field={form.valid_to} submitted={submitted} />
        </div>
        <TextAreaInput field={form.note} submitted={submitted} rows={3} />

        <FieldListGroup list={form.locations}>
          {(location) => <LocationInputs entry={location} submitted={submitted} />}
        </FieldListGroup>
        <FieldListGroup list={form.identifiers}>
          {(identifier) => <IdentifierInputs entry={identifier} submitted={submitted} />}
        </FieldListGroup>
        <FieldListGroup list={form.namespaces}>
          {(namespace) => <NamespaceInputs entry={namespace} submitted={submitted} />}
        </FieldListGroup>
        <FieldListGroup list={form.samples}>
          {(sample) => <SampleInputs entry={sample} submitted={submitted} />}
        </FieldListGroup>
      </EditForm>
    </>
  );
}
