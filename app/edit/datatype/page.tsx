import { TextInput } from '../../../components/forms/fields';
import { EditForm, type EditPageProps } from '../../../components/forms/EditForm';
import { PageHeader } from '../../../components/ui';
import type { DatatypeForm } from '../../../lib/forms';

export function datatypeHeading(docId: number): string {
  return docId > 0 ? 'Edit data type' : 'Add new data type';
}

// Data types have no display page of their own, so Cancel goes home.
export default function DatatypeEditPage({ form, docId, urls }: EditPageProps<DatatypeForm>) {
  const { submitted } = form;

  return (
    <>
      <PageHeader title={datatypeHeading(docId)} />
      <EditForm action={urls.editDatatype(docId)} form={form} cancelHref={docId > 0 ? urls.home() : undefined}>
        <TextInput field={form.id} submitted={submitted} />
        <TextInput field={form.label} submitted={submitted} />
      </EditForm>
    </>
  );
}
