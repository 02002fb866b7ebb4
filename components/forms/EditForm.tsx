import * as React from 'react';
import { countFormErrors, type TextField } from '../../lib/forms';
import { saveErrorSummary } from '../../lib/messages';
import { SERIES, type Series } from '../../lib/records';
import type { UrlHelper } from '../../services/routing';
import { Button, ButtonLink } from '../ui';
import { HiddenInput } from './fields';

export interface EditFormProps {
  action: string;
  form: { csrf_token?: TextField; old_relations?: TextField };
  /** Where "Cancel" leads; omitted for records that do not exist yet. */
  cancelHref?: string;
  children: React.ReactNode;
}

export function FormErrorSummary({ form }: { form: object }) {
  const count = countFormErrors(form);
  if (count === 0) return null;
  return (
    <div className="alert alert-danger" role="alert">
      {saveErrorSummary(count)}
    </div>
  );
}

export function EditForm({ action, form, cancelHref, children }: EditFormProps) {
  return (
    <>
      <FormErrorSummary form={form} />
      <form method="post" action={action} className="edit-form" noValidate>
        <HiddenInput field={form.csrf_token} />
        <HiddenInput field={form.old_relations} />
        {children}
        <div className="form-actions">
          <Button type="submit" variant="primary">
            Save changes
          </Button>
          {cancelHref && (
            <ButtonLink href={cancelHref} variant="secondary">
              Cancel
            </ButtonLink>
          )}
        </div>
      </form>
    </>
  );
}

export interface EditPageProps<F> {
  form: F;
  /** 0 when the record is being created. */
  docId: number;
  urls: UrlHelper;
}

export function editHeading(series: Series, docId: number): string {
  return docId > 0 ? `Edit ${SERIES[series]}` : `Add new ${SERIES[series]}`;
}
