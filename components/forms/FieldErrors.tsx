import * as React from 'react';
import type { FieldErrorList } from '../../lib/forms';
import { cleanErrorList } from '../../lib/messages';

export interface FieldErrorsProps {
  /** Id of the control the messages describe. */
  fieldId: string;
  errors: FieldErrorList;
}

export function fieldErrorIds(fieldId: string, errors: FieldErrorList): string[] {
  return cleanErrorList(errors).map((_, i) => `${fieldId}-error-${i}`);
}

export function FieldErrors({ fieldId, errors }: FieldErrorsProps) {
  const messages = cleanErrorList(errors);
  if (messages.length === 0) return null;

  return (
    <>
      {messages.map((message, i) => (
        <div key={message} id={`${fieldId}-error-${i}`} className="invalid-feedback">
          {message}
        </div>
      ))}
    </>
  );
}
