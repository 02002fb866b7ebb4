import { cva } from 'class-variance-authority';
import { clsx } from 'clsx';
import type { FieldErrorList } from '../../lib/forms';

/*
  Form-state classes shared by every control. A field with errors is
  invalid; once the form has been posted back, a field without errors is
  shown as valid; before that it carries no state class at all.
*/

export type FormState = 'pristine' | 'valid' | 'invalid';

export const formStateVariants = cva([], {
  variants: {
    state: {
      pristine: [],
      valid: ['is-valid'],
      invalid: ['is-invalid'],
    },
  },
  defaultVariants: {
    state: 'pristine',
  },
});

export function formState(field: { errors: FieldErrorList }, submitted: boolean): FormState {
  if (field.errors.length > 0) return 'invalid';
  return submitted ? 'valid' : 'pristine';
}

export function formStateClass(
  field: { errors: FieldErrorList },
  submitted: boolean,
  base = 'form-control'
): string {
  return clsx(base, formStateVariants({ state: formState(field, submitted) }));
}
