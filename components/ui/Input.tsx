import * as React from 'react';
import { clsx } from 'clsx';
import type { FieldErrorList } from '../../lib/forms';
import { FieldErrors, fieldErrorIds } from '../forms/FieldErrors';
import { formStateClass } from '../forms/form-state';

/*
  Input: Labelled text control for catalog edit forms.
  The form-state class comes from the shared macro, so a control with
  errors is marked is-invalid and, after a post-back, a clean one is-valid.

  Usage:
    <Input id="title" name="title" label="Name of metadata scheme" />
    <Input id="issued" name="issued" type="date" errors={['Please provide the date in yyyy-mm-dd format.']} submitted />
*/

interface ControlChrome {
  id: string;
  label?: string;
  hint?: string;
  errors?: FieldErrorList;
  submitted?: boolean;
  containerClassName?: string;
}

function describedBy(id: string, hint: string | undefined, errors: FieldErrorList): string | undefined {
  const ids = fieldErrorIds(id, errors);
  if (hint && ids.length === 0) ids.push(`${id}-hint`);
  return ids.length > 0 ? ids.join(' ') : undefined;
}

function Chrome({
  id,
  label,
  hint,
  errors,
  required,
  containerClassName,
  children,
}: Omit<ControlChrome, 'submitted'> & { required?: boolean; errors: FieldErrorList; children: React.ReactNode }) {
  return (
    <div className={clsx('form-group', containerClassName)}>
      {label && (
        <label htmlFor={id}>
          {label}
          {required && (
            <span className="required-marker" title="required">
              *
            </span>
          )}
        </label>
      )}

      {children}

      {hint && errors.length === 0 && (
        <small id={`${id}-hint`} className="form-text text-muted">
          {hint}
        </small>
      )}

      <FieldErrors fieldId={id} errors={errors} />
    </div>
  );
}

export interface InputProps
  extends Omit<React.InputHTMLAttributes<HTMLInputElement>, 'size' | 'id'>,
    ControlChrome {}

export const Input = React.forwardRef<HTMLInputElement, InputProps>(
  (
    { className, containerClassName, label, hint, errors = [], submitted = false, id, required, ...props },
    ref
  ) => {
    const hasError = errors.length > 0;
    return (
      <Chrome
        id={id}
        label={label}
        hint={hint}
        errors={errors}
        required={required}
        containerClassName={containerClassName}
      >
        <input
          ref={ref}
          id={id}
          required={required}
          aria-describedby={describedBy(id, hint, errors)}
          aria-invalid={hasError || undefined}
          className={clsx(formStateClass({ errors }, submitted), className)}
          {...props}
        />
      </Chrome>
    );
  }
);

Input.displayName = 'Input';

/*
  Textarea: Multi-line input, same chrome as Input.
*/
export interface TextareaProps
  extends Omit<React.TextareaHTMLAttributes<HTMLTextAreaElement>, 'id'>,
    ControlChrome {}

export const Textarea = React.forwardRef<HTMLTextAreaElement, TextareaProps>(
  (
    { className, containerClassName, label, hint, errors = [], submitted = false, id, rows = 4, required, ...props },
    ref
  ) => {
    const hasError = errors.length > 0;
    return (
      <Chrome
        id={id}
        label={label}
        hint={hint}
        errors={errors}
        required={required}
        containerClassName={containerClassName}
      >
        <textarea
          ref={ref}
          id={id}
          rows={rows}
          required={required}
          aria-describedby={describedBy(id, hint, errors)}
          aria-invalid={hasError || undefined}
          className={clsx(formStateClass({ errors }, submitted), className)}
          {...props}
        />
      </Chrome>
    );
  }
);

Textarea.displayName = 'Textarea';

/*
  Select: Single or multiple choice from a fixed list.
*/
export interface SelectProps
  extends Omit<React.SelectHTMLAttributes<HTMLSelectElement>, 'id'>,
    ControlChrome {
  options: ReadonlyArray<{ value: string; label: string }>;
}

export const Select = React.forwardRef<HTMLSelectElement, SelectProps>(
  (
    { className, containerClassName, label, hint, errors = [], submitted = false, id, options, required, ...props },
    ref
  ) => {
    const hasError = errors.length > 0;
    return (
      <Chrome
        id={id}
        label={label}
        hint={hint}
        errors={errors}
        required={required}
        containerClassName={containerClassName}
      >
        <select
          ref={ref}
          id={id}
          required={required}
          aria-describedby={describedBy(id, hint, errors)}
          aria-invalid={hasError || undefined}
          className={clsx(formStateClass({ errors }, submitted, 'custom-select'), className)}
          {...props}
        >
          {options.map((option) => (
            <option key={option.value} value={option.value}>
              {option.label}
            </option>
          ))}
        </select>
      </Chrome>
    );
  }
);

Select.displayName = 'Select';
