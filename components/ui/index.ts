export { Button, ButtonLink, buttonVariants } from './Button';
export type { ButtonProps, ButtonLinkProps } from './Button';

export { StatusChip, VersionStatusChip } from './StatusChip';
export type { StatusChipProps, VersionStatusChipProps } from './StatusChip';

export { Section } from './Section';
export type { SectionProps } from './Section';

export { Input, Textarea, Select } from './Input';
export type { InputProps, TextareaProps, SelectProps } from './Input';

export { DataTable } from './DataTable';
export type { DataTableProps, DataTableColumn } from './DataTable';

export { PageHeader } from './PageHeader';
export type { PageHeaderProps } from './PageHeader';
