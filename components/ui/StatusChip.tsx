import * as React from 'react';
import { cva, type VariantProps } from 'class-variance-authority';
import { clsx } from 'clsx';

/*
  StatusChip: Inline status badge.

  Usage:
    <StatusChip status="active">current</StatusChip>
    <VersionStatusChip status="deprecated on 2020-01-01" />
*/

const chipVariants = cva(['badge'], {
  variants: {
    status: {
      active: ['badge-success'],
      info: ['badge-info'],
      neutral: ['badge-secondary'],
    },
  },
  defaultVariants: {
    status: 'neutral',
  },
});

type StatusVariant = 'active' | 'info' | 'neutral';

export interface StatusChipProps
  extends React.HTMLAttributes<HTMLSpanElement>,
    VariantProps<typeof chipVariants> {
  status?: StatusVariant;
}

export function StatusChip({ className, status = 'neutral', children, ...props }: StatusChipProps) {
  return (
    <span className={clsx(chipVariants({ status }), className)} {...props}>
      {children}
    </span>
  );
}

/*
  VersionStatusChip: Maps the derived version statuses to badge colours.
  Anything beginning "deprecated" is neutral; an empty status renders nothing.
*/
export interface VersionStatusChipProps extends Omit<StatusChipProps, 'status' | 'children'> {
  status: string;
}

function versionVariant(status: string): StatusVariant {
  if (status === 'current') return 'active';
  if (status === 'proposed') return 'info';
  return 'neutral';
}

export function VersionStatusChip({ status, ...props }: VersionStatusChipProps) {
  if (!status) return null;
  return (
    <StatusChip status={versionVariant(status)} {...props}>
      {status}
    </StatusChip>
  );
}
