import * as React from 'react';
import { cva, type VariantProps } from 'class-variance-authority';
import { clsx } from 'clsx';

/*
  Section: The titled block every record page is built from.

  Variants:
    - default: top-level section with an <h2> heading
    - nested:  sub-section inside another, with an <h3> heading

  Usage:
    <Section id="versions" header="Versions">...</Section>
*/

const sectionVariants = cva(['record-section'], {
  variants: {
    variant: {
      default: [],
      nested: ['record-subsection'],
    },
  },
  defaultVariants: {
    variant: 'default',
  },
});

export interface SectionProps
  extends Omit<React.HTMLAttributes<HTMLElement>, 'title'>,
    VariantProps<typeof sectionVariants> {
  header: React.ReactNode;
}

export function Section({ className, variant, header, children, ...props }: SectionProps) {
  const Heading = variant === 'nested' ? 'h3' : 'h2';
  return (
    <section className={clsx(sectionVariants({ variant }), className)} {...props}>
      <Heading>{header}</Heading>
      {children}
    </section>
  );
}
