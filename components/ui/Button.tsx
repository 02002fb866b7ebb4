import * as React from 'react';
import { cva, type VariantProps } from 'class-variance-authority';
import { clsx } from 'clsx';

const buttonVariants = cva(['btn'], {
  variants: {
    variant: {
      primary: ['btn-primary'],
      secondary: ['btn-outline-secondary'],
    },
    size: {
      sm: ['btn-sm'],
      md: [],
    },
  },
  defaultVariants: {
    variant: 'primary',
    size: 'md',
  },
});

export interface ButtonProps
  extends React.ButtonHTMLAttributes<HTMLButtonElement>,
    VariantProps<typeof buttonVariants> {}

export const Button = React.forwardRef<HTMLButtonElement, ButtonProps>(
  ({ className, variant, size, type = 'button', children, ...props }, ref) => {
    return (
      <button ref={ref} type={type} className={clsx(buttonVariants({ variant, size }), className)} {...props}>
        {children}
      </button>
    );
  }
);

Button.displayName = 'Button';

/*
  ButtonLink: An anchor styled as a button, for navigation such as the
  Edit affordance on record pages.
*/
export interface ButtonLinkProps
  extends React.AnchorHTMLAttributes<HTMLAnchorElement>,
    VariantProps<typeof buttonVariants> {
  href: string;
}

export function ButtonLink({ className, variant, size, children, ...props }: ButtonLinkProps) {
  return (
    <a className={clsx(buttonVariants({ variant, size }), className)} {...props}>
      {children}
    </a>
  );
}

export { buttonVariants };
