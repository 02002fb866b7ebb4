import * as React from 'react';
import { cva } from 'class-variance-authority';
import type { FlashCategory, FlashMessage } from '../lib/messages';

const alertVariants = cva(['alert'], {
  variants: {
    category: {
      error: ['alert-danger'],
      success: ['alert-success'],
      warning: ['alert-warning'],
      info: ['alert-info'],
    } satisfies Record<FlashCategory, string[]>,
  },
});

export function FlashMessages({ messages }: { messages: readonly FlashMessage[] | undefined }) {
  if (!messages || messages.length === 0) return null;
  return (
    <div className="flashed-messages">
      {messages.map((message, i) => (
        <div key={i} className={alertVariants({ category: message.category })} role="alert">
          {message.text}
        </div>
      ))}
    </div>
  );
}
