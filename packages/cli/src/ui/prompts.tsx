/**
 * Interactive prompts rendered with Ink on stderr, so stdout stays clean
 * for command output.
 */

import React from 'react';
import { render } from 'ink';
import { ConfirmPrompt } from './ConfirmPrompt.js';
import { KeyPrompt } from './KeyPrompt.js';

export interface Prompts {
  /** Resolves to '' when the prompt is cancelled. */
  secret(label: string): Promise<string>;
  confirm(message: string): Promise<boolean>;
}

export const inkPrompts: Prompts = {
  async secret(label) {
    let submitted = '';
    const app = render(
      <KeyPrompt
        label={label}
        onSubmit={(value) => {
          submitted = value;
          app.unmount();
        }}
      />,
      { stdout: process.stderr }
    );
    await app.waitUntilExit();
    return submitted;
  },

  async confirm(message) {
    let confirmed = false;
    const app = render(
      <ConfirmPrompt
        message={message}
        onConfirm={(answer) => {
          confirmed = answer;
          app.unmount();
        }}
      />,
      { stdout: process.stderr }
    );
    await app.waitUntilExit();
    return confirmed;
  },
};
