/**
 * Yes/no confirmation for destructive commands.
 */

import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';

const WARNING_YELLOW = '#ffb300';

export interface ConfirmPromptProps {
  message: string;
  onConfirm: (confirmed: boolean) => void;
}

export function ConfirmPrompt({ message, onConfirm }: ConfirmPromptProps) {
  // Enter alone cancels
  const [selected, setSelected] = useState<'yes' | 'no'>('no');

  useInput((input, key) => {
    if (key.leftArrow || key.rightArrow || input === 'h' || input === 'l') {
      setSelected((prev) => (prev === 'yes' ? 'no' : 'yes'));
    } else if (key.return) {
      onConfirm(selected === 'yes');
    } else if (input === 'y' || input === 'Y') {
      onConfirm(true);
    } else if (input === 'n' || input === 'N' || key.escape) {
      onConfirm(false);
    }
  });

  return (
    <Box flexDirection="column" borderStyle="round" borderColor={WARNING_YELLOW} paddingX={2}>
      <Text color={WARNING_YELLOW} bold>{message}</Text>
      <Box marginTop={1}>
        <Box marginRight={2}>
          <Text color={selected === 'yes' ? 'red' : 'gray'} bold={selected === 'yes'} inverse={selected === 'yes'}>
            {'  [Y] Yes  '}
          </Text>
        </Box>
        <Text color={selected === 'no' ? 'green' : 'gray'} bold={selected === 'no'} inverse={selected === 'no'}>
          {'  [N] No  '}
        </Text>
      </Box>
      <Text color="gray" dimColor>Y=confirm | N/Esc=cancel | ←→ select | Enter=choose</Text>
    </Box>
  );
}
