/**
 * Masked single-line input for secrets.
 */

import React, { useCallback, useState } from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';

const CLICKUP_PURPLE = '#7b68ee';

export interface KeyPromptProps {
  label: string;
  onSubmit: (value: string) => void;
}

export function KeyPrompt({ label, onSubmit }: KeyPromptProps) {
  const [value, setValue] = useState('');

  const handleSubmit = useCallback((submitted: string) => {
    onSubmit(submitted.trim());
  }, [onSubmit]);

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor={CLICKUP_PURPLE} paddingX={1}>
        <Text color={CLICKUP_PURPLE}>{label} </Text>
        <TextInput value={value} onChange={setValue} onSubmit={handleSubmit} mask="*" />
      </Box>
      <Box paddingLeft={2}>
        <Text dimColor>Enter=save | Ctrl+C=cancel</Text>
      </Box>
    </Box>
  );
}
