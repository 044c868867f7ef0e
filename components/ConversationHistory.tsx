import React from 'react';
import { Box, Text } from 'ink';
import type { ConversationEntry } from '../types';

interface ConversationHistoryProps {
  entries: readonly ConversationEntry[];
}

/** Every label is listed; only the newest answer is expanded. */
const ConversationHistory: React.FC<ConversationHistoryProps> = ({ entries }) => {
  if (entries.length === 0) return null;

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text bold>📜 Conversation History</Text>
      {entries.map((entry, index) => (
        <Box key={index} flexDirection="column">
          <Text color="cyan">💬 {entry.label}</Text>
          {index === entries.length - 1 ? <Text>{entry.answer}</Text> : null}
        </Box>
      ))}
    </Box>
  );
};

export default ConversationHistory;
