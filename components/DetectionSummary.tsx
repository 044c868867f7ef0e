import React from 'react';
import { Box, Text } from 'ink';
import type { DetectionResult } from '../types';

interface DetectionSummaryProps {
  detection: DetectionResult;
  assessment?: string;
}

const DetectionSummary: React.FC<DetectionSummaryProps> = ({ detection, assessment }) => {
  const plantLabel = detection.plantType !== 'Unknown' ? detection.plantType : 'Not identified';

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="green" paddingX={1}>
      <Text bold color="green">✓ Detection Results</Text>
      <Text>Issue: {detection.issue}</Text>
      <Text>Severity: {detection.severity}</Text>
      <Text>Plant: {plantLabel}</Text>
      {assessment ? <Text color="yellow">⚠️ {assessment}</Text> : null}
    </Box>
  );
};

export default DetectionSummary;
