import React, { useEffect, useRef, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import TextInput from 'ink-text-input';
import Spinner from 'ink-spinner';
import { AssistantStage } from '../types';
import type { ConversationEntry, DetectionResult, SessionDetails } from '../types';
import { describeError } from '../lib/errors';
import { ConversationLog } from '../session/conversationLog';
import type { MenuDispatcher, MenuSelector } from '../session/menuDispatcher';
import type { AssistantServices } from '../services/assistantServices';
import DetectionSummary from '../components/DetectionSummary';
import DetailsForm from '../components/DetailsForm';
import MenuTabs from '../components/MenuTabs';
import ConversationHistory from '../components/ConversationHistory';

interface AgriAssistantProps {
  services: AssistantServices;
  initialImagePath?: string;
}

const Busy: React.FC<{ label: string }> = ({ label }) => (
  <Box marginTop={1}>
    <Text color="green"><Spinner type="dots" /></Text>
    <Text> {label}</Text>
  </Box>
);

const AgriAssistant: React.FC<AgriAssistantProps> = ({ services, initialImagePath }) => {
  const { exit } = useApp();
  const [stage, setStage] = useState<AssistantStage>(AssistantStage.UPLOAD);
  const [imagePath, setImagePath] = useState(initialImagePath ?? '');
  const [error, setError] = useState<string | null>(null);
  const [detection, setDetection] = useState<DetectionResult | null>(null);
  const [assessment, setAssessment] = useState('');
  const [treatment, setTreatment] = useState('');
  const [history, setHistory] = useState<readonly ConversationEntry[]>([]);
  const [busyLabel, setBusyLabel] = useState<string | null>(null);

  const dispatcherRef = useRef<MenuDispatcher | null>(null);
  const logRef = useRef(new ConversationLog());

  const reset = () => {
    dispatcherRef.current = null;
    logRef.current = new ConversationLog();
    setDetection(null);
    setAssessment('');
    setTreatment('');
    setHistory([]);
    setImagePath('');
    setError(null);
    setStage(AssistantStage.UPLOAD);
  };

  const handleAnalyze = async (path: string) => {
    const trimmed = path.trim();
    if (!trimmed) return;
    setError(null);
    setStage(AssistantStage.ANALYZING_IMAGE);
    try {
      const result = await services.detect(trimmed);
      if (result.subjectKind === 'error') {
        setError(result.rawAnalysis);
        setStage(AssistantStage.UPLOAD);
        return;
      }
      setDetection(result);
      setAssessment(await services.assess(result));
      setStage(AssistantStage.DETAILS);
    } catch (e) {
      setError(`Could not read image: ${describeError(e)}`);
      setStage(AssistantStage.UPLOAD);
    }
  };

  const handleDetails = async (details: SessionDetails) => {
    if (!detection) return;
    setStage(AssistantStage.GENERATING_PLAN);
    try {
      const dispatcher = await services.openSession(detection, details);
      dispatcherRef.current = dispatcher;
      setTreatment(await dispatcher.recommendTreatment());
      setStage(AssistantStage.RECOMMENDATIONS);
    } catch (e) {
      console.error('Session start failed:', e);
      setError(`Could not start the session: ${describeError(e)}`);
      setStage(AssistantStage.DETAILS);
    }
  };

  const handleSelect = async (selector: MenuSelector) => {
    const dispatcher = dispatcherRef.current;
    if (!dispatcher) return;
    setBusyLabel(typeof selector === 'object' ? 'Thinking...' : 'Preparing answer...');
    await dispatcher.dispatch(selector, logRef.current);
    setHistory(logRef.current.entries());
    setBusyLabel(null);
  };

  useEffect(() => {
    if (initialImagePath) void handleAnalyze(initialImagePath);
  }, []);

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text bold color="green">🌱 AgriAssist: Plant & Pest Diagnosis</Text>

      {stage === AssistantStage.UPLOAD && (
        <Box flexDirection="column" marginTop={1}>
          <Text>Path to a photo of the plant or pest:</Text>
          <Box>
            <Text color="green">› </Text>
            <TextInput value={imagePath} onChange={setImagePath} onSubmit={path => void handleAnalyze(path)} />
          </Box>
        </Box>
      )}

      {stage === AssistantStage.ANALYZING_IMAGE && <Busy label="Analyzing image..." />}

      {detection && stage !== AssistantStage.UPLOAD && stage !== AssistantStage.ANALYZING_IMAGE && (
        <Box marginTop={1}>
          <DetectionSummary detection={detection} assessment={assessment} />
        </Box>
      )}

      {stage === AssistantStage.DETAILS && detection && (
        <DetailsForm defaultPlant={detection.plantType} onSubmit={details => void handleDetails(details)} />
      )}

      {stage === AssistantStage.GENERATING_PLAN && <Busy label="Fetching weather and soil data, preparing treatment plan..." />}

      {stage === AssistantStage.RECOMMENDATIONS && (
        <Box flexDirection="column" marginTop={1}>
          <Text>{treatment}</Text>
          <ConversationHistory entries={history} />
          {busyLabel
            ? <Busy label={busyLabel} />
            : <MenuTabs onSelect={selector => void handleSelect(selector)} onReset={reset} onExit={exit} />}
        </Box>
      )}

      {error && <Text color="red">{error}</Text>}
    </Box>
  );
};

export default AgriAssistant;
