import type { DetectionResult, SessionDetails } from '../types';
import { startSession } from '../session/agriSession';
import { MenuDispatcher } from '../session/menuDispatcher';
import type { AppConfig } from './env';
import { AgriToolbox, createHttpTools } from './agriToolbox';
import { detectSubject, loadImage } from './detectionService';
import type { ImageClassifier } from './detectionService';
import { createGeminiClassifier, generateBriefAssessment, getAiClient, openConversationChannel } from './geminiService';
import { createGroqClassifier } from './groqService';

/** What the terminal UI needs from the outside world. */
export interface AssistantServices {
  detect(imagePath: string): Promise<DetectionResult>;
  assess(detection: DetectionResult): Promise<string>;
  openSession(detection: DetectionResult, details: SessionDetails): Promise<MenuDispatcher>;
}

export const createAssistantServices = (config: AppConfig): AssistantServices => {
  const ai = getAiClient(config.googleApiKey);
  const classifier: ImageClassifier = config.classifier.provider === 'gemini'
    ? createGeminiClassifier(ai, config.classifier.model)
    : createGroqClassifier({ apiKey: config.classifier.apiKey, model: config.classifier.model });
  const toolbox = new AgriToolbox(createHttpTools(config.serperApiKey), config.toolPolicy);

  return {
    detect: async imagePath => detectSubject(await loadImage(imagePath), classifier),
    assess: detection => generateBriefAssessment(ai, config.geminiModel, detection),
    openSession: async (detection, details) => {
      const session = await startSession(detection, details, toolbox, instruction =>
        openConversationChannel(ai, config.geminiModel, instruction)
      );
      return new MenuDispatcher(session, toolbox);
    },
  };
};
