import OpenAI from 'openai';
import type { CelebrityIdentification, EncodedImage } from '../types';
import { buildCelebrityIdentification } from '../lib/detectionParser';
import { CELEBRITY_PROMPT } from '../lib/prompts';
import { describeError } from '../lib/errors';
import type { ImageClassifier } from './detectionService';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

interface GroqOptions {
  apiKey: string;
  model: string;
  temperature?: number;
}

/** Groq speaks the OpenAI chat-completions protocol. */
export const getGroqClient = (apiKey: string) =>
  new OpenAI({ apiKey, baseURL: GROQ_BASE_URL, timeout: 30_000, maxRetries: 0 });

/** One vision chat completion: a text instruction plus the image as a data URL. */
export const completeWithImage = async (
  client: OpenAI,
  image: EncodedImage,
  prompt: string,
  { model, temperature = 0.3 }: Omit<GroqOptions, 'apiKey'>
): Promise<string> => {
  const response = await client.chat.completions.create({
    model,
    temperature,
    max_tokens: 1024,
    messages: [
      {
        role: 'user',
        content: [
          { type: 'text', text: prompt },
          { type: 'image_url', image_url: { url: `data:${image.mimeType};base64,${image.base64}` } },
        ],
      },
    ],
  });
  const content = response.choices[0]?.message.content;
  if (content) return content;
  throw new Error('Empty response');
};

export const createGroqClassifier = ({ apiKey, ...options }: GroqOptions): ImageClassifier => {
  const client = getGroqClient(apiKey);
  return {
    name: 'groq',
    classify: (image, prompt) => completeWithImage(client, image, prompt, options),
  };
};

export const identifyCelebrity = async (
  image: EncodedImage,
  { apiKey, model }: Omit<GroqOptions, 'temperature'>
): Promise<CelebrityIdentification> => {
  try {
    const content = await completeWithImage(getGroqClient(apiKey), image, CELEBRITY_PROMPT, { model, temperature: 0.1 });
    return buildCelebrityIdentification(content);
  } catch (error) {
    console.error('Celebrity identification error:', error);
    return { rawAnalysis: `Error analyzing image: ${describeError(error)}`, name: 'Unknown', profession: 'Unknown', faceDetected: false };
  }
};
