import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { DetectionResult, EncodedImage } from '../types';
import { buildDetectionResult, errorDetection } from '../lib/detectionParser';
import { DETECTION_PROMPT } from '../lib/prompts';
import { describeError } from '../lib/errors';

export interface ImageClassifier {
  readonly name: string;
  classify(image: EncodedImage, prompt: string): Promise<string>;
}

const MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
};

export const mimeTypeFor = (path: string): string => MIME_TYPES[extname(path).toLowerCase()] ?? 'image/jpeg';

export const encodeImage = (bytes: Uint8Array, mimeType: string): EncodedImage => ({
  mimeType,
  base64: Buffer.from(bytes).toString('base64'),
});

export const loadImage = async (path: string): Promise<EncodedImage> =>
  encodeImage(await readFile(path), mimeTypeFor(path));

/** Never rejects: a classifier failure yields the error sentinel result. */
export const detectSubject = async (image: EncodedImage, classifier: ImageClassifier): Promise<DetectionResult> => {
  try {
    const analysis = await classifier.classify(image, DETECTION_PROMPT);
    return buildDetectionResult(analysis);
  } catch (error) {
    console.error(`Detection error (${classifier.name}):`, error);
    return errorDetection(`API request failed: ${describeError(error)}`);
  }
};
