#!/usr/bin/env tsx
import { config } from 'dotenv';
config();

import React from 'react';
import { render } from 'ink';
import AgriAssistant from './pages/AgriAssistant';
import { ConfigError, describeError } from './lib/errors';
import { DEFAULT_GROQ_MODEL, loadConfig, requireEnv } from './services/env';
import { createAssistantServices } from './services/assistantServices';
import { loadImage } from './services/detectionService';
import { identifyCelebrity } from './services/groqService';

async function runCelebrity(imagePath: string): Promise<void> {
  const apiKey = requireEnv('GROQ_API_KEY');
  const image = await loadImage(imagePath);
  const result = await identifyCelebrity(image, { apiKey, model: process.env.GROQ_MODEL || DEFAULT_GROQ_MODEL });
  console.log(result.rawAnalysis);
  console.log('');
  console.log(`Name: ${result.name}`);
  console.log(`Profession: ${result.profession}`);
  console.log(`Face detected: ${result.faceDetected ? 'yes' : 'no'}`);
}

async function runAssistant(imagePath?: string): Promise<void> {
  const services = createAssistantServices(loadConfig());
  const app = render(<AgriAssistant services={services} initialImagePath={imagePath} />);
  await app.waitUntilExit();
}

async function main(argv: string[]): Promise<void> {
  const [command, ...rest] = argv;
  if (command === 'celebrity') {
    if (!rest[0]) {
      console.error('Usage: agri-assist celebrity <image-path>');
      process.exitCode = 1;
      return;
    }
    await runCelebrity(rest[0]);
    return;
  }
  await runAssistant(command);
}

main(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error(`agri-assist failed: ${describeError(error)}`);
  }
  process.exit(1);
});
