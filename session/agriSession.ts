import type { DetectionResult, InfestationLevel, LocationContext, SessionDetails } from '../types';
import { buildSessionInstruction } from '../lib/prompts';
import type { PromptContext } from '../lib/prompts';
import type { ConversationChannel } from '../services/geminiService';
import type { AgriToolbox } from '../services/agriToolbox';

export type ChannelFactory = (systemInstruction: string) => ConversationChannel;

/**
 * Everything known about one diagnosis session. The conversation channel is
 * opened once in the constructor and is reachable only through ask().
 */
export class AgriSession {
  readonly plantType: string;
  readonly infestationLevel: InfestationLevel;
  private readonly channel: ConversationChannel;

  constructor(
    readonly detection: DetectionResult,
    readonly location: LocationContext,
    details: Pick<SessionDetails, 'plantType' | 'infestationLevel'>,
    openChannel: ChannelFactory
  ) {
    this.plantType = details.plantType;
    this.infestationLevel = details.infestationLevel;
    this.channel = openChannel(buildSessionInstruction(this.promptContext));
  }

  get zipcode(): string {
    return this.location.postalCode;
  }

  get promptContext(): PromptContext {
    return {
      issue: this.detection.issue,
      severity: this.detection.severity,
      plantType: this.plantType,
      infestationLevel: this.infestationLevel,
      zipcode: this.zipcode,
    };
  }

  ask(message: string): Promise<string> {
    return this.channel.send(message);
  }
}

/** Fetches weather, then soil, for the zip code and opens the session. */
export async function startSession(
  detection: DetectionResult,
  details: SessionDetails,
  toolbox: AgriToolbox,
  openChannel: ChannelFactory
): Promise<AgriSession> {
  const weather = await toolbox.getWeather(details.zipcode);
  const soil = await toolbox.getSoil(details.zipcode);
  const location: LocationContext = Object.freeze({ postalCode: details.zipcode, weather, soil });
  return new AgriSession(detection, location, details, openChannel);
}
