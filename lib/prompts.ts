import type { DetectionResult, InfestationLevel } from '../types';

export interface PromptContext {
  issue: string;
  severity: string;
  plantType: string;
  infestationLevel: InfestationLevel;
  zipcode: string;
}

export const DETECTION_PROMPT = `You are an agricultural AI expert specializing in plant health and pest identification.

Analyze this image carefully and determine:

1. Is this a PLANT or an INSECT/PEST?

If it's a PLANT:
- **Plant Species**: [Identify if possible, including scientific name]
- **Health Status**: Healthy or Diseased
- **Disease Name**: [If diseased, provide specific name]
- **Symptoms Observed**: [Describe visible issues: spots, discoloration, wilting, lesions, etc.]
- **Severity Level**: Mild / Moderate / Severe
- **Recommended Treatments**: [List 2-3 treatment options with specific product types]
- **Prevention Measures**: [How to prevent this issue in the future]

If it's an INSECT/PEST:
- **Insect Species**: [Scientific and common name]
- **Classification**: Pest / Beneficial / Pollinator
- **Crops Affected**: [Which plants does it typically attack?]
- **Damage Description**: [What damage does it cause?]
- **Severity Level**: Mild / Moderate / Severe
- **Control Methods**: [List 2-3 control strategies]
- **Natural Predators**: [If applicable]

If the image shows something else or is unclear, respond with "Unable to identify - please provide a clearer image of a plant or insect."`;

export const CELEBRITY_PROMPT = `You are a celebrity recognition expert AI.

Analyze this image step by step:

STEP 1: Describe the visible facial features (age range, facial structure, distinctive features).

STEP 2: Identify the person. ONLY name a celebrity if you are confident (>80% sure); otherwise say "Uncertain".

STEP 3: Provide information in this format:
- **Confidence Level**: High/Medium/Low
- **Face Detected**: Yes/No
- **Full Name**: [Celebrity name or "Unknown" or "Uncertain"]
- **Profession**: [Their primary profession]
- **Nationality**: [Country of origin]
- **Famous For**: [What they are most known for]
- **Alternative Matches**: [Other possible identities if uncertain]

Be precise. Do NOT guess if uncertain.`;

export const buildSessionInstruction = (ctx: PromptContext) => `You are an agricultural advisor helping a grower treat a detected problem.

Session context:
- Pest/Disease: ${ctx.issue}
- Severity: ${ctx.severity}
- Plant: ${ctx.plantType}
- Infestation Level: ${ctx.infestationLevel}
- Location: Zip code ${ctx.zipcode}

Keep answers practical and brief. Recommend product TYPES, not brand names.`;

export const buildBriefAssessmentPrompt = (detection: DetectionResult) => `Provide a VERY BRIEF 1-2 sentence risk assessment for:
Pest/Disease: ${detection.issue}
Severity: ${detection.severity}
Plant: ${detection.plantType}

Format: One sentence about the key risk this poses to the plant. Keep it under 25 words.
Example: "Voracious feeders capable of defoliating plants within days, significantly impacting yield."

Be concise and urgent.`;

export const buildTreatmentPrompt = (ctx: PromptContext, conditions: string) => `**Context:**
- Pest/Disease: ${ctx.issue}
- Plant: ${ctx.plantType}
- Infestation Level: ${ctx.infestationLevel} (use this exact level)
${conditions}

Write ONLY treatment advice (no products yet), in 1-2 short paragraphs:
- Paragraph 1: Treatment approach for ${ctx.infestationLevel} infestation${ctx.infestationLevel === 'low' ? ' (include manual removal as the first option)' : ''}
- Paragraph 2: Application method based on the soil and weather above`;

export const buildProductQueryPrompt = (ctx: PromptContext) => `Based on the treatment advice you just gave for ${ctx.issue} on ${ctx.plantType}, list 2-3 specific organic/natural product search queries (e.g. "neem oil concentrate", "spinosad spray").

Reply with ONLY the queries, one per line, no numbering and no other text.`;

export const buildSoilImpactPrompt = (ctx: PromptContext, soilDisplay: string) => `The user can see their soil information:

${soilDisplay}

Provide analysis in 2 SHORT paragraphs:

Paragraph 1: What this soil type means for ${ctx.plantType} cultivation

Paragraph 2: How soil affects treatment for ${ctx.issue} (application adjustments, pH impact)

Keep it concise - exactly 2 paragraphs.`;

export const buildWeatherTimingPrompt = (ctx: PromptContext, weatherDisplay: string) => `The user can see their weather information:

${weatherDisplay}

Provide timing guidance in 2 short paragraphs:

Paragraph 1: Best application window in the next 3 days for treating ${ctx.issue}

Paragraph 2: Why timing matters (rain, temperature, wind effects)

Keep it BRIEF - exactly 2 paragraphs.`;

export const buildMonitoringPrompt = (ctx: PromptContext) => `Provide monitoring and prevention advice for ${ctx.issue} on ${ctx.plantType}.

Include:
1. How often to check plants
2. Signs of treatment success/failure
3. Prevention tips

Keep it to 2 paragraphs.`;
