import type { CelebrityIdentification, DetectionResult, Severity, SubjectKind } from '../types';

interface IdentificationRule {
  field: string;
  priority: number; // lower wins
  placeholders: readonly string[];
}

// Disease name outranks species whenever both are present.
export const IDENTIFICATION_RULES: readonly IdentificationRule[] = [
  { field: 'disease name', priority: 0, placeholders: ['n/a', 'none', 'unknown'] },
  { field: 'plant species', priority: 1, placeholders: ['unknown'] },
  { field: 'insect species', priority: 1, placeholders: ['unknown'] },
];

const SEVERITY_LEVELS: readonly Exclude<Severity, 'Unknown'>[] = ['Mild', 'Moderate', 'Severe'];

export const UNIDENTIFIED = 'Unidentified';

export const isErrorText = (content: string): boolean =>
  !content || content.startsWith('Error') || content.startsWith('API');

/**
 * Reads the value of a `- **Field**: value` (or `**Field**: value`) line.
 * Returns undefined when the line is not that bullet.
 */
export const readBulletValue = (line: string, field: string): string | undefined => {
  const lower = line.toLowerCase();
  const name = field.toLowerCase();
  if (!lower.startsWith(`- **${name}**:`) && !lower.startsWith(`**${name}**:`)) return undefined;
  return line.slice(line.indexOf(':') + 1).trim();
};

/** First line carrying the bullet, whatever its value. */
export const readBulletField = (content: string, field: string): string | undefined => {
  for (const line of content.split(/\r?\n/)) {
    const value = readBulletValue(line, field);
    if (value !== undefined) return value;
  }
  return undefined;
};

const isPlaceholder = (value: string, rule: IdentificationRule) =>
  value === '' || rule.placeholders.includes(value.toLowerCase());

export const extractPrimaryIdentification = (content: string): string => {
  if (isErrorText(content)) return 'Error';

  let best: { priority: number; value: string } | undefined;
  for (const line of content.split(/\r?\n/)) {
    for (const rule of IDENTIFICATION_RULES) {
      const value = readBulletValue(line, rule.field);
      if (value === undefined || isPlaceholder(value, rule)) continue;
      if (!best || rule.priority < best.priority) best = { priority: rule.priority, value };
    }
  }
  return best?.value ?? UNIDENTIFIED;
};

export const extractSubjectKind = (content: string): SubjectKind => {
  if (isErrorText(content)) return 'error';
  const plain = content.toLowerCase().replace(/\*/g, '');
  if (plain.includes('plant species:') || plain.includes('health status:')) return 'plant';
  if (plain.includes('insect species:') || plain.includes('classification:')) return 'pest';
  return 'unknown';
};

export const extractSeverity = (content: string): Severity => {
  const value = readBulletField(content, 'severity level');
  if (!value) return 'Unknown';
  // An echoed template ("Mild / Moderate / Severe") names more than one level.
  const named = SEVERITY_LEVELS.filter(level => new RegExp(`\\b${level}\\b`, 'i').test(value));
  return named.length === 1 ? named[0] : 'Unknown';
};

export const extractPlantType = (content: string): string => {
  for (const line of content.split(/\r?\n/)) {
    const value = readBulletValue(line, 'plant species');
    if (value && value.toLowerCase() !== 'unknown') return value;
  }
  return 'Unknown';
};

export const buildDetectionResult = (rawAnalysis: string): DetectionResult => {
  const subjectKind = extractSubjectKind(rawAnalysis);
  return {
    issue: extractPrimaryIdentification(rawAnalysis),
    severity: subjectKind === 'error' ? 'Unknown' : extractSeverity(rawAnalysis),
    plantType: subjectKind === 'error' ? 'Unknown' : extractPlantType(rawAnalysis),
    subjectKind,
    rawAnalysis,
  };
};

export const errorDetection = (message: string): DetectionResult => ({
  issue: 'Error',
  severity: 'Unknown',
  plantType: 'Unknown',
  subjectKind: 'error',
  rawAnalysis: message,
});

// --- Celebrity identification ---

export const buildCelebrityIdentification = (rawAnalysis: string): CelebrityIdentification => {
  let name = 'Unknown';
  for (const line of rawAnalysis.split(/\r?\n/)) {
    const value = readBulletValue(line, 'full name');
    if (value && value !== 'Unknown') {
      name = value;
      break;
    }
  }
  return {
    rawAnalysis,
    name,
    profession: readBulletField(rawAnalysis, 'profession') ?? 'Unknown',
    faceDetected: readBulletField(rawAnalysis, 'face detected')?.toLowerCase() === 'yes',
  };
};
