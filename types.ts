
export type Severity = 'Mild' | 'Moderate' | 'Severe' | 'Unknown';

export type SubjectKind = 'plant' | 'pest' | 'unknown' | 'error';

export type InfestationLevel = 'low' | 'medium' | 'high' | 'unknown';

export enum AssistantStage {
  UPLOAD = 'UPLOAD',
  ANALYZING_IMAGE = 'ANALYZING_IMAGE',
  DETAILS = 'DETAILS',
  GENERATING_PLAN = 'GENERATING_PLAN',
  RECOMMENDATIONS = 'RECOMMENDATIONS'
}

export interface EncodedImage {
  mimeType: string;
  base64: string;
}

export interface DetectionResult {
  readonly issue: string;
  readonly severity: Severity;
  readonly plantType: string;
  readonly subjectKind: SubjectKind;
  readonly rawAnalysis: string; // full markdown returned by the classifier
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

// --- LOCATION TYPES ---
export interface LocationError {
  error: string;
  zipcode: string;
}

export interface ForecastPeriod {
  name: string;
  temperature: number | null;
  shortForecast: string;
}

export interface WeatherReport {
  zipcode: string;
  location: Coordinates & { city: string; state: string };
  current: {
    temperature: number | null;
    temperatureUnit: string;
    windSpeed: string;
    windDirection: string;
    shortForecast: string;
    detailedForecast: string;
  };
  forecast: ForecastPeriod[]; // at most 6 periods
}

export interface SoilProperties {
  soilName: string;
  soilSymbol: string;
  componentName: string;
  soilOrder: string;
  soilSubgroup: string;
  drainageClass: string;
  sandPercent: number | null;
  siltPercent: number | null;
  clayPercent: number | null;
  soilTexture: string;
  ph: number | null;
  organicMatterPercent: number | null;
}

export interface SoilReport {
  zipcode: string;
  location?: Coordinates;
  soilProperties: SoilProperties;
  dataSource: string;
  note?: string; // set when the survey has no coverage here
}

export type WeatherRecord = WeatherReport | LocationError;
export type SoilRecord = SoilReport | LocationError;

export interface LocationContext {
  readonly postalCode: string;
  readonly weather: WeatherRecord;
  readonly soil: SoilRecord;
}

// --- PRODUCT SEARCH ---
export interface ProductLink {
  name: string;
  url: string;
  price?: string;
  rating?: string;
}

export interface SessionDetails {
  plantType: string;
  zipcode: string;
  infestationLevel: InfestationLevel;
}

export interface ConversationEntry {
  readonly label: string;
  readonly answer: string;
}

export interface CelebrityIdentification {
  rawAnalysis: string;
  name: string;
  profession: string;
  faceDetected: boolean;
}

export const isLocationError = (record: WeatherRecord | SoilRecord): record is LocationError =>
  'error' in record;
