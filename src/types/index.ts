/** Applicant attributes keyed by name (`email`, `first_name`, `resume_path`, ...). */
export type Profile = Readonly<Record<string, string>>;

export type FieldKind =
  | 'text'
  | 'email'
  | 'tel'
  | 'password'
  | 'url'
  | 'number'
  | 'date'
  | 'textarea'
  | 'select'
  | 'checkbox'
  | 'file';

export interface FormField {
  selector: string;
  kind: FieldKind;
  label: string;
  required: boolean;
  currentValue: string;
  options?: string[];
}

/**
 * What the browser reports for one input, textarea or select before the
 * Page Inspector normalizes it.
 */
export interface RawControl {
  selector: string;
  tag: string;
  type?: string;
  name?: string;
  id?: string;
  labelText?: string;
  ariaLabel?: string;
  placeholder?: string;
  required: boolean;
  value: string;
  checked?: boolean;
  visible: boolean;
  disabled?: boolean;
  options?: string[];
}

export interface PageButton {
  selector: string;
  text: string;
  type?: string;
  visible: boolean;
}

export interface PageSnapshot {
  url: string;
  fields: FormField[];
  buttons: PageButton[];
  hasPasswordField: boolean;
}

export type MappingSource = 'memory' | 'ai' | 'heuristic';

export interface FieldMapping {
  labelKey: string;
  attribute: string;
  confidence: number;
  source: MappingSource;
}

export interface MappedField {
  field: FormField;
  mapping: FieldMapping;
}

export type StepAction = 'navigate' | 'authenticate' | 'open-form' | 'fill' | 'upload' | 'click-submit';

export interface StrategyStep {
  action: StepAction;
  /** Normalized label of the field the step touched. */
  label?: string;
  attribute?: string;
}

export interface Strategy {
  domain: string;
  steps: StrategyStep[];
  fieldMappings: FieldMapping[];
  confidenceBoost: number;
  recordedAt: string;
}

export type AttemptState =
  | 'INIT'
  | 'AUTH'
  | 'ANALYZE'
  | 'MAP'
  | 'FILL'
  | 'UPLOAD'
  | 'SUBMIT'
  | 'RETRYING'
  | 'DONE'
  | 'FAILED';

export type ErrorKind =
  | 'AuthenticationFailure'
  | 'FieldDetectionFailure'
  | 'MappingUnresolved'
  | 'UploadFailure'
  | 'SubmissionFailure'
  | 'AIProviderError'
  | 'BrowserTimeout'
  | 'AttemptCancelled'
  | 'UnexpectedError';

export interface FailureRecord {
  recordedAt: string;
  state: AttemptState;
  errorKind: ErrorKind;
  message: string;
  url?: string;
}

export interface DomainMemory {
  successfulPatterns: Strategy[];
  failedPatterns: FailureRecord[];
  fieldMappings: Record<string, FieldMapping>;
  confidenceBoost: number;
}

export interface AttemptError {
  state: AttemptState;
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  at: string;
}

export interface ApplicationAttempt {
  attemptId: string;
  jobUrl: string;
  domain: string;
  state: AttemptState;
  retryCount: number;
  errorHistory: AttemptError[];
  strategyUsed?: Strategy;
  transitions: AttemptState[];
}

export interface AttemptOutcome {
  success: boolean;
  attempt: ApplicationAttempt;
  diagnostic?: {
    state: AttemptState;
    errorKind: ErrorKind;
    message: string;
  };
}

export type AIProviderName = 'openai' | 'anthropic' | 'gemini' | 'ollama';

export interface AIConfig {
  provider: AIProviderName;
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  timeoutMs: number;
}

export interface BrowserConfig {
  headless: boolean;
  /** seconds */
  implicitWait: number;
  /** seconds */
  pageLoadTimeout: number;
  slowMo: number;
  /** Chrome/Chromium binary; Playwright's own download is used when unset. */
  executablePath?: string;
}

export interface EngineConfig {
  maxRetries: number;
  retryDelayMs: number;
  backoffFactor: number;
  maxRetryDelayMs: number;
  confidenceThreshold: number;
  saveScreenshots: boolean;
}

export interface AgentConfig {
  profile: Profile;
  ai: AIConfig;
  browser: BrowserConfig;
  engine: EngineConfig;
  debug: boolean;
  saveLogs: boolean;
  memoryFile: string;
  logDir: string;
  artifactsDir: string;
}
