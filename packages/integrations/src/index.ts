/**
 * @vetqueue/integrations
 *
 * Adapters for external collaborators of the triage chain and the factory
 * that wires clinic services from environment config.
 */
export {
  OpenAIClient,
  OpenAIReasoningService,
  createOpenAIClient,
  createOpenAIReasoningService,
  isRetryableOpenAIError,
  TRIAGE_COMPLETION_SETTINGS,
  type OpenAIClientConfig,
  type ChatMessage,
  type ChatCompletionOptions,
} from './openai.js';

export { loadPatternLibrary, SYMPTOM_PATTERNS_FILE, PATTERN_ASSESSMENTS_FILE } from './pattern-library.js';

export {
  createTriageClients,
  createClinicServices,
  type ClientName,
  type TriageClients,
  type ClinicRepositories,
  type ClinicServices,
  type ClinicServicesOptions,
} from './clients-factory.js';
