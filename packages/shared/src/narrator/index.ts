export * from './types';
export { NARRATOR_SYSTEM_PROMPT, NARRATOR_USER_PROMPT_TEMPLATE, renderTemplate } from './prompts';
export {
  OpenAiNarrator,
  openAiCompleter,
  buildNarrationPrompt,
  tidyNarration,
  type ChatCompleter,
  type ChatCompletionRequest,
  type ChatCompletionResult,
  type OpenAiNarratorOptions,
} from './openai-narrator';
export { buildLocalSummary, topRow } from './local-summary';
export { explainRanking } from './explain';
