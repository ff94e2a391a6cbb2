export {
  LocalGlossary,
  GLOSSARY_FALLBACK_ANSWER,
  tokenize,
  loadGlossaryEntries,
  loadStopWords,
  loadDefaultGlossary,
  type GlossaryEntry,
  type GlossaryHit,
} from './local-glossary';
