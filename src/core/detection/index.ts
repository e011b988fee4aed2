/**
 * Detection module - guesses the dialect of a snippet when the caller
 * does not name one
 */

export {
  guessLanguage,
  scoreLanguages,
  loadLanguageFeatures,
  compileFeatures,
  type LanguageFeatures,
  type LanguageScore,
  type CompiledFeatures,
} from "./language-guess.js";
