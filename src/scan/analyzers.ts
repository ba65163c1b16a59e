import { patternAnalyzer } from "./patternAnalyzer.js";
import { structuralAnalyzer } from "./structuralAnalyzer.js";
import type { Analyzer } from "./analyzer.js";
import type { Language } from "../types.js";

const STRUCTURAL_LANGUAGES: ReadonlySet<Language> = new Set(["javascript"]);

export function selectAnalyzer(language: Language): Analyzer {
  return STRUCTURAL_LANGUAGES.has(language) ? structuralAnalyzer : patternAnalyzer;
}
