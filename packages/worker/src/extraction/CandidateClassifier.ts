import { countWords } from "@rebus-eval/core";
import { DEFAULT_LEXICON, EXTRACTION_CONSTANTS, ExtractionLexicon, WordBounds } from "./constants";
import { wholeWordRegex } from "./phrases";

/**
 * Decides whether a span reads like an idiom or like the model talking about the picture.
 * Stateless apart from the compiled lexicon.
 */
export class CandidateClassifier {
  private readonly descriptionRe: RegExp;

  constructor(lexicon: Pick<ExtractionLexicon, "descriptionMarkers"> = DEFAULT_LEXICON) {
    this.descriptionRe = wholeWordRegex(lexicon.descriptionMarkers);
  }

  isDescription(text: string): boolean {
    const trimmed = (text || "").trim();
    if (!trimmed) return true;
    if (this.descriptionRe.test(trimmed)) return true;
    // A lone capitalised word is usually a label read off the image ("EDITION").
    return countWords(trimmed) === 1 && /\p{L}/u.test(trimmed) && trimmed === trimmed.toUpperCase();
  }

  isPlausibleAnswer(text: string, bounds: WordBounds = EXTRACTION_CONSTANTS.DEFAULT_WORD_BOUNDS): boolean {
    const trimmed = (text || "").trim();
    if (trimmed.length < EXTRACTION_CONSTANTS.MIN_ANSWER_CHARS) return false;
    if (trimmed.length > EXTRACTION_CONSTANTS.MAX_ANSWER_CHARS) return false;
    const words = countWords(trimmed);
    if (words < bounds.minWords || words > bounds.maxWords) return false;
    if (words === 1 && trimmed.length < EXTRACTION_CONSTANTS.MIN_SINGLE_WORD_CHARS) return false;
    return !this.isDescription(trimmed);
  }
}
