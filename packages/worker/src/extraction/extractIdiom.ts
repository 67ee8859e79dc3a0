import { CandidateClassifier } from "./CandidateClassifier";
import { CandidateScorer } from "./CandidateScorer";
import { createCleaner } from "./cleanCandidate";
import { DEFAULT_LEXICON, EXTRACTION_CONSTANTS, ExtractionLexicon } from "./constants";
import { AnswerExtractor, ExtractionContext } from "./extractors/AnswerExtractor";
import { BracketMarkerExtractor } from "./extractors/BracketMarkerExtractor";
import { FallbackExtractor, fallbackText } from "./extractors/FallbackExtractor";
import { FirstSentenceExtractor } from "./extractors/FirstSentenceExtractor";
import { KeywordIntroExtractor } from "./extractors/KeywordIntroExtractor";
import { NgramScanExtractor } from "./extractors/NgramScanExtractor";
import { QuotedTextExtractor } from "./extractors/QuotedTextExtractor";
import { StandaloneLineExtractor } from "./extractors/StandaloneLineExtractor";
import { ExtractionOutcome, ExtractionTrace, StageTrace } from "./types/ExtractionOutcome";
import { ExtractionStage } from "./types/ExtractionStage";

export type StageFactory = (ctx: ExtractionContext) => AnswerExtractor[];

export interface IdiomExtractorOptions {
  lexicon?: Partial<ExtractionLexicon>;
  fallbackMaxChars?: number;
  /** Replaces the default cascade; order is precedence. */
  stages?: StageFactory;
}

export const defaultStages: StageFactory = (ctx) => [
  new BracketMarkerExtractor(ctx),
  new QuotedTextExtractor(ctx),
  new KeywordIntroExtractor(ctx),
  new StandaloneLineExtractor(ctx),
  new FirstSentenceExtractor(ctx),
  new NgramScanExtractor(ctx),
  new FallbackExtractor(ctx),
];

function outcome(extractedText: string, stageUsed: ExtractionStage): ExtractionOutcome {
  return Object.freeze({ extractedText, stageUsed });
}

/**
 * Pulls the answer phrase out of a free-form model response. Stages run in
 * order and the first one with an accepted candidate decides.
 */
export class IdiomExtractor {
  readonly stages: readonly AnswerExtractor[];
  readonly classifier: CandidateClassifier;
  readonly scorer: CandidateScorer;
  private readonly fallbackMaxChars: number;

  constructor(opts: IdiomExtractorOptions = {}) {
    const lexicon: ExtractionLexicon = Object.freeze({ ...DEFAULT_LEXICON, ...opts.lexicon });
    this.fallbackMaxChars = opts.fallbackMaxChars ?? EXTRACTION_CONSTANTS.FALLBACK_MAX_CHARS;
    this.classifier = new CandidateClassifier(lexicon);
    this.scorer = new CandidateScorer(this.classifier);
    const ctx: ExtractionContext = {
      lexicon,
      classifier: this.classifier,
      scorer: this.scorer,
      clean: createCleaner(lexicon),
      fallbackMaxChars: this.fallbackMaxChars,
    };
    this.stages = Object.freeze((opts.stages ?? defaultStages)(ctx));
  }

  extract(raw: string): ExtractionOutcome {
    return this.trace(raw).outcome;
  }

  /** Same decision as `extract`, plus what every stage that ran produced. */
  trace(raw: string): ExtractionTrace {
    const text = typeof raw === "string" ? raw : "";
    const stages: StageTrace[] = [];
    if (!text.trim()) {
      return { outcome: outcome("", ExtractionStage.FALLBACK_RAW), stages };
    }

    for (const extractor of this.stages) {
      const result = extractor.tryExtract(text);
      stages.push({ stage: extractor.stage, result });
      const best = result ? this.scorer.pickBest(result.candidates) : null;
      if (best) {
        return { outcome: outcome(best.text, extractor.stage), stages };
      }
    }

    // Only reachable with a custom stage list that leaves out the fallback.
    return { outcome: outcome(fallbackText(text, this.fallbackMaxChars), ExtractionStage.FALLBACK_RAW), stages };
  }
}

let defaultExtractor: IdiomExtractor | null = null;

export function extractIdiom(raw: string): ExtractionOutcome {
  if (!defaultExtractor) defaultExtractor = new IdiomExtractor();
  return defaultExtractor.extract(raw);
}
