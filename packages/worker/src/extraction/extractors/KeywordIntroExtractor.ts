import { EXTRACTION_CONSTANTS } from "../constants";
import { CandidateSet } from "../types/CandidateSet";
import { ExtractionStage } from "../types/ExtractionStage";
import { phraseAlternation, wholeWordRegex } from "../phrases";
import { AnswerExtractor, ExtractionContext, acceptCandidates } from "./AnswerExtractor";

const LEADING_SEPARATORS = /[\s:.,\-–—]+/y;
const SENTENCE_STOP = /[.!?](?=\s|$)|\n/g;

// Spans longer than this cannot clean down to an answer; only their leading clause is kept.
const MAX_SPAN_CHARS = EXTRACTION_CONSTANTS.MAX_ANSWER_CHARS * 4;

/**
 * "The idiom is X", "this represents X", ... Each hit yields its leading clause
 * first and then the whole span up to the sentence end, so "spill the beans, so
 * spill beans" offers "spill the beans" ahead of the run-on.
 */
export class KeywordIntroExtractor implements AnswerExtractor {
  stage = ExtractionStage.KEYWORD_INTRO as const;
  private readonly introRes: RegExp[];
  private readonly clauseBreak: RegExp;

  constructor(private readonly ctx: ExtractionContext) {
    this.introRes = ctx.lexicon.introducers.map((intro) => wholeWordRegex([intro], "giu"));
    const connectives = ctx.lexicon.clauseConnectives;
    this.clauseBreak = connectives.length
      ? new RegExp(`[,;]|\\s(?:${phraseAlternation(connectives)})(?![\\p{L}\\p{N}_])`, "iu")
      : /[,;]/;
  }

  tryExtract(text: string): CandidateSet | null {
    const raw: string[] = [];
    for (const introRe of this.introRes) {
      // Matches come in text order, so the next sentence stop is only searched
      // again once a span starts past it.
      let stopAt = -1;
      for (const match of text.matchAll(introRe)) {
        const spanStart = this.skipSeparators(text, (match.index ?? 0) + match[0].length);
        if (stopAt !== Infinity && stopAt < spanStart) {
          stopAt = this.nextSentenceStop(text, spanStart);
        }
        const end = Math.min(stopAt, text.length);

        if (end - spanStart > MAX_SPAN_CHARS) {
          const window = text.slice(spanStart, spanStart + MAX_SPAN_CHARS);
          const cut = window.search(this.clauseBreak);
          const clause = cut === -1 ? "" : window.slice(0, cut).trim();
          if (clause) raw.push(clause);
          continue;
        }

        const span = text.slice(spanStart, end).trim();
        if (!span) continue;
        const clause = span.split(this.clauseBreak)[0].trim();
        if (clause) raw.push(clause);
        raw.push(span);
      }
    }
    return acceptCandidates(this.stage, raw, this.ctx);
  }

  private skipSeparators(text: string, from: number): number {
    LEADING_SEPARATORS.lastIndex = from;
    return LEADING_SEPARATORS.test(text) ? LEADING_SEPARATORS.lastIndex : from;
  }

  private nextSentenceStop(text: string, from: number): number {
    SENTENCE_STOP.lastIndex = from;
    const stop = SENTENCE_STOP.exec(text);
    return stop ? stop.index : Infinity;
  }
}
