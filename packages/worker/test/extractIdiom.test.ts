import assert from "assert";
import { test } from "node:test";
import { IdiomExtractor, extractIdiom } from "../src/extraction/extractIdiom";
import { QuotedTextExtractor } from "../src/extraction/extractors/QuotedTextExtractor";
import { ExtractionStage, STAGE_ORDER } from "../src/extraction/types/ExtractionStage";

const extractor = new IdiomExtractor();

function testBracketMarkerWins() {
  assert.deepStrictEqual(extractor.extract("The idiom is {{{a drop in the bucket}}}"), {
    extractedText: "a drop in the bucket",
    stageUsed: ExtractionStage.BRACKET_MARKER,
  });
  assert.deepStrictEqual(extractor.extract('I think "wrong answer" however {{{hold your horses}}}'), {
    extractedText: "hold your horses",
    stageUsed: ExtractionStage.BRACKET_MARKER,
  });
  // markers are trusted even when the wording looks like commentary
  assert.deepStrictEqual(extractor.extract('"Break the ice" fits, but my final answer is {{{the image shows}}}'), {
    extractedText: "the image shows",
    stageUsed: ExtractionStage.BRACKET_MARKER,
  });
}

function testMarkerOutsideBoundsFallsThrough() {
  assert.deepStrictEqual(extractor.extract('{{{first}}} or "cut corners"'), {
    extractedText: "cut corners",
    stageUsed: ExtractionStage.QUOTED,
  });
}

function testKeywordTieKeepsClause() {
  assert.deepStrictEqual(extractor.extract("This rebus represents spill the beans, so spill beans"), {
    extractedText: "spill the beans",
    stageUsed: ExtractionStage.KEYWORD_INTRO,
  });
}

function testCommonResponseShapes() {
  const cases: Array<[string, string, ExtractionStage]> = [
    ['The idiom shown is "piece of cake"', "piece of cake", ExtractionStage.QUOTED],
    ["Looking at this image, I think it represents break the ice", "break the ice", ExtractionStage.KEYWORD_INTRO],
    ['This suggests the idiom:\n\n**"Hold your horses"**', "Hold your horses", ExtractionStage.QUOTED],
    ['The idiom is **"Break the Ice"**.', "Break the Ice", ExtractionStage.QUOTED],
    ['This likely represents the idiom: **"One over the eleven."**', "One over the eleven", ExtractionStage.QUOTED],
    ["The idiom is: **Top Secret**", "Top Secret", ExtractionStage.KEYWORD_INTRO],
    ["completely unrelated text", "completely unrelated text", ExtractionStage.STANDALONE_LINE],
  ];
  for (const [input, expected, stage] of cases) {
    assert.deepStrictEqual(extractIdiom(input), { extractedText: expected, stageUsed: stage }, input);
  }
}

function testEmptyInput() {
  const empty = { extractedText: "", stageUsed: ExtractionStage.FALLBACK_RAW };
  assert.deepStrictEqual(extractor.extract(""), empty);
  assert.deepStrictEqual(extractor.extract("   \n\t "), empty);
}

function testLongInput() {
  assert.deepStrictEqual(extractor.extract("x".repeat(10001)), {
    extractedText: "x".repeat(50),
    stageUsed: ExtractionStage.FALLBACK_RAW,
  });
  assert.deepStrictEqual(extractor.extract("the cat sat on the mat. ".repeat(500)), {
    extractedText: "cat sat on the mat",
    stageUsed: ExtractionStage.FIRST_SENTENCE,
  });
}

function testDeterministic() {
  const input = "This image depicts someone kicking a bucket. The idiom is kick the bucket.";
  const first = extractor.extract(input);
  assert.deepStrictEqual(new IdiomExtractor().extract(input), first);
  assert.deepStrictEqual(extractor.extract(input), first);
  assert.ok(STAGE_ORDER.includes(first.stageUsed));
}

function testFallbackLength() {
  const short = new IdiomExtractor({ fallbackMaxChars: 5 });
  assert.deepStrictEqual(short.extract("x".repeat(200)), {
    extractedText: "xxxxx",
    stageUsed: ExtractionStage.FALLBACK_RAW,
  });
}

function testCustomStages() {
  const quotedOnly = new IdiomExtractor({ stages: (ctx) => [new QuotedTextExtractor(ctx)] });
  assert.strictEqual(quotedOnly.stages.length, 1);
  assert.deepStrictEqual(quotedOnly.extract("no quotes here at all"), {
    extractedText: "no quotes here at all",
    stageUsed: ExtractionStage.FALLBACK_RAW,
  });
}

function testCustomLexicon() {
  const input = "My guess: bite the bullet";
  const custom = new IdiomExtractor({ lexicon: { introducers: ["my guess:"] } });
  assert.deepStrictEqual(custom.extract(input), {
    extractedText: "bite the bullet",
    stageUsed: ExtractionStage.KEYWORD_INTRO,
  });
  assert.deepStrictEqual(extractor.extract(input), {
    extractedText: "My guess: bite the bullet",
    stageUsed: ExtractionStage.STANDALONE_LINE,
  });
}

function testTrace() {
  const { outcome, stages } = extractor.trace("This rebus represents spill the beans, so spill beans");
  assert.strictEqual(outcome.extractedText, "spill the beans");
  assert.deepStrictEqual(
    stages.map((s) => s.stage),
    [ExtractionStage.BRACKET_MARKER, ExtractionStage.QUOTED, ExtractionStage.KEYWORD_INTRO]
  );
  assert.strictEqual(stages[0].result, null);
  assert.strictEqual(stages[2].result?.candidates.length, 2);
  assert.deepStrictEqual(extractor.trace("").stages, []);
}

test("bracket markers take precedence over every other pattern", testBracketMarkerWins);
test("a one-word marker falls through to later stages", testMarkerOutsideBoundsFallsThrough);
test("keyword stage tie resolves to the first candidate", testKeywordTieKeepsClause);
test("extracts answers from common response shapes", testCommonResponseShapes);
test("empty or blank responses yield an empty fallback", testEmptyInput);
test("very long responses still produce an outcome", testLongInput);
test("extraction is deterministic", testDeterministic);
test("fallback length is configurable", testFallbackLength);
test("a custom stage list still ends in a fallback", testCustomStages);
test("lexicon overrides change which stage fires", testCustomLexicon);
test("trace lists every stage that ran", testTrace);
