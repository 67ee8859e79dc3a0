import assert from "assert";
import { test } from "node:test";
import { countWords, normalizeIdiom, tokenize } from "./text";

const cases: Array<{ input: string; norm: string }> = [
  { input: "  The Piece-of_Cake!! ", norm: "piece of cake" },
  { input: "Rock and Roll", norm: "rock & roll" },
  { input: "R U ready?", norm: "are you ready" },
  { input: "A drop in the bucket.", norm: "drop in the bucket" },
  { input: "an   apple a day", norm: "apple a day" },
  { input: "\"Break the ice\"", norm: "break the ice" },
  { input: "the the cat", norm: "cat" },
  { input: "...", norm: "" },
  { input: "", norm: "" },
  { input: "Crème brûlée", norm: "crème brûlée" },
];

function testCases() {
  for (const c of cases) {
    assert.strictEqual(normalizeIdiom(c.input), c.norm, `normalizeIdiom(${JSON.stringify(c.input)})`);
  }
}

function testIdempotent() {
  const inputs = [
    ...cases.map((c) => c.input),
    "and",
    "the and",
    "  -- the ,cat-- ",
    "U and R",
    "a",
    "the",
    "'a' bit_of__luck!?",
    "{{{Hold your horses}}}",
    "The answer is {{{break the ice}}}",
  ];
  for (const input of inputs) {
    const once = normalizeIdiom(input);
    assert.strictEqual(normalizeIdiom(once), once, `not idempotent for ${JSON.stringify(input)}`);
  }
}

function testLeadingAmpersandSurvives() {
  assert.strictEqual(normalizeIdiom("and so on"), "& so on");
}

function testBracketsStripped() {
  assert.strictEqual(normalizeIdiom("The answer is {{{break the ice}}}"), "answer is {{{break the ice");
}

function testTokenize() {
  assert.deepStrictEqual(tokenize("  kick \n the\tbucket "), ["kick", "the", "bucket"]);
  assert.deepStrictEqual(tokenize(""), []);
  assert.strictEqual(countWords("spill the beans"), 3);
  assert.strictEqual(countWords("   "), 0);
}

test("normalizeIdiom canonicalizes known phrases", testCases);
test("normalizeIdiom is idempotent", testIdempotent);
test("normalizeIdiom keeps a leading ampersand", testLeadingAmpersandSurvives);
test("normalizeIdiom strips trailing brackets only at the edge", testBracketsStripped);
test("tokenize splits on whitespace", testTokenize);
