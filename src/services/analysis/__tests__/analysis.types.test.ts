import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { cleanModelAnalysis, extractJsonObject } from '../analysis.types.js';
import { reviewFingerprint } from '../review-fingerprint.js';
import { buildAnalysisPrompt, formatReviewsForPrompt, REVIEW_ANALYSIS_INSTRUCTIONS } from '../analysis-prompt.js';

describe('cleanModelAnalysis', () => {
  it('should map snake_case keys, cap lists and drop empty items', () => {
    const result = cleanModelAnalysis({
      cuisine_type: 'Thai',
      highlights: ['a', '', null, ' b ', { x: 1 }, 'f', 'g'],
      complaints: 'not a list',
      best_dishes: ['x', 'y', 'z', 'w'],
      overall_sentiment: 5,
    });

    assert.deepEqual(result, {
      cuisineType: 'Thai',
      ambience: 'Not described',
      highlights: ['a', 'b', '{"x":1}'],
      complaints: [],
      overallSentiment: '5',
      priceRange: 'Not mentioned',
      bestDishes: ['x', 'y', 'z'],
      serviceQuality: 'Not mentioned',
      usedFallback: false,
    });
  });

  it('should use defaults for an empty object', () => {
    const result = cleanModelAnalysis({});
    assert.equal(result?.cuisineType, 'Not specified');
    assert.equal(result?.overallSentiment, 'Mixed');
  });

  it('should reject values that are not objects', () => {
    assert.equal(cleanModelAnalysis([1, 2]), null);
    assert.equal(cleanModelAnalysis('text'), null);
    assert.equal(cleanModelAnalysis(undefined), null);
  });
});

describe('extractJsonObject', () => {
  it('should pull the object out of surrounding prose', () => {
    assert.deepEqual(extractJsonObject('Here you go: {"a":1} thanks'), { a: 1 });
  });

  it('should take the outermost braces of a fenced block', () => {
    assert.deepEqual(extractJsonObject('```json\n{"a":{"b":2}}\n```'), { a: { b: 2 } });
  });

  it('should fall back to parsing the whole text', () => {
    assert.deepEqual(extractJsonObject('[1,2]'), [1, 2]);
  });

  it('should return undefined when nothing parses', () => {
    assert.equal(extractJsonObject('no json here'), undefined);
    assert.equal(extractJsonObject('{broken'), undefined);
  });
});

describe('reviewFingerprint', () => {
  const base = [
    { text: 'Lovely pasta and kind staff', rating: 5 },
    { text: 'Too salty for me', rating: 2 },
  ];

  it('should be a sha256 hex digest', () => {
    assert.match(reviewFingerprint(base), /^[0-9a-f]{64}$/);
  });

  it('should ignore whitespace differences', () => {
    const reflowed = [
      { text: '  Lovely  pasta\nand kind staff ', rating: 5 },
      { text: 'Too salty\tfor me', rating: 2 },
    ];
    assert.equal(reviewFingerprint(reflowed), reviewFingerprint(base));
  });

  it('should change with a rating', () => {
    assert.notEqual(reviewFingerprint([{ text: 'Lovely pasta and kind staff', rating: 4 }]),
      reviewFingerprint([{ text: 'Lovely pasta and kind staff', rating: 5 }]));
  });

  it('should only look at the first ten reviews and 100 characters', () => {
    const ten = Array.from({ length: 10 }, (_, i) => ({ text: `${'x'.repeat(100)} review ${i}`, rating: 3 }));
    const withTail = [...ten, { text: 'an eleventh review', rating: 1 }];
    assert.equal(reviewFingerprint(withTail), reviewFingerprint(ten));
    assert.equal(reviewFingerprint(ten), reviewFingerprint(ten.map(r => ({ ...r, text: 'x'.repeat(100) }))));
  });
});

describe('analysis prompt', () => {
  it('should number reviews by input position and collapse whitespace', () => {
    const text = formatReviewsForPrompt([
      { text: 'short', rating: 1 },
      { text: '  Lovely\n\nplace   to eat ', rating: 5 },
      { text: '0123456789', rating: 3 },
    ]);

    assert.equal(text, 'Review 2 (Rating: 5/5): Lovely place to eat\n\nReview 3 (Rating: 3/5): 0123456789');
  });

  it('should keep at most 30 reviews', () => {
    const reviews = Array.from({ length: 35 }, (_, i) => ({ text: `Review text number ${i}`, rating: 4 }));
    assert.equal(formatReviewsForPrompt(reviews).split('\n\n').length, 30);
  });

  it('should prefix instructions and restaurant name', () => {
    const prompt = buildAnalysisPrompt([{ text: 'Lovely place to eat', rating: 5 }], '  Bistro ');
    assert.equal(prompt,
      `${REVIEW_ANALYSIS_INSTRUCTIONS}\n\nRestaurant: Bistro\n\nReviews:\n\nReview 1 (Rating: 5/5): Lovely place to eat`);
  });

  it('should omit the restaurant line without a name', () => {
    const prompt = buildAnalysisPrompt([{ text: 'Lovely place to eat', rating: 5 }], '');
    assert.equal(prompt, `${REVIEW_ANALYSIS_INSTRUCTIONS}\n\nReviews:\n\nReview 1 (Rating: 5/5): Lovely place to eat`);
  });

  it('should return null when no review has usable text', () => {
    assert.equal(buildAnalysisPrompt([{ text: 'meh', rating: 2 }], 'Bistro'), null);
  });
});
