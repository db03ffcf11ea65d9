import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import pino from 'pino';
import { ok } from '../../../lib/result.js';
import type { AnalysisError } from '../../../lib/errors/analysis-error.js';
import { AnalysisOrchestrator } from '../analysis.orchestrator.js';
import type { AnalysisEvent, ReviewAnalyzer, ReviewSource } from '../analysis.types.js';
import { bundle, failure, FakeAnalyzer, FakeReviewSource, Gate, sampleAnalysis } from './fakes.js';

const silent = pino({ level: 'silent' });
const NOW = Date.UTC(2024, 0, 2, 3, 4, 5);

function createOrchestrator(reviews: ReviewSource = new FakeReviewSource(), analyzer: ReviewAnalyzer = new FakeAnalyzer()) {
  let ids = 0;
  return new AnalysisOrchestrator({
    reviews,
    analyzer,
    defaultReviewCount: 200,
    now: () => NOW,
    createId: () => `session-${++ids}`,
    logger: silent,
  });
}

describe('AnalysisOrchestrator', () => {
  it('should report progress and return the combined result', async () => {
    const source = new FakeReviewSource();
    const orchestrator = createOrchestrator(source);
    const progress: Array<[string, number]> = [];

    const result = await orchestrator.analyze({
      placeId: 'place-1',
      onProgress: (message, percent) => progress.push([message, percent]),
    });

    assert.deepEqual(progress, [
      ['Fetching restaurant reviews...', 10],
      ['Analyzing 2 reviews...', 50],
      ['Analysis complete!', 100],
    ]);
    assert.ok(result.ok);
    assert.deepEqual(result.value, {
      placeId: 'place-1',
      restaurantName: 'Test Bistro',
      reviewMetadata: { totalReviews: 2, overallRating: 4.4, totalRatings: 120, fromCache: false },
      analysis: sampleAnalysis,
      analysisFromCache: false,
      timestamps: { startedAt: '2024-01-02T03:04:05.000Z', completedAt: '2024-01-02T03:04:05.000Z' },
    });
    assert.deepEqual(source.calls, [{ placeId: 'place-1', maxCount: 200 }]);
    assert.equal(orchestrator.getLastResult(), result.value);
    assert.equal(orchestrator.isAnalyzing, false);
    assert.equal(orchestrator.getSession(), null);
  });

  it('should prefer the requested name over the provider name', async () => {
    const analyzer = new FakeAnalyzer();
    const orchestrator = createOrchestrator(new FakeReviewSource(), analyzer);

    await orchestrator.analyze({ placeId: 'place-1', restaurantName: ' Chosen Name ' });
    await orchestrator.analyze({ placeId: 'place-1', restaurantName: '   ' });

    assert.deepEqual(analyzer.names, ['Chosen Name', 'Test Bistro']);
  });

  it('should name an unnamed place Unknown Restaurant', async () => {
    const analyzer = new FakeAnalyzer();
    const orchestrator = createOrchestrator(new FakeReviewSource(ok(bundle({ placeName: '' }))), analyzer);

    const result = await orchestrator.analyze({ placeId: 'place-1' });

    assert.ok(result.ok);
    assert.equal(result.value.restaurantName, 'Unknown Restaurant');
  });

  it('should emit progress and completion events in order', async () => {
    const orchestrator = createOrchestrator();
    const events: AnalysisEvent[] = [];

    await orchestrator.analyze({ placeId: 'place-1', maxReviews: 20, onEvent: event => events.push(event) });

    assert.deepEqual(events.map(e => e.type === 'progress' ? e.percent : e.type), [10, 50, 100, 'completed']);
    assert.ok(events.every(e => e.sessionId === 'session-1'));
  });

  it('should reject a second request while one is running', async () => {
    const gate = new Gate();
    const source = new FakeReviewSource(ok(bundle()), gate);
    const orchestrator = createOrchestrator(source);

    const first = orchestrator.analyze({ placeId: 'place-1' });
    assert.equal(orchestrator.isAnalyzing, true);
    assert.equal(orchestrator.getSession()?.status, 'fetchingReviews');

    const second = await orchestrator.analyze({ placeId: 'place-2' });
    assert.ok(!second.ok);
    assert.equal(second.error.code, 'ALREADY_IN_PROGRESS');
    assert.equal(source.calls.length, 1);

    gate.open();
    assert.ok((await first).ok);
    assert.equal(orchestrator.isAnalyzing, false);
  });

  it('should call onError synchronously when a background run is rejected', async () => {
    const gate = new Gate();
    const orchestrator = createOrchestrator(new FakeReviewSource(ok(bundle()), gate));
    const running = orchestrator.analyzeAsync({ placeId: 'place-1' });
    const errors: AnalysisError[] = [];

    const rejected = orchestrator.analyzeAsync({ placeId: 'place-2', onError: error => errors.push(error) });

    assert.ok(!rejected.ok);
    assert.deepEqual(errors.map(e => e.code), ['ALREADY_IN_PROGRESS']);

    gate.open();
    assert.ok(running.ok);
    await running.value.done;
  });

  it('should drop callbacks after cancel and resolve CANCELLED', async () => {
    const gate = new Gate();
    const orchestrator = createOrchestrator(new FakeReviewSource(ok(bundle()), gate));
    const progress: number[] = [];
    let completed = 0;
    const errors: AnalysisError[] = [];

    const handle = orchestrator.analyzeAsync({
      placeId: 'place-1',
      onProgress: (_message, percent) => progress.push(percent),
      onComplete: () => completed++,
      onError: error => errors.push(error),
    });
    assert.ok(handle.ok);

    assert.equal(handle.value.cancel(), true);
    assert.equal(handle.value.cancel(), false);
    assert.equal(orchestrator.getSession(), null);
    assert.equal(orchestrator.isAnalyzing, true);

    gate.open();
    const result = await handle.value.done;

    assert.ok(!result.ok);
    assert.equal(result.error.code, 'CANCELLED');
    assert.deepEqual(progress, [10]);
    assert.equal(completed, 0);
    assert.deepEqual(errors, []);
    assert.equal(orchestrator.getLastResult(), null);
    assert.equal(orchestrator.isAnalyzing, false);
  });

  it('should ignore cancel for another session id', async () => {
    const gate = new Gate();
    const orchestrator = createOrchestrator(new FakeReviewSource(ok(bundle()), gate));
    const handle = orchestrator.analyzeAsync({ placeId: 'place-1' });
    assert.ok(handle.ok);

    assert.equal(orchestrator.cancel('other-session'), false);
    assert.equal(orchestrator.cancel('session-1'), true);

    gate.open();
    await handle.value.done;
  });

  it('should tag review failures with the review_fetch stage', async () => {
    const orchestrator = createOrchestrator(new FakeReviewSource(failure('NO_REVIEWS', 'No reviews found for this restaurant')));
    const events: AnalysisEvent[] = [];

    const result = await orchestrator.analyze({ placeId: 'place-1', onEvent: event => events.push(event) });

    assert.ok(!result.ok);
    assert.equal(result.error.code, 'REVIEW_FETCH_FAILED');
    assert.equal(result.error.stage, 'review_fetch');
    assert.equal(result.error.message, 'No reviews found for this restaurant');
    assert.deepEqual(result.error.details, { reason: 'NO_REVIEWS' });
    assert.deepEqual(events.map(e => e.type), ['progress', 'failed']);
  });

  it('should tag analyzer failures with the analysis stage', async () => {
    const orchestrator = createOrchestrator(new FakeReviewSource(), new FakeAnalyzer(failure('INVALID_INPUT', 'No valid review text found')));

    const result = await orchestrator.analyze({ placeId: 'place-1' });

    assert.ok(!result.ok);
    assert.equal(result.error.code, 'ANALYSIS_FAILED');
    assert.equal(result.error.stage, 'analysis');
  });

  it('should turn thrown errors into UNEXPECTED and call onError', async () => {
    const orchestrator = createOrchestrator(new FakeReviewSource(), new FakeAnalyzer(new Error('disk full')));
    const errors: AnalysisError[] = [];

    const handle = orchestrator.analyzeAsync({ placeId: 'place-1', onError: error => errors.push(error) });
    assert.ok(handle.ok);
    const result = await handle.value.done;

    assert.ok(!result.ok);
    assert.equal(result.error.code, 'UNEXPECTED');
    assert.equal(result.error.stage, 'unexpected');
    assert.equal(result.error.message, 'Unexpected error during analysis: disk full');
    assert.deepEqual(errors.map(e => e.code), ['UNEXPECTED']);
    assert.equal(orchestrator.isAnalyzing, false);
  });

  it('should survive a throwing event handler', async () => {
    const orchestrator = createOrchestrator();

    const result = await orchestrator.analyze({
      placeId: 'place-1',
      onEvent: () => { throw new Error('listener bug'); },
    });

    assert.ok(result.ok);
  });

  it('should report cache status and forget the last result on clear', async () => {
    const source = new FakeReviewSource();
    const orchestrator = createOrchestrator(source);
    await orchestrator.analyze({ placeId: 'place-1' });

    const status = orchestrator.getCacheStatus();
    assert.equal(status.currentAnalysisAvailable, true);
    assert.equal(status.isAnalyzing, false);
    assert.equal(status.reviews.cachedPlaces, 1);

    assert.deepEqual(orchestrator.clearAllCaches(), { reviewsCleared: true, analysisCleared: true });
    assert.equal(source.cleared, 1);
    assert.equal(orchestrator.getLastResult(), null);
  });
});
