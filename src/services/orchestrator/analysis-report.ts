/**
 * Analysis Report
 * Display summary and JSON/text export of a combined analysis result.
 */

import { MAX_BEST_DISHES, MAX_COMPLAINTS, MAX_HIGHLIGHTS } from '../../config/index.js';
import type { CombinedResult } from './analysis.types.js';

export type ExportFormat = 'json' | 'text';

export interface AnalysisSummary {
  restaurantName: string;
  totalReviews: string;
  overallRating: string;
  cuisineType: string;
  priceRange: string;
  ambience: string;
  highlights: string;
  complaints: string;
  bestDishes: string;
  serviceQuality: string;
  overallSentiment: string;
  analysisSource: string;
  fromCache: string;
}

function bullets(items: readonly string[], cap: number): string {
  return items.length > 0 ? items.slice(0, cap).map(item => `• ${item}`).join('\n') : 'None mentioned';
}

/** `YYYY-MM-DD HH:MM:SS` in UTC */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function getAnalysisSummary(result: CombinedResult): AnalysisSummary {
  const { analysis, reviewMetadata } = result;

  return {
    restaurantName: result.restaurantName,
    totalReviews: `${reviewMetadata.totalReviews} reviews analyzed`,
    overallRating: `${reviewMetadata.overallRating.toFixed(1)}/5.0`,
    cuisineType: analysis.cuisineType,
    priceRange: analysis.priceRange,
    ambience: analysis.ambience,
    highlights: bullets(analysis.highlights, MAX_HIGHLIGHTS),
    complaints: bullets(analysis.complaints, MAX_COMPLAINTS),
    bestDishes: analysis.bestDishes.length > 0 ? analysis.bestDishes.slice(0, MAX_BEST_DISHES).join(', ') : 'Not mentioned',
    serviceQuality: analysis.serviceQuality,
    overallSentiment: analysis.overallSentiment,
    analysisSource: analysis.usedFallback ? 'Basic keyword analysis (AI unavailable)' : 'AI analysis',
    fromCache: result.analysisFromCache ? 'Yes' : 'No',
  };
}

function section(title: string, body: string): string {
  return `${title}\n${'-'.repeat(title.length)}\n${body}`;
}

export function exportAnalysis(result: CombinedResult, format: ExportFormat, generatedAt: Date = new Date()): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  const s = getAnalysisSummary(result);
  const title = 'Restaurant Analysis Report';

  return [
    `${title}\n${'='.repeat(title.length)}`,
    [
      `Restaurant: ${s.restaurantName}`,
      `Overall Rating: ${s.overallRating}`,
      `Reviews Analyzed: ${s.totalReviews}`,
      `Analysis Source: ${s.analysisSource}`,
      `From Cache: ${s.fromCache}`,
      `Generated: ${formatTimestamp(generatedAt)}`,
    ].join('\n'),
    section('Cuisine & Atmosphere', [
      `Cuisine Type: ${s.cuisineType}`,
      `Price Range: ${s.priceRange}`,
      `Ambience: ${s.ambience}`,
    ].join('\n')),
    section('Customer Highlights', s.highlights),
    section('Main Complaints', s.complaints),
    section('Recommended Dishes', s.bestDishes),
    section('Service Quality', s.serviceQuality),
    section('Overall Sentiment', s.overallSentiment),
  ].join('\n\n');
}
